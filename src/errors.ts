/**
 * Error types for pattern discovery and automation synthesis.
 */

export type PatternDiscoveryErrorType = 'invalid_config' | 'invalid_automation' | 'unknown_suggestion';

/**
 * Structured error raised at the package boundary.
 *
 * Mining itself never throws on bad history; it drops what it cannot read.
 * Only configuration, automation documents handed in from outside and
 * suggestion lookups can fail.
 */
export class PatternDiscoveryError extends Error {
  readonly type: PatternDiscoveryErrorType;

  constructor(type: PatternDiscoveryErrorType, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'PatternDiscoveryError';
    this.type = type;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }

  /**
   * Returns the message prefixed with the error type.
   */
  toSafeString(): string {
    return `[${this.type}] ${this.message}`;
  }
}

/**
 * Format zod-style issues as `path: message` pairs.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`).join(', ');
}
