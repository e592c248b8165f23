/**
 * Discovery configuration schema using Zod.
 * Validated once when a service or assembler is built; components read the
 * typed result and never look up optional keys ad hoc.
 *
 * Configuration property names:
 * - min_occurrences (alias suggestion_threshold): samples required before a pattern is proposed
 * - confidence_threshold: acceptance floor applied inside every miner
 * - min_confidence: acceptance floor applied to ranked suggestions
 * - max_suggestions: number of suggestions returned at most
 * - sequence_window_seconds: window a sequence must fit in
 * - conditional_window_seconds: delay after a condition change still credited to it
 * - usage_window_seconds: delay used by the quick usage analysis
 * - periodic_tolerance: largest stddev/mean ratio accepted as periodic
 * - excluded_domains: domains never analysed
 * - excluded_entities: glob patterns (picomatch) of entity ids never analysed
 * - debug: enable debug logging
 *
 * Unknown properties are stripped.
 */

import { z } from 'zod';
import { PatternDiscoveryError, formatIssues } from './errors.ts';

export const DEFAULT_MIN_OCCURRENCES = 3;

/** Domains skipped before mining: they describe the automation layer itself. */
export const DEFAULT_EXCLUDED_DOMAINS: readonly string[] = [
  'automation',
  'script',
  'scene',
  'group',
  'persistent_notification',
];

const ratio = (name: string) =>
  z.number().min(0, `${name} must be at least 0`).max(1, `${name} must be at most 1`);

export const DiscoveryConfigSchema = z
  .object({
    /** Minimum samples before proposing a pattern */
    min_occurrences: z.number().int().min(1, 'min_occurrences must be at least 1').optional(),

    /** Legacy name for min_occurrences; ignored when min_occurrences is set */
    suggestion_threshold: z.number().int().min(1, 'suggestion_threshold must be at least 1').optional(),

    /** Miner acceptance floor */
    confidence_threshold: ratio('confidence_threshold').default(0.7),

    /** Suggestion acceptance floor */
    min_confidence: ratio('min_confidence').default(0.7),

    /** Truncation bound for ranked suggestions */
    max_suggestions: z
      .number()
      .int()
      .min(1, 'max_suggestions must be at least 1')
      .max(500, 'max_suggestions must be at most 500')
      .default(5),

    sequence_window_seconds: z.number().positive('sequence_window_seconds must be positive').default(120),

    conditional_window_seconds: z.number().positive('conditional_window_seconds must be positive').default(600),

    usage_window_seconds: z.number().positive('usage_window_seconds must be positive').default(60),

    periodic_tolerance: z
      .number()
      .gt(0, 'periodic_tolerance must be greater than 0')
      .max(1, 'periodic_tolerance must be at most 1')
      .default(0.3),

    excluded_domains: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_DOMAINS]),

    excluded_entities: z.array(z.string().min(1)).default([]),

    debug: z.boolean().default(false),
  })
  .strip()
  .transform(({ min_occurrences, suggestion_threshold, ...rest }) => ({
    ...rest,
    min_occurrences: min_occurrences ?? suggestion_threshold ?? DEFAULT_MIN_OCCURRENCES,
  }));

export type DiscoveryConfigInput = z.input<typeof DiscoveryConfigSchema>;
export type DiscoveryConfig = z.output<typeof DiscoveryConfigSchema>;

/** The subset every miner reads. */
export type MinerOptions = Pick<DiscoveryConfig, 'min_occurrences' | 'confidence_threshold'>;

/**
 * Validates configuration and fills defaults.
 * Throws PatternDiscoveryError('invalid_config') listing every issue.
 */
export function resolveDiscoveryConfig(input: unknown = {}): DiscoveryConfig {
  const result = DiscoveryConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new PatternDiscoveryError('invalid_config', `Invalid discovery config: ${formatIssues(result.error.issues)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Safely validates configuration without throwing.
 */
export function safeValidateConfig(
  input: unknown,
): { success: true; data: DiscoveryConfig } | { success: false; errors: z.ZodIssue[] } {
  const result = DiscoveryConfigSchema.safeParse(input ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error.issues };
}
