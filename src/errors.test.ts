import { describe, it, expect } from 'vitest';

import { PatternDiscoveryError, formatIssues } from './errors.ts';

describe('PatternDiscoveryError', () => {
  it('carries its type and cause', () => {
    const cause = new Error('inner');
    const error = new PatternDiscoveryError('unknown_suggestion', "Suggestion 'x' not found", { cause });

    expect(error.name).toBe('PatternDiscoveryError');
    expect(error.type).toBe('unknown_suggestion');
    expect(error.cause).toBe(cause);
    expect(error.toSafeString()).toBe("[unknown_suggestion] Suggestion 'x' not found");
  });
});

describe('formatIssues', () => {
  it('joins paths and marks the root', () => {
    expect(
      formatIssues([
        { path: ['trigger', 0, 'to'], message: 'Expected string, received boolean' },
        { path: [], message: 'Expected object, received string' },
      ]),
    ).toBe('trigger.0.to: Expected string, received boolean, (root): Expected object, received string');
  });
});
