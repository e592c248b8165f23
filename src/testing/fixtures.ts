/**
 * History builders shared by the unit tests.
 */

import { vi } from 'vitest';
import { normalizeHistory, type RawHistoryEvent } from '../history-normalizer.ts';
import type { Logger } from '../logger.ts';
import type { HistoryMap } from '../types.ts';

/** One raw history row. */
export function row(entity_id: string, state: string, last_changed: string): RawHistoryEvent {
  return { entity_id, state, last_changed };
}

/** Normalize raw rows into a history map. */
export function historyOf(rows: RawHistoryEvent[]): HistoryMap {
  return normalizeHistory(rows).histories;
}

/**
 * The same rows repeated on several dates: each entry is
 * `[entity_id, state, "HH:MM:SS(.mmm)"]`, stamped in UTC on every date.
 */
export function repeatOn(dates: string[], steps: Array<[string, string, string]>): RawHistoryEvent[] {
  const rows: RawHistoryEvent[] = [];
  for (const date of dates) {
    for (const [entityId, state, time] of steps) {
      rows.push(row(entityId, state, `${date}T${time}Z`));
    }
  }
  return rows;
}

/** Logger whose methods are vi.fn() spies. */
export function mockLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
} {
  return { namespace: 'test', info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

/** Three consecutive Mondays. */
export const MONDAYS = ['2024-01-01', '2024-01-08', '2024-01-15'];

/** Monday, Tuesday, Wednesday of one week. */
export const CONSECUTIVE_DAYS = ['2024-01-01', '2024-01-02', '2024-01-03'];
