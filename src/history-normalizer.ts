/**
 * History normalizer.
 *
 * Turns raw history from the platform into per-entity ordered StateEvent
 * sequences. Two container shapes are accepted:
 *   - a flat list of `{entity_id, state, last_changed}` rows
 *   - a mapping `entity_id → rows[]` (rows may omit entity_id)
 *
 * Rows without a state or a parsable `last_changed` are dropped and counted.
 * Any other container shape yields an empty map and a warning.
 */

import { createEntityExclusion, domainOf, type EntityExclusion } from './ha-domains.ts';
import type { Logger } from './logger.ts';
import { parseTimestamp } from './timestamps.ts';
import type { HistoryMap, StateEvent } from './types.ts';

// ---------- public types ----------

/** One raw history row as the platform's history endpoint returns it. */
export interface RawHistoryEvent {
  entity_id?: string;
  state?: unknown;
  /** ISO-8601, optional trailing `Z`. */
  last_changed?: unknown;
  [key: string]: unknown;
}

/** Either accepted container shape. */
export type RawHistory = RawHistoryEvent[] | Record<string, RawHistoryEvent[]>;

export interface NormalizeOptions {
  exclude?: EntityExclusion;
  logger?: Logger;
}

export interface NormalizedHistory {
  histories: HistoryMap;
  /** Rows dropped for missing state/entity or an unreadable timestamp. */
  dropped_events: number;
  /** Entity ids left out by domain or pattern exclusion. */
  excluded_entities: string[];
}

// ---------- normalizeHistory ----------

/**
 * Group, clean and order raw history.
 */
export function normalizeHistory(input: unknown, options?: NormalizeOptions): NormalizedHistory {
  const isExcluded = createEntityExclusion(options?.exclude ?? {});
  const grouped = new Map<string, StateEvent[]>();
  const excluded = new Set<string>();
  let dropped = 0;

  const accept = (entityId: string, row: unknown): void => {
    if (isExcluded(entityId)) {
      excluded.add(entityId);
      return;
    }
    const event = toStateEvent(entityId, row);
    if (!event) {
      dropped++;
      return;
    }
    let events = grouped.get(entityId);
    if (!events) {
      events = [];
      grouped.set(entityId, events);
    }
    events.push(event);
  };

  if (Array.isArray(input)) {
    for (const row of input) {
      const entityId = isRecord(row) ? row.entity_id : undefined;
      if (typeof entityId !== 'string' || entityId.length === 0) {
        dropped++;
        continue;
      }
      accept(entityId, row);
    }
  } else if (isRecord(input)) {
    for (const [entityId, rows] of Object.entries(input)) {
      if (!Array.isArray(rows)) {
        options?.logger?.debug('Skipping entity with non-list history', { entity_id: entityId });
        continue;
      }
      for (const row of rows) {
        accept(entityId, row);
      }
    }
  } else {
    options?.logger?.warn('Unsupported history container, nothing to analyse', {
      received: input === null ? 'null' : typeof input,
    });
    return { histories: new Map(), dropped_events: 0, excluded_entities: [] };
  }

  // Array.prototype.sort is stable: equal timestamps keep arrival order.
  for (const events of grouped.values()) {
    events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  if (dropped > 0) {
    options?.logger?.debug('Dropped malformed history rows', { dropped });
  }

  return { histories: grouped, dropped_events: dropped, excluded_entities: [...excluded] };
}

// ---------- helpers ----------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStateEvent(entityId: string, row: unknown): StateEvent | null {
  if (!isRecord(row)) return null;

  const state = readState(row.state);
  if (state === null) return null;

  const parsed = parseTimestamp(row.last_changed);
  if (!parsed) return null;

  return {
    entity_id: entityId,
    domain: domainOf(entityId),
    state,
    timestamp: parsed.timestamp,
    utc_offset_minutes: parsed.utc_offset_minutes,
  };
}

function readState(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return value ? 'on' : 'off';
  return null;
}

/**
 * Count events across all entities.
 */
export function countEvents(histories: HistoryMap): number {
  let total = 0;
  for (const events of histories.values()) total += events.length;
  return total;
}
