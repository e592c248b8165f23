/**
 * Periodic pattern miner.
 *
 * Detects controllable entities that reach the same state at a steady
 * interval (a pump every six hours, a dehumidifier every ninety minutes) from
 * the mean and spread of the gaps between those state changes.
 */

import type { MinerOptions } from '../config.ts';
import { isControllable } from '../ha-domains.ts';
import type { HistoryMap, PeriodicPattern } from '../types.ts';
import { meanAndStdDev } from './stats.ts';

const MS_PER_HOUR = 3_600_000;
const MIN_INTERVAL_HOURS = 1;
const MAX_INTERVAL_HOURS = 24;
const DEFAULT_TOLERANCE = 0.3;

export interface PeriodicMinerOptions extends MinerOptions {
  /** Largest stddev/mean ratio still considered periodic. Default: 0.3. */
  periodic_tolerance?: number;
}

/**
 * Find states recurring at a steady interval.
 *
 * Entities and states need at least `2 × min_occurrences` events. The mean
 * interval is rounded to the nearest half hour and must land in [1, 24];
 * confidence is `1 - stddev / mean`.
 */
export function minePeriodicPatterns(histories: HistoryMap, options: PeriodicMinerOptions): PeriodicPattern[] {
  const tolerance = options.periodic_tolerance ?? DEFAULT_TOLERANCE;
  const required = options.min_occurrences * 2;
  const patterns: PeriodicPattern[] = [];

  for (const [entityId, events] of histories) {
    if (events.length < required) continue;
    const domain = events[0].domain;
    if (!isControllable(domain)) continue;

    const byState = new Map<string, number[]>();
    for (const event of events) {
      let times = byState.get(event.state);
      if (!times) {
        times = [];
        byState.set(event.state, times);
      }
      times.push(event.timestamp.getTime());
    }

    for (const [state, times] of byState) {
      if (times.length < required) continue;

      const intervals = intervalsInHours(times);
      const stats = meanAndStdDev(intervals);
      if (!stats || stats.mean <= 0) continue;
      if (stats.stddev >= stats.mean * tolerance) continue;

      const intervalHours = roundToHalfHour(stats.mean);
      if (intervalHours < MIN_INTERVAL_HOURS || intervalHours > MAX_INTERVAL_HOURS) continue;

      patterns.push({
        type: 'periodic',
        entity_id: entityId,
        domain,
        state,
        interval_hours: intervalHours,
        confidence: 1 - stats.stddev / stats.mean,
        occurrences: times.length,
      });
    }
  }

  return patterns;
}

/**
 * Gaps between consecutive timestamps (sorted ascending first), in hours.
 */
export function intervalsInHours(times: readonly number[]): number[] {
  const sorted = [...times].sort((a, b) => a - b);
  const intervals: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    intervals.push((sorted[i] - sorted[i - 1]) / MS_PER_HOUR);
  }
  return intervals;
}

/**
 * Round to the nearest multiple of 0.5 (halves round up).
 */
export function roundToHalfHour(hours: number): number {
  return Math.round(hours * 2) / 2;
}
