/**
 * Daily pattern miner.
 *
 * Buckets each entity's state changes by (weekday, hour) and reports buckets
 * where one state clearly dominates, e.g. "light.porch turns on every Friday
 * around 19:00".
 */

import type { MinerOptions } from '../config.ts';
import { localHour, localWeekday } from '../timestamps.ts';
import type { DailyPattern, HistoryMap, StateEvent } from '../types.ts';
import { Tally } from './stats.ts';

/**
 * Find (weekday, hour) buckets with a dominant state.
 *
 * Buckets with fewer than `min_occurrences` events are ignored. Confidence is
 * the majority share of the bucket; on a tie the state seen first wins.
 */
export function mineDailyPatterns(histories: HistoryMap, options: MinerOptions): DailyPattern[] {
  const patterns: DailyPattern[] = [];

  for (const [entityId, events] of histories) {
    if (events.length < options.min_occurrences) continue;

    const domain = events[0].domain;

    for (const [key, tally] of groupByDayAndHour(events)) {
      if (tally.total < options.min_occurrences) continue;

      const majority = tally.majority();
      if (!majority) continue;

      const confidence = majority.count / tally.total;
      if (confidence < options.confidence_threshold) continue;

      const [day, hour] = key.split('|').map((part) => parseInt(part, 10));
      patterns.push({
        type: 'daily',
        entity_id: entityId,
        domain,
        day_of_week: day,
        hour,
        state: majority.key,
        confidence,
        occurrences: majority.count,
      });
    }
  }

  return patterns;
}

function groupByDayAndHour(events: readonly StateEvent[]): Map<string, Tally> {
  const buckets = new Map<string, Tally>();

  for (const event of events) {
    const key = `${localWeekday(event)}|${localHour(event)}`;
    let tally = buckets.get(key);
    if (!tally) {
      tally = new Tally();
      buckets.set(key, tally);
    }
    tally.add(event.state);
  }

  return buckets;
}
