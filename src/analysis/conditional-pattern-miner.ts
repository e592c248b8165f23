/**
 * Conditional pattern miner.
 *
 * Correlates controllable entities with condition entities (sensors, sun,
 * weather, presence): "when binary_sensor.hall_motion turns on,
 * light.hall turns on within ten minutes". For every condition change, the
 * target's changes in the following window are tallied per condition state.
 */

import type { MinerOptions } from '../config.ts';
import { isConditionCandidate, isControllable } from '../ha-domains.ts';
import type { ConditionalPattern, HistoryMap, StateEvent } from '../types.ts';
import { Tally } from './stats.ts';

const DEFAULT_WINDOW_SECONDS = 600;

export interface ConditionalMinerOptions extends MinerOptions {
  /** Delay after a condition change still credited to it. Default: 600. */
  conditional_window_seconds?: number;
}

/**
 * Find condition → target correlations.
 *
 * A target change counts when it happens 0 to `conditional_window_seconds`
 * after the condition change, both ends inclusive. An entity is never its own
 * condition.
 */
export function mineConditionalPatterns(
  histories: HistoryMap,
  options: ConditionalMinerOptions,
): ConditionalPattern[] {
  const windowMs = (options.conditional_window_seconds ?? DEFAULT_WINDOW_SECONDS) * 1000;
  const conditionIds = [...histories.keys()].filter((id) => {
    const events = histories.get(id);
    return events !== undefined && events.length > 0 && isConditionCandidate(events[0].domain);
  });

  const patterns: ConditionalPattern[] = [];

  for (const [entityId, targetEvents] of histories) {
    if (targetEvents.length < options.min_occurrences) continue;
    const domain = targetEvents[0].domain;
    if (!isControllable(domain)) continue;

    for (const conditionId of conditionIds) {
      if (conditionId === entityId) continue;

      const conditionEvents = histories.get(conditionId) ?? [];
      if (conditionEvents.length < options.min_occurrences) continue;

      const correlations = correlate(conditionEvents, targetEvents, windowMs);

      for (const [conditionState, tally] of correlations) {
        if (tally.total < options.min_occurrences) continue;

        const majority = tally.majority();
        if (!majority) continue;

        const confidence = majority.count / tally.total;
        if (confidence < options.confidence_threshold) continue;

        patterns.push({
          type: 'conditional',
          entity_id: entityId,
          domain,
          condition_entity: conditionId,
          condition_state: conditionState,
          target_state: majority.key,
          confidence,
          occurrences: majority.count,
        });
      }
    }
  }

  return patterns;
}

/**
 * Tally target states seen within the window after each condition change,
 * keyed by the condition state.
 */
export function correlate(
  conditionEvents: readonly StateEvent[],
  targetEvents: readonly StateEvent[],
  windowMs: number,
): Map<string, Tally> {
  const correlations = new Map<string, Tally>();

  for (const condition of conditionEvents) {
    const conditionTime = condition.timestamp.getTime();

    for (const target of targetEvents) {
      const delta = target.timestamp.getTime() - conditionTime;
      if (delta < 0 || delta > windowMs) continue;

      let tally = correlations.get(condition.state);
      if (!tally) {
        tally = new Tally();
        correlations.set(condition.state, tally);
      }
      tally.add(target.state);
    }
  }

  return correlations;
}
