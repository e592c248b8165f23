/**
 * Quick usage analyzer.
 *
 * A lighter pass than the four miners, kept for callers that want a short
 * list of obvious automations per entity:
 *   - time: the entity usually ends up in one state during a given hour of day
 *   - state: a controllable entity changes within a minute of a sensor or
 *     presence entity changing
 */

import type { DiscoveryConfig } from '../config.ts';
import { USAGE_TRIGGER_DOMAINS, isControllable } from '../ha-domains.ts';
import { formatHour, localHour } from '../timestamps.ts';
import type { HistoryMap, StateEvent } from '../types.ts';
import { correlate } from './conditional-pattern-miner.ts';
import { Tally } from './stats.ts';

// ---------- public types ----------

interface UsagePatternBase {
  entity_id: string;
  action_state: string;
  confidence: number;
  occurrences: number;
}

/** The entity usually reaches `action_state` during the `trigger_time` hour. */
export interface TimeUsagePattern extends UsagePatternBase {
  type: 'time';
  /** `HH:00` */
  trigger_time: string;
}

/** The entity reaches `action_state` shortly after `trigger_entity` reaches `trigger_state`. */
export interface StateUsagePattern extends UsagePatternBase {
  type: 'state';
  trigger_entity: string;
  trigger_state: string;
}

export type UsagePattern = TimeUsagePattern | StateUsagePattern;

export type UsageAnalyzerOptions = Pick<
  DiscoveryConfig,
  'min_occurrences' | 'confidence_threshold' | 'max_suggestions' | 'usage_window_seconds'
>;

// ---------- analyzeUsage ----------

/**
 * Find time-of-day and state-trigger usage patterns, best first, at most
 * `max_suggestions` of them.
 */
export function analyzeUsage(histories: HistoryMap, options: UsageAnalyzerOptions): UsagePattern[] {
  const patterns: UsagePattern[] = [];

  for (const [entityId, events] of histories) {
    if (events.length < options.min_occurrences) continue;

    patterns.push(...findTimePatterns(entityId, events, options));
    patterns.push(...findStatePatterns(entityId, events, histories, options));
  }

  patterns.sort((a, b) => b.confidence - a.confidence);
  return patterns.slice(0, options.max_suggestions);
}

function findTimePatterns(
  entityId: string,
  events: readonly StateEvent[],
  options: UsageAnalyzerOptions,
): TimeUsagePattern[] {
  const buckets = new Map<number, Tally>();
  for (const event of events) {
    const hour = localHour(event);
    let tally = buckets.get(hour);
    if (!tally) {
      tally = new Tally();
      buckets.set(hour, tally);
    }
    tally.add(event.state);
  }

  const patterns: TimeUsagePattern[] = [];
  for (const [hour, tally] of buckets) {
    if (tally.total < options.min_occurrences) continue;

    const majority = tally.majority();
    if (!majority) continue;

    const confidence = majority.count / tally.total;
    if (confidence < options.confidence_threshold) continue;

    patterns.push({
      type: 'time',
      entity_id: entityId,
      trigger_time: formatHour(hour),
      action_state: majority.key,
      confidence,
      occurrences: tally.total,
    });
  }
  return patterns;
}

function findStatePatterns(
  entityId: string,
  events: readonly StateEvent[],
  histories: HistoryMap,
  options: UsageAnalyzerOptions,
): StateUsagePattern[] {
  if (!isControllable(events[0].domain)) return [];

  const windowMs = options.usage_window_seconds * 1000;
  const patterns: StateUsagePattern[] = [];

  for (const [triggerId, triggerEvents] of histories) {
    if (triggerId === entityId || triggerEvents.length < options.min_occurrences) continue;
    if (!USAGE_TRIGGER_DOMAINS.has(triggerEvents[0].domain)) continue;

    const correlations = correlate(triggerEvents, events, windowMs);

    let total = 0;
    for (const tally of correlations.values()) total += tally.total;
    if (total < options.min_occurrences) continue;

    for (const [triggerState, tally] of correlations) {
      if (tally.total < options.min_occurrences) continue;

      const majority = tally.majority();
      if (!majority) continue;

      const confidence = majority.count / tally.total;
      if (confidence < options.confidence_threshold) continue;

      patterns.push({
        type: 'state',
        entity_id: entityId,
        trigger_entity: triggerId,
        trigger_state: triggerState,
        action_state: majority.key,
        confidence,
        occurrences: tally.total,
      });
    }
  }

  return patterns;
}
