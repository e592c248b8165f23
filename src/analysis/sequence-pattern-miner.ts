/**
 * Sequence pattern miner.
 *
 * Looks for groups of different entities that change together within a short
 * window (two minutes by default), such as "motion on, hall light on, kitchen
 * light on". Every event seeds a candidate made of itself plus the following
 * events of other entities inside the window; candidates of three or more
 * steps are counted across the whole timeline.
 *
 * Confidence is `min(1, occurrences / 10)`: ten repetitions saturate the
 * score. It is a ranking heuristic, not a probability.
 */

import type { MinerOptions } from '../config.ts';
import type { HistoryMap, SequencePattern, StateEvent } from '../types.ts';

// ---------- constants ----------

const MIN_SEQUENCE_STEPS = 3;

/** Occurrences at which sequence confidence reaches 1. */
const CONFIDENCE_SATURATION = 10;

const DEFAULT_WINDOW_SECONDS = 120;

// ---------- options ----------

export interface SequenceMinerOptions extends MinerOptions {
  /** Window a sequence must fit in, measured from its first step. Default: 120. */
  sequence_window_seconds?: number;
}

// ---------- mineSequencePatterns ----------

/**
 * Find recurring multi-entity sequences.
 *
 * Each distinct ordered (entity_id, state) shape is reported at most once,
 * from the first seed that produced it.
 */
export function mineSequencePatterns(histories: HistoryMap, options: SequenceMinerOptions): SequencePattern[] {
  const windowMs = (options.sequence_window_seconds ?? DEFAULT_WINDOW_SECONDS) * 1000;
  const timeline = buildTimeline(histories);
  const seen = new Set<string>();
  const patterns: SequencePattern[] = [];

  for (let i = 0; i < timeline.length; i++) {
    const sequence = collectWindow(timeline, i, windowMs);
    if (sequence.length < MIN_SEQUENCE_STEPS) continue;

    const key = shapeKey(sequence);
    if (seen.has(key)) continue;
    seen.add(key);

    const occurrences = countOccurrences(timeline, sequence, windowMs);
    if (occurrences < options.min_occurrences) continue;

    patterns.push({
      type: 'sequence',
      steps: sequence.map((e) => ({ entity_id: e.entity_id, state: e.state, domain: e.domain })),
      confidence: Math.min(1, occurrences / CONFIDENCE_SATURATION),
      occurrences,
    });
  }

  return patterns;
}

// ---------- helpers (exported for testing) ----------

/**
 * Flatten all histories into one timeline ordered by timestamp. The sort is
 * stable, so equal timestamps keep entity order, then event order.
 */
export function buildTimeline(histories: HistoryMap): StateEvent[] {
  const timeline: StateEvent[] = [];
  for (const events of histories.values()) {
    timeline.push(...events);
  }
  timeline.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  return timeline;
}

/**
 * The candidate seeded at `start`: the seed plus every later event of a
 * different entity within the window. Other entities may appear twice.
 */
export function collectWindow(timeline: readonly StateEvent[], start: number, windowMs: number): StateEvent[] {
  const seed = timeline[start];
  const seedTime = seed.timestamp.getTime();
  const sequence = [seed];

  for (let j = start + 1; j < timeline.length; j++) {
    const entry = timeline[j];
    if (entry.timestamp.getTime() - seedTime > windowMs) break;
    if (entry.entity_id !== seed.entity_id) {
      sequence.push(entry);
    }
  }

  return sequence;
}

/**
 * Count timeline positions where the seed (entity, state) is followed, in
 * order and within the window, by every remaining step.
 */
export function countOccurrences(
  timeline: readonly StateEvent[],
  sequence: readonly Pick<StateEvent, 'entity_id' | 'state'>[],
  windowMs: number,
): number {
  const [first, ...rest] = sequence;
  let count = 0;

  for (let i = 0; i < timeline.length; i++) {
    const start = timeline[i];
    if (start.entity_id !== first.entity_id || start.state !== first.state) continue;

    const startTime = start.timestamp.getTime();
    let cursor = i;
    let matched = true;

    for (const step of rest) {
      let found = -1;
      for (let k = cursor + 1; k < timeline.length; k++) {
        const entry = timeline[k];
        if (entry.timestamp.getTime() - startTime > windowMs) break;
        if (entry.entity_id === step.entity_id && entry.state === step.state) {
          found = k;
          break;
        }
      }
      if (found === -1) {
        matched = false;
        break;
      }
      cursor = found;
    }

    if (matched) count++;
  }

  return count;
}

/**
 * Key identifying an ordered (entity_id, state) shape.
 */
export function shapeKey(sequence: readonly Pick<StateEvent, 'entity_id' | 'state'>[]): string {
  return JSON.stringify(sequence.map((e) => [e.entity_id, e.state]));
}
