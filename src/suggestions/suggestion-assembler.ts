/**
 * Suggestion assembler.
 *
 * Runs the four miners over the same normalized history, turns every pattern
 * into a Suggestion with a generated automation, then ranks, filters and
 * truncates the merged list.
 *
 * Ranking: confidence descending; equal confidences keep miner order (daily,
 * sequence, conditional, periodic) and, within a miner, discovery order.
 */

import { mineConditionalPatterns } from '../analysis/conditional-pattern-miner.ts';
import { mineDailyPatterns } from '../analysis/daily-pattern-miner.ts';
import { minePeriodicPatterns } from '../analysis/periodic-pattern-miner.ts';
import { mineSequencePatterns } from '../analysis/sequence-pattern-miner.ts';
import {
  AutomationSynthesizer,
  formatInterval,
  patternId,
  weekdayName,
} from '../automation/automation-synthesizer.ts';
import type { DiscoveryConfig } from '../config.ts';
import { isOnState } from '../ha-domains.ts';
import type { Logger } from '../logger.ts';
import { formatHour } from '../timestamps.ts';
import type { CategorizedSuggestions, HistoryMap, Pattern, Suggestion } from '../types.ts';

// ---------- constructor options ----------

export interface SuggestionAssemblerOptions {
  synthesizer?: AutomationSynthesizer;
  logger?: Logger;
}

// ---------- SuggestionAssembler ----------

export class SuggestionAssembler {
  private readonly synthesizer: AutomationSynthesizer;
  private readonly logger?: Logger;

  constructor(
    private readonly config: DiscoveryConfig,
    options?: SuggestionAssemblerOptions,
  ) {
    this.synthesizer = options?.synthesizer ?? new AutomationSynthesizer();
    this.logger = options?.logger;
  }

  /**
   * Run every miner over the histories. The miners only read the map.
   */
  minePatterns(histories: HistoryMap): Pattern[] {
    const daily = mineDailyPatterns(histories, this.config);
    const sequence = mineSequencePatterns(histories, this.config);
    const conditional = mineConditionalPatterns(histories, this.config);
    const periodic = minePeriodicPatterns(histories, this.config);

    this.logger?.debug('Mining finished', {
      daily: daily.length,
      sequence: sequence.length,
      conditional: conditional.length,
      periodic: periodic.length,
    });

    return [...daily, ...sequence, ...conditional, ...periodic];
  }

  /**
   * Mine, convert, rank, filter and truncate.
   */
  assemble(histories: HistoryMap): Suggestion[] {
    return this.rank(this.minePatterns(histories).map((p) => this.toSuggestion(p)));
  }

  /**
   * Sort by confidence (stable), drop those under `min_confidence`, keep at
   * most `max_suggestions`.
   */
  rank(suggestions: readonly Suggestion[]): Suggestion[] {
    return [...suggestions]
      .sort((a, b) => b.confidence - a.confidence)
      .filter((s) => s.confidence >= this.config.min_confidence)
      .slice(0, this.config.max_suggestions);
  }

  /**
   * Convert one pattern into a suggestion with its generated automation.
   */
  toSuggestion(pattern: Pattern): Suggestion {
    const config = this.synthesizer.synthesize(pattern);
    return {
      id: patternId(pattern),
      type: pattern.type,
      ...describePattern(pattern),
      confidence: pattern.confidence,
      entities: patternEntities(pattern),
      pattern,
      config,
      yaml: this.synthesizer.render(config),
    };
  }

  /**
   * Group suggestions into the fixed categories.
   */
  categorize(suggestions: readonly Suggestion[]): CategorizedSuggestions {
    const categories: CategorizedSuggestions = { daily: [], conditional: [], sequence: [], periodic: [] };
    for (const suggestion of suggestions) {
      categories[suggestion.type].push(suggestion);
    }
    return categories;
  }

  /**
   * Suggestions touching the given entity.
   */
  forEntity(suggestions: readonly Suggestion[], entityId: string): Suggestion[] {
    return suggestions.filter((s) => s.entities.includes(entityId));
  }
}

// ---------- text helpers (exported for testing) ----------

/**
 * Confidence as a whole percentage: 0.857 → "86%".
 */
export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

/** "Turn on light.x" for on/off-like states, "Set climate.x to heat" otherwise. */
function stateChange(entityId: string, state: string): string {
  if (isOnState(state) || state === 'off' || state === 'closed') {
    return `Turn ${state} ${entityId}`;
  }
  return `Set ${entityId} to ${state}`;
}

/**
 * Title and description for a pattern.
 */
export function describePattern(pattern: Pattern): { title: string; description: string } {
  const detected = `This pattern was detected with ${formatConfidence(pattern.confidence)} confidence.`;

  switch (pattern.type) {
    case 'daily': {
      const day = weekdayName(pattern.day_of_week);
      const time = formatHour(pattern.hour);
      const change = stateChange(pattern.entity_id, pattern.state);
      return {
        title: `${change} every ${day} at ${time}`,
        description: `This automation will ${lowerFirst(change)} every ${day} at ${time}. ${detected}`,
      };
    }
    case 'sequence': {
      const [first, ...others] = pattern.steps.map((s) => s.entity_id);
      const count = pattern.steps.length;
      return {
        title: `Create a scene with ${count} devices`,
        description:
          `This automation will create a scene that sets ${count} devices to specific states. ` +
          `The scene starts with ${first} and includes ${others.join(', ')}. ${detected}`,
      };
    }
    case 'conditional': {
      const change = stateChange(pattern.entity_id, pattern.target_state);
      return {
        title: `${change} when ${pattern.condition_entity} is ${pattern.condition_state}`,
        description:
          `This automation will ${lowerFirst(change)} when ${pattern.condition_entity} ` +
          `changes to ${pattern.condition_state}. ${detected}`,
      };
    }
    case 'periodic': {
      const interval = formatInterval(pattern.interval_hours);
      const change = stateChange(pattern.entity_id, pattern.state);
      return {
        title: `${change} every ${interval} hours`,
        description: `This automation will ${lowerFirst(change)} every ${interval} hours. ${detected}`,
      };
    }
  }
}

/**
 * Unique entity ids a pattern touches, target first.
 */
export function patternEntities(pattern: Pattern): string[] {
  switch (pattern.type) {
    case 'sequence':
      return [...new Set(pattern.steps.map((s) => s.entity_id))];
    case 'conditional':
      return [pattern.entity_id, pattern.condition_entity];
    default:
      return [pattern.entity_id];
  }
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}
