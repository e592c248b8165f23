/**
 * Pattern discovery service.
 *
 * Entry point tying the pieces together: validated configuration, history
 * normalization, mining, suggestion assembly and automation synthesis. Each
 * call works on its own histories; the service keeps no state between calls.
 */

import { analyzeUsage, type UsagePattern } from './analysis/usage-analyzer.ts';
import { AutomationSynthesizer } from './automation/automation-synthesizer.ts';
import { resolveDiscoveryConfig, type DiscoveryConfig } from './config.ts';
import { PatternDiscoveryError } from './errors.ts';
import type { EntityExclusion } from './ha-domains.ts';
import { collectHistory, type HistoryRequest, type HistorySource } from './history-collector.ts';
import { countEvents, normalizeHistory, type NormalizedHistory } from './history-normalizer.ts';
import { childLogger, createLogger, type Logger } from './logger.ts';
import { SuggestionAssembler } from './suggestions/suggestion-assembler.ts';
import type { CategorizedSuggestions, Pattern, Suggestion } from './types.ts';

// ---------- public types ----------

export interface PatternDiscoveryServiceOptions {
  /** Raw configuration; validated once here. */
  config?: unknown;
  logger?: Logger;
  synthesizer?: AutomationSynthesizer;
}

/** Result of one discovery run. */
export interface DiscoveryResult {
  suggestions: Suggestion[];
  categorized: CategorizedSuggestions;
  count: number;
  analyzed_entities: number;
  analyzed_events: number;
  dropped_events: number;
}

/** Result of a discovery run fed from a history source. */
export interface SourceDiscoveryResult extends DiscoveryResult {
  failed_entities: Array<{ entity_id: string; error: string }>;
}

// ---------- PatternDiscoveryService ----------

export class PatternDiscoveryService {
  readonly config: DiscoveryConfig;
  private readonly logger: Logger;
  private readonly assembler: SuggestionAssembler;
  private readonly exclusion: EntityExclusion;

  /**
   * @throws PatternDiscoveryError('invalid_config') when the configuration is invalid
   */
  constructor(options?: PatternDiscoveryServiceOptions) {
    this.config = resolveDiscoveryConfig(options?.config ?? {});
    this.logger = options?.logger ?? createLogger('pattern-discovery', { debug: this.config.debug });
    this.assembler = new SuggestionAssembler(this.config, {
      synthesizer: options?.synthesizer ?? new AutomationSynthesizer(),
      logger: childLogger(this.logger, 'assembler'),
    });
    this.exclusion = {
      domains: this.config.excluded_domains,
      entityPatterns: this.config.excluded_entities,
    };
  }

  /**
   * Normalize raw history (flat list or per-entity mapping).
   */
  normalize(rawHistory: unknown): NormalizedHistory {
    return normalizeHistory(rawHistory, { exclude: this.exclusion, logger: this.logger });
  }

  /**
   * Ranked suggestions for raw history, with category grouping and counts.
   */
  discover(rawHistory: unknown): DiscoveryResult {
    const normalized = this.normalize(rawHistory);
    const suggestions = this.assembler.assemble(normalized.histories);

    const result: DiscoveryResult = {
      suggestions,
      categorized: this.assembler.categorize(suggestions),
      count: suggestions.length,
      analyzed_entities: normalized.histories.size,
      analyzed_events: countEvents(normalized.histories),
      dropped_events: normalized.dropped_events,
    };

    this.logger.info('Pattern discovery finished', {
      suggestions: result.count,
      analyzed_entities: result.analyzed_entities,
      dropped_events: result.dropped_events,
    });

    return result;
  }

  /**
   * All mined patterns, unranked and unfiltered by `min_confidence`.
   */
  discoverPatterns(rawHistory: unknown): Pattern[] {
    return this.assembler.minePatterns(this.normalize(rawHistory).histories);
  }

  /**
   * Ranked suggestions that touch one entity.
   */
  suggestionsForEntity(rawHistory: unknown, entityId: string): Suggestion[] {
    return this.assembler.forEntity(this.discover(rawHistory).suggestions, entityId);
  }

  /**
   * Look up a suggestion by id.
   *
   * @throws PatternDiscoveryError('unknown_suggestion') when no suggestion has that id
   */
  findSuggestion(suggestions: readonly Suggestion[], suggestionId: string): Suggestion {
    const suggestion = suggestions.find((s) => s.id === suggestionId);
    if (!suggestion) {
      throw new PatternDiscoveryError('unknown_suggestion', `Suggestion '${suggestionId}' not found`);
    }
    return suggestion;
  }

  /**
   * Quick time-of-day and state-trigger analysis.
   */
  analyzeUsage(rawHistory: unknown): UsagePattern[] {
    return analyzeUsage(this.normalize(rawHistory).histories, this.config);
  }

  /**
   * Collect history from a source, then discover. Retrieval failures of
   * single entities are reported, not thrown.
   */
  async discoverFromSource(source: HistorySource, request: HistoryRequest): Promise<SourceDiscoveryResult> {
    const collected = await collectHistory(source, request, { exclude: this.exclusion, logger: this.logger });
    return { ...this.discover(collected.history), failed_entities: collected.failed };
  }
}
