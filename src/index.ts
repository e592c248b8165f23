export { PatternDiscoveryService } from './service.ts';
export type {
  DiscoveryResult,
  PatternDiscoveryServiceOptions,
  SourceDiscoveryResult,
} from './service.ts';

export {
  DiscoveryConfigSchema,
  DEFAULT_EXCLUDED_DOMAINS,
  DEFAULT_MIN_OCCURRENCES,
  resolveDiscoveryConfig,
  safeValidateConfig,
} from './config.ts';
export type { DiscoveryConfig, DiscoveryConfigInput, MinerOptions } from './config.ts';

export { PatternDiscoveryError } from './errors.ts';
export type { PatternDiscoveryErrorType } from './errors.ts';

export { createLogger, childLogger } from './logger.ts';
export type { Logger, LoggerOptions } from './logger.ts';

export { normalizeHistory } from './history-normalizer.ts';
export type { NormalizedHistory, NormalizeOptions, RawHistory, RawHistoryEvent } from './history-normalizer.ts';
export { collectHistory } from './history-collector.ts';
export type { CollectedHistory, CollectOptions, HistoryRequest, HistorySource } from './history-collector.ts';

export { mineDailyPatterns } from './analysis/daily-pattern-miner.ts';
export { mineSequencePatterns } from './analysis/sequence-pattern-miner.ts';
export { mineConditionalPatterns } from './analysis/conditional-pattern-miner.ts';
export { minePeriodicPatterns } from './analysis/periodic-pattern-miner.ts';
export { analyzeUsage } from './analysis/usage-analyzer.ts';
export type { UsagePattern, TimeUsagePattern, StateUsagePattern } from './analysis/usage-analyzer.ts';

export { SuggestionAssembler } from './suggestions/suggestion-assembler.ts';
export { AutomationSynthesizer, buildAction } from './automation/automation-synthesizer.ts';
export {
  AutomationDocumentSchema,
  parseAutomation,
  referencedEntities,
  serializeAutomation,
  validateAutomation,
} from './automation/automation-document.ts';
export type {
  AutomationDocument,
  AutomationTrigger,
  AutomationCondition,
  ServiceAction,
  AutomationValidation,
} from './automation/automation-document.ts';
export { describeTrigger, describeTriggers, describeActions } from './automation/automation-describer.ts';

export type {
  StateEvent,
  HistoryMap,
  Pattern,
  PatternType,
  DailyPattern,
  SequencePattern,
  SequenceStep,
  ConditionalPattern,
  PeriodicPattern,
  Suggestion,
  CategorizedSuggestions,
} from './types.ts';
