/**
 * Shared types for pattern discovery.
 *
 * Field names follow the platform's snake_case so patterns and suggestions
 * can be handed to callers and serialized as-is.
 */

import type { AutomationDocument } from './automation/automation-document.ts';

// ---------- history ----------

/** One state change of one entity. */
export interface StateEvent {
  entity_id: string;
  /** Domain prefix of the entity id (e.g. `light`). */
  domain: string;
  state: string;
  timestamp: Date;
  /** Offset east of UTC in minutes, as written in the source timestamp. */
  utc_offset_minutes: number;
}

/** Ordered events per entity, in first-arrival order of the entities. */
export type HistoryMap = ReadonlyMap<string, readonly StateEvent[]>;

// ---------- patterns ----------

/** Pattern kinds, also the suggestion categories. */
export type PatternType = 'daily' | 'sequence' | 'conditional' | 'periodic';

interface PatternBase {
  /** Heuristic score 0..1. */
  confidence: number;
  /** Observed occurrences supporting the pattern (>= 1). */
  occurrences: number;
}

/** Same state at the same weekday and hour. */
export interface DailyPattern extends PatternBase {
  type: 'daily';
  entity_id: string;
  domain: string;
  /** 0 = Monday … 6 = Sunday. */
  day_of_week: number;
  /** Hour of day (0-23). */
  hour: number;
  state: string;
}

/** An entity action within a sequence. */
export interface SequenceStep {
  entity_id: string;
  state: string;
  domain: string;
}

/** Several entities changing together within a short window. */
export interface SequencePattern extends PatternBase {
  type: 'sequence';
  /** At least 3 steps, in timeline order. */
  steps: SequenceStep[];
}

/** A controllable entity following a condition entity's state change. */
export interface ConditionalPattern extends PatternBase {
  type: 'conditional';
  entity_id: string;
  domain: string;
  condition_entity: string;
  condition_state: string;
  target_state: string;
}

/** A state recurring at a steady interval. */
export interface PeriodicPattern extends PatternBase {
  type: 'periodic';
  entity_id: string;
  domain: string;
  state: string;
  /** Hours between occurrences, in [1, 24], a multiple of 0.5. */
  interval_hours: number;
}

export type Pattern = DailyPattern | SequencePattern | ConditionalPattern | PeriodicPattern;

// ---------- suggestions ----------

/** A ranked automation suggestion. */
export interface Suggestion {
  id: string;
  type: PatternType;
  title: string;
  description: string;
  confidence: number;
  /** Unique entity ids the suggestion touches. */
  entities: string[];
  pattern: Pattern;
  /** Generated automation. */
  config: AutomationDocument;
  /** `config` serialized as platform YAML. */
  yaml: string;
}

export type CategorizedSuggestions = Record<PatternType, Suggestion[]>;
