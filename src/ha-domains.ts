/**
 * Domain classification for Home Assistant style entity ids.
 *
 * Decides which entities can act as conditions, which can be commanded, and
 * which are dropped before mining. Entity exclusion supports glob patterns
 * via picomatch (e.g. `sensor.*_battery`).
 */

import picomatch from 'picomatch';

// ---------- domain sets ----------

/** Passive domains: observed, never commanded. */
export const PASSIVE_DOMAINS: ReadonlySet<string> = new Set(['binary_sensor', 'sensor', 'sun', 'weather']);

/** Domains whose changes may explain another entity's change. */
export const CONDITION_DOMAINS: ReadonlySet<string> = new Set([
  'binary_sensor',
  'sensor',
  'sun',
  'weather',
  'person',
  'device_tracker',
]);

/** Trigger domains for the quick usage analysis. */
export const USAGE_TRIGGER_DOMAINS: ReadonlySet<string> = new Set([
  'binary_sensor',
  'sensor',
  'device_tracker',
  'person',
]);

/** Domains commanded with turn_on / turn_off. */
export const TOGGLE_DOMAINS: ReadonlySet<string> = new Set(['light', 'switch', 'fan', 'cover']);

/** States that map to turn_on for toggle domains. */
const ON_STATES: ReadonlySet<string> = new Set(['on', 'open']);

// ---------- helpers ----------

/**
 * Domain prefix of an entity id. An id without a dot is its own domain.
 */
export function domainOf(entityId: string): string {
  const dot = entityId.indexOf('.');
  return dot === -1 ? entityId : entityId.slice(0, dot);
}

/** Whether entities of this domain can be commanded. */
export function isControllable(domain: string): boolean {
  return !PASSIVE_DOMAINS.has(domain);
}

export function isConditionCandidate(domain: string): boolean {
  return CONDITION_DOMAINS.has(domain);
}

export function isOnState(state: string): boolean {
  return ON_STATES.has(state);
}

// ---------- entity filter ----------

/** Exclusion criteria applied before mining. */
export interface EntityExclusion {
  /** Drop entities in these domains. */
  domains?: readonly string[];
  /** Glob patterns matched against the full entity id. */
  entityPatterns?: readonly string[];
}

/**
 * Build a predicate returning true for entities that must be skipped.
 */
export function createEntityExclusion(exclusion: EntityExclusion): (entityId: string) => boolean {
  const domains = new Set(exclusion.domains ?? []);
  const patterns = exclusion.entityPatterns ?? [];
  const matcher = patterns.length > 0 ? picomatch([...patterns]) : null;

  return (entityId: string) => {
    if (domains.has(domainOf(entityId))) return true;
    return matcher !== null && matcher(entityId);
  };
}
