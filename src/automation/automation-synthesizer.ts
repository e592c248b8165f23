/**
 * Automation synthesizer.
 *
 * Maps a mined pattern to an automation document (trigger + condition +
 * action) and renders it as platform YAML. Ids are derived from the pattern
 * contents only, so the same history always yields the same ids.
 */

import { createHash } from 'node:crypto';
import type { StateUsagePattern, TimeUsagePattern, UsagePattern } from '../analysis/usage-analyzer.ts';
import { shapeKey } from '../analysis/sequence-pattern-miner.ts';
import { TOGGLE_DOMAINS, domainOf, isOnState } from '../ha-domains.ts';
import { compactStamp, formatHour } from '../timestamps.ts';
import type { ConditionalPattern, DailyPattern, Pattern, PeriodicPattern, SequencePattern } from '../types.ts';
import {
  serializeAutomation,
  type AutomationDocument,
  type AutomationTrigger,
  type ServiceAction,
} from './automation-document.ts';

// ---------- constants ----------

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

const SEQUENCE_PLACEHOLDER_NOTE =
  'Note: This automation uses a placeholder MQTT button trigger. You should customize this.';

// ---------- formatting helpers (exported for testing) ----------

/**
 * Lowercase slug safe for automation ids: `light.living_room` → `light_living_room`.
 */
export function sanitizeId(value: string): string {
  return value
    .replace(/[^a-z0-9]+/gi, '_')
    .replace(/^_|_$/g, '')
    .toLowerCase();
}

/**
 * Weekday name for a 0-based index (0 = Monday).
 */
export function weekdayName(day: number): string {
  return WEEKDAY_NAMES[day] ?? 'day';
}

/**
 * Interval without trailing zeros: 6 → "6", 1.5 → "1.5".
 */
export function formatInterval(hours: number): string {
  return Number.isInteger(hours) ? String(hours) : hours.toFixed(1);
}

/**
 * Stable pattern id: type, sanitized entity, discriminating fields.
 */
export function patternId(pattern: Pattern): string {
  switch (pattern.type) {
    case 'daily':
      return `daily_${sanitizeId(pattern.entity_id)}_${pattern.day_of_week}_${pattern.hour}`;
    case 'sequence': {
      const digest = createHash('sha256').update(shapeKey(pattern.steps)).digest('hex').slice(0, 8);
      return `sequence_${sanitizeId(pattern.steps[0].entity_id)}_${pattern.steps.length}_${digest}`;
    }
    case 'conditional':
      return (
        `conditional_${sanitizeId(pattern.entity_id)}_${sanitizeId(pattern.condition_entity)}` +
        `_${sanitizeId(pattern.condition_state)}`
      );
    case 'periodic':
      return (
        `periodic_${sanitizeId(pattern.entity_id)}_${sanitizeId(pattern.state)}` +
        `_${formatInterval(pattern.interval_hours).replace('.', '_')}`
      );
  }
}

// ---------- AutomationSynthesizer ----------

export interface AutomationSynthesizerOptions {
  /** Clock used only for usage-analysis ids. Default: `() => new Date()`. */
  now?: () => Date;
}

export class AutomationSynthesizer {
  private readonly now: () => Date;

  constructor(options?: AutomationSynthesizerOptions) {
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Build the automation document for a mined pattern.
   */
  synthesize(pattern: Pattern): AutomationDocument {
    switch (pattern.type) {
      case 'daily':
        return this.daily(pattern);
      case 'sequence':
        return this.sequence(pattern);
      case 'conditional':
        return this.conditional(pattern);
      case 'periodic':
        return this.periodic(pattern);
    }
  }

  /**
   * Render a document as platform YAML.
   */
  render(document: AutomationDocument): string {
    return serializeAutomation(document);
  }

  /**
   * Build a document for a quick usage pattern. The id ends in the current
   * wall-clock time (`YYYYMMDDHHmmss`, UTC) taken from the injected clock.
   */
  synthesizeUsage(pattern: UsagePattern): AutomationDocument {
    const entityId = pattern.entity_id;
    const document: AutomationDocument = {
      id: `auto_${pattern.type}_${sanitizeId(entityId)}_${compactStamp(this.now())}`,
      alias: `Auto-generated ${pattern.type} automation for ${entityId}`,
      description: `Automatically generated ${pattern.type}-based automation for ${entityId}`,
      mode: 'single',
      trigger: [usageTrigger(pattern)],
      condition: [],
      action: [buildAction(entityId, domainOf(entityId), pattern.action_state)],
    };
    return document;
  }

  // ---------- private: per pattern type ----------

  private daily(pattern: DailyPattern): AutomationDocument {
    const day = weekdayName(pattern.day_of_week);
    const time = formatHour(pattern.hour);
    return {
      id: patternId(pattern),
      alias: `Turn ${pattern.state} ${pattern.entity_id} on ${day} at ${time}`,
      description: `Automatically turn ${pattern.state} the ${pattern.entity_id} every ${day} at ${time}`,
      mode: 'single',
      // The platform numbers weekdays 1 (Monday) to 7 (Sunday).
      trigger: [{ platform: 'time', at: `${time}:00`, weekday: [pattern.day_of_week + 1] }],
      condition: [],
      action: [buildAction(pattern.entity_id, pattern.domain, pattern.state)],
    };
  }

  private sequence(pattern: SequencePattern): AutomationDocument {
    const first = pattern.steps[0].entity_id;
    const count = pattern.steps.length;
    return {
      id: patternId(pattern),
      alias: `Sequence: ${first} and ${count - 1} other devices`,
      description: `Automation to control ${count} devices in sequence\n${SEQUENCE_PLACEHOLDER_NOTE}`,
      mode: 'single',
      trigger: [{ platform: 'device', domain: 'mqtt', device_id: '', type: 'button_short_press', subtype: '1' }],
      condition: [],
      action: pattern.steps.map((step) => buildAction(step.entity_id, step.domain, step.state)),
    };
  }

  private conditional(pattern: ConditionalPattern): AutomationDocument {
    return {
      id: patternId(pattern),
      alias: `Control ${pattern.entity_id} based on ${pattern.condition_entity}`,
      description:
        `Turn ${pattern.target_state} the ${pattern.entity_id} when ` +
        `${pattern.condition_entity} changes to ${pattern.condition_state}`,
      mode: 'single',
      trigger: [{ platform: 'state', entity_id: pattern.condition_entity, to: pattern.condition_state }],
      condition: [],
      action: [buildAction(pattern.entity_id, pattern.domain, pattern.target_state)],
    };
  }

  private periodic(pattern: PeriodicPattern): AutomationDocument {
    const interval = formatInterval(pattern.interval_hours);
    return {
      id: patternId(pattern),
      alias: `Control ${pattern.entity_id} every ${interval} hours`,
      description: `Turn ${pattern.state} the ${pattern.entity_id} every ${interval} hours`,
      mode: 'single',
      trigger: [{ platform: 'time_pattern', hours: `/${interval}` }],
      condition: [],
      action: [buildAction(pattern.entity_id, pattern.domain, pattern.state)],
    };
  }
}

// ---------- action dispatch ----------

/**
 * Map an entity and its target state to a service call.
 *
 * - light / switch / fan / cover: `<domain>.turn_on` for on/open, else `<domain>.turn_off`
 * - climate: `climate.set_hvac_mode` with the state as `hvac_mode`
 * - anything else: `<domain>.set_state` with the state as data
 */
export function buildAction(entityId: string, domain: string, state: string): ServiceAction {
  if (TOGGLE_DOMAINS.has(domain)) {
    return {
      service: isOnState(state) ? `${domain}.turn_on` : `${domain}.turn_off`,
      target: { entity_id: entityId },
    };
  }

  if (domain === 'climate') {
    return {
      service: 'climate.set_hvac_mode',
      target: { entity_id: entityId },
      data: { hvac_mode: state },
    };
  }

  return {
    service: `${domain}.set_state`,
    target: { entity_id: entityId },
    data: { state },
  };
}

function usageTrigger(pattern: UsagePattern): AutomationTrigger {
  return pattern.type === 'time' ? timeUsageTrigger(pattern) : stateUsageTrigger(pattern);
}

function timeUsageTrigger(pattern: TimeUsagePattern): AutomationTrigger {
  return { platform: 'time', at: `${pattern.trigger_time}:00` };
}

function stateUsageTrigger(pattern: StateUsagePattern): AutomationTrigger {
  return { platform: 'state', entity_id: pattern.trigger_entity, to: pattern.trigger_state };
}
