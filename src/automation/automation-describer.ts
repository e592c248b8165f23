/**
 * Human-readable summaries of automation triggers and actions, for showing a
 * suggestion to a person before it is saved.
 */

import type { AutomationTrigger, ServiceAction } from './automation-document.ts';

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

/**
 * Describe one trigger.
 */
export function describeTrigger(trigger: AutomationTrigger): string {
  switch (trigger.platform) {
    case 'state': {
      if (trigger.from !== undefined && trigger.to !== undefined) {
        return `When ${trigger.entity_id} changes from '${trigger.from}' to '${trigger.to}'`;
      }
      if (trigger.to !== undefined) return `When ${trigger.entity_id} changes to '${trigger.to}'`;
      if (trigger.from !== undefined) return `When ${trigger.entity_id} changes from '${trigger.from}'`;
      return `When ${trigger.entity_id} changes state`;
    }
    case 'time': {
      const days = (trigger.weekday ?? []).map((d) => WEEKDAY_NAMES[d - 1]).filter(Boolean);
      return days.length > 0 ? `At ${trigger.at} on ${days.join(', ')}` : `At ${trigger.at}`;
    }
    case 'time_pattern': {
      const parts: string[] = [];
      if (trigger.hours !== undefined) parts.push(`hours ${trigger.hours}`);
      if (trigger.minutes !== undefined) parts.push(`minutes ${trigger.minutes}`);
      if (trigger.seconds !== undefined) parts.push(`seconds ${trigger.seconds}`);
      return parts.length > 0 ? `On time pattern ${parts.join(', ')}` : 'On time pattern';
    }
    case 'numeric_state': {
      if (trigger.above !== undefined && trigger.below !== undefined) {
        return `When ${trigger.entity_id} is between ${trigger.above} and ${trigger.below}`;
      }
      if (trigger.above !== undefined) return `When ${trigger.entity_id} goes above ${trigger.above}`;
      if (trigger.below !== undefined) return `When ${trigger.entity_id} goes below ${trigger.below}`;
      return `When ${trigger.entity_id} changes numeric state`;
    }
    case 'template':
      return `When template condition is met: ${trigger.value_template}`;
    case 'webhook':
      return `When webhook ${trigger.webhook_id} is called`;
    case 'device':
      return trigger.device_id === ''
        ? `When ${trigger.domain} device (not yet chosen) reports ${trigger.type}`
        : `When ${trigger.domain} device ${trigger.device_id} reports ${trigger.type}`;
  }
}

/**
 * Describe a trigger list as one line.
 */
export function describeTriggers(triggers: readonly AutomationTrigger[]): string {
  if (triggers.length === 0) return 'No triggers defined';
  const descriptions = triggers.map(describeTrigger);
  return descriptions.length === 1 ? descriptions[0] : `Multiple triggers: ${descriptions.join(', ')}`;
}

/**
 * Describe each action as `service → targets (data)`.
 */
export function describeActions(actions: readonly ServiceAction[]): string[] {
  return actions.map((action) => {
    const target = action.target?.entity_id;
    const targets = target === undefined ? '' : ` → ${Array.isArray(target) ? target.join(', ') : target}`;
    const data = action.data
      ? ` (${Object.entries(action.data)
          .map(([k, v]) => `${k}=${String(v)}`)
          .join(', ')})`
      : '';
    return `${action.service}${targets}${data}`;
  });
}
