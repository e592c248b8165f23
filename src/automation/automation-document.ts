/**
 * Automation document model and YAML codec.
 *
 * The document is the only artifact callers persist, so it is described by
 * zod schemas and parsed back through them. At this boundary a single
 * trigger, condition or action object is normalized to a one-element list;
 * everything past it works on lists only.
 *
 * YAML is written and read with 1.1 rules, the dialect the platform's loader
 * uses: strings such as `on`, `off` and `07:00:00` come out quoted and stay
 * strings on the way back.
 */

import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { PatternDiscoveryError, formatIssues } from '../errors.ts';

// ---------- schemas ----------

const oneOrMany = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === undefined || Array.isArray(value) ? value : [value]), z.array(schema));

export const TimeTriggerSchema = z.object({
  platform: z.literal('time'),
  at: z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, 'at must be HH:MM or HH:MM:SS'),
  /** 1 = Monday … 7 = Sunday. */
  weekday: z.array(z.number().int().min(1).max(7)).optional(),
});

export const TimePatternTriggerSchema = z.object({
  platform: z.literal('time_pattern'),
  hours: z.string().optional(),
  minutes: z.string().optional(),
  seconds: z.string().optional(),
});

export const StateTriggerSchema = z.object({
  platform: z.literal('state'),
  entity_id: z.string().min(1),
  from: z.string().optional(),
  to: z.string().optional(),
});

export const DeviceTriggerSchema = z.object({
  platform: z.literal('device'),
  domain: z.string().min(1),
  device_id: z.string(),
  type: z.string().min(1),
  subtype: z.string().optional(),
});

export const NumericStateTriggerSchema = z.object({
  platform: z.literal('numeric_state'),
  entity_id: z.string().min(1),
  above: z.number().optional(),
  below: z.number().optional(),
});

export const TemplateTriggerSchema = z.object({
  platform: z.literal('template'),
  value_template: z.string().min(1),
});

export const WebhookTriggerSchema = z.object({
  platform: z.literal('webhook'),
  webhook_id: z.string().min(1),
});

export const AutomationTriggerSchema = z.discriminatedUnion('platform', [
  TimeTriggerSchema,
  TimePatternTriggerSchema,
  StateTriggerSchema,
  DeviceTriggerSchema,
  NumericStateTriggerSchema,
  TemplateTriggerSchema,
  WebhookTriggerSchema,
]);

export const StateConditionSchema = z.object({
  condition: z.literal('state'),
  entity_id: z.string().min(1),
  state: z.string(),
});

export const TimeConditionSchema = z.object({
  condition: z.literal('time'),
  after: z.string().optional(),
  before: z.string().optional(),
  weekday: z.array(z.string()).optional(),
});

export const AutomationConditionSchema = z.discriminatedUnion('condition', [StateConditionSchema, TimeConditionSchema]);

export const ServiceActionSchema = z.object({
  service: z.string().regex(/^[a-z0-9_]+\.[a-z0-9_]+$/, 'service must look like domain.service'),
  target: z
    .object({
      entity_id: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    })
    .optional(),
  data: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export const AutomationModeSchema = z.enum(['single', 'restart', 'queued', 'parallel']);

export const AutomationDocumentSchema = z.object({
  id: z.string().min(1),
  alias: z.string().min(1),
  description: z.string().default(''),
  mode: AutomationModeSchema.default('single'),
  trigger: oneOrMany(AutomationTriggerSchema).pipe(z.array(AutomationTriggerSchema).min(1, 'at least one trigger is required')),
  condition: oneOrMany(AutomationConditionSchema).default([]),
  action: oneOrMany(ServiceActionSchema).pipe(z.array(ServiceActionSchema).min(1, 'at least one action is required')),
});

// ---------- types ----------

export type TimeTrigger = z.infer<typeof TimeTriggerSchema>;
export type TimePatternTrigger = z.infer<typeof TimePatternTriggerSchema>;
export type StateTrigger = z.infer<typeof StateTriggerSchema>;
export type DeviceTrigger = z.infer<typeof DeviceTriggerSchema>;
export type AutomationTrigger = z.infer<typeof AutomationTriggerSchema>;
export type AutomationCondition = z.infer<typeof AutomationConditionSchema>;
export type ServiceAction = z.infer<typeof ServiceActionSchema>;
export type AutomationMode = z.infer<typeof AutomationModeSchema>;
export type AutomationDocument = z.infer<typeof AutomationDocumentSchema>;

// ---------- codec ----------

/**
 * Serialize a document to platform YAML. Keys keep document order.
 */
export function serializeAutomation(document: AutomationDocument): string {
  return stringify(document, { version: '1.1' });
}

/**
 * Parse and validate automation YAML.
 *
 * @throws PatternDiscoveryError('invalid_automation') on YAML syntax errors or schema violations
 */
export function parseAutomation(text: string): AutomationDocument {
  let raw: unknown;
  try {
    raw = parse(text, { version: '1.1' });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PatternDiscoveryError('invalid_automation', `Automation YAML does not parse: ${reason}`, { cause: err });
  }

  const result = AutomationDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new PatternDiscoveryError('invalid_automation', `Invalid automation: ${formatIssues(result.error.issues)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ---------- validation ----------

/** Offline validation report. */
export interface AutomationValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Entity ids referenced by triggers, conditions and actions. */
  entities: string[];
}

/**
 * Validate automation YAML without throwing. Warns about generated
 * placeholders that still need editing.
 */
export function validateAutomation(text: string): AutomationValidation {
  let document: AutomationDocument;
  try {
    document = parseAutomation(text);
  } catch (err) {
    if (err instanceof PatternDiscoveryError) {
      return { valid: false, errors: [err.message], warnings: [], entities: [] };
    }
    throw err;
  }

  const warnings: string[] = [];
  for (const trigger of document.trigger) {
    if (trigger.platform === 'device' && trigger.device_id === '') {
      warnings.push(`Device trigger (${trigger.domain} ${trigger.type}) has no device_id and must be customized`);
    }
  }
  if (document.action.some((a) => a.target === undefined)) {
    warnings.push('An action has no target entity');
  }

  return { valid: true, errors: [], warnings, entities: referencedEntities(document) };
}

/**
 * Unique entity ids referenced anywhere in a document, in document order.
 */
export function referencedEntities(document: AutomationDocument): string[] {
  const ids = new Set<string>();

  for (const trigger of document.trigger) {
    if (trigger.platform === 'state' || trigger.platform === 'numeric_state') {
      ids.add(trigger.entity_id);
    }
  }
  for (const condition of document.condition) {
    if (condition.condition === 'state') {
      ids.add(condition.entity_id);
    }
  }
  for (const action of document.action) {
    const target = action.target?.entity_id;
    if (target === undefined) continue;
    for (const id of Array.isArray(target) ? target : [target]) {
      ids.add(id);
    }
  }

  return [...ids];
}
