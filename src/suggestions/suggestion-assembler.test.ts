import { describe, it, expect } from 'vitest';

import { resolveDiscoveryConfig } from '../config.ts';
import { CONSECUTIVE_DAYS, MONDAYS, historyOf, mockLogger, repeatOn } from '../testing/fixtures.ts';
import type { DailyPattern, PeriodicPattern } from '../types.ts';
import { SuggestionAssembler, describePattern, formatConfidence, patternEntities } from './suggestion-assembler.ts';

// ---------- helpers ----------

/** Motion then the living room light, every Monday at 07:00. */
const morningHistory = () =>
  historyOf(
    repeatOn(MONDAYS, [
      ['binary_sensor.motion', 'on', '07:00:00'],
      ['light.living_room', 'on', '07:00:30'],
    ]),
  );

/** Three switches in a row on three different weekdays. */
const sceneHistory = () =>
  historyOf(
    repeatOn(CONSECUTIVE_DAYS, [
      ['switch.a', 'on', '18:00:00'],
      ['switch.b', 'on', '18:00:20'],
      ['switch.c', 'on', '18:00:40'],
    ]),
  );

function daily(entityId: string, confidence: number): DailyPattern {
  return {
    type: 'daily',
    entity_id: entityId,
    domain: 'light',
    day_of_week: 4,
    hour: 19,
    state: 'on',
    confidence,
    occurrences: 3,
  };
}

// ---------- SuggestionAssembler ----------

describe('SuggestionAssembler', () => {
  it('merges daily and conditional suggestions in miner order', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));
    const suggestions = assembler.assemble(morningHistory());

    expect(suggestions.map((s) => s.id)).toEqual([
      'daily_binary_sensor_motion_0_7',
      'daily_light_living_room_0_7',
      'conditional_light_living_room_binary_sensor_motion_on',
    ]);
  });

  it('fills title, description, entities and automation', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));
    const [, light, conditional] = assembler.assemble(morningHistory());

    expect(light.title).toBe('Turn on light.living_room every Monday at 07:00');
    expect(light.description).toBe(
      'This automation will turn on light.living_room every Monday at 07:00. ' +
        'This pattern was detected with 100% confidence.',
    );
    expect(conditional.entities).toEqual(['light.living_room', 'binary_sensor.motion']);
    expect(conditional.config.trigger).toEqual([{ platform: 'state', entity_id: 'binary_sensor.motion', to: 'on' }]);
    expect(conditional.yaml).toContain('id: conditional_light_living_room_binary_sensor_motion_on');
  });

  it('drops suggestions under min_confidence', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));

    expect(assembler.minePatterns(sceneHistory()).map((p) => [p.type, p.confidence])).toEqual([['sequence', 0.3]]);
    expect(assembler.assemble(sceneHistory())).toEqual([]);
  });

  it('keeps low-confidence sequences when the floor allows it', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({ min_confidence: 0.2 }));
    const [scene] = assembler.assemble(sceneHistory());

    expect(scene.type).toBe('sequence');
    expect(scene.title).toBe('Create a scene with 3 devices');
    expect(scene.description).toBe(
      'This automation will create a scene that sets 3 devices to specific states. ' +
        'The scene starts with switch.a and includes switch.b, switch.c. ' +
        'This pattern was detected with 30% confidence.',
    );
    expect(scene.entities).toEqual(['switch.a', 'switch.b', 'switch.c']);
  });

  it('ranks by confidence and truncates to max_suggestions', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({ max_suggestions: 2 }));
    const ranked = assembler.rank(
      [daily('light.a', 0.9), daily('light.b', 0.5), daily('light.c', 0.95), daily('light.d', 0.9)].map((p) =>
        assembler.toSuggestion(p),
      ),
    );

    expect(ranked.map((s) => s.entities[0])).toEqual(['light.c', 'light.a']);
  });

  it('keeps discovery order for equal confidence', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));
    const ranked = assembler.rank(
      [daily('light.a', 0.8), daily('light.b', 0.8), daily('light.c', 0.8)].map((p) => assembler.toSuggestion(p)),
    );

    expect(ranked.map((s) => s.entities[0])).toEqual(['light.a', 'light.b', 'light.c']);
  });

  it('groups suggestions by category', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));
    const categorized = assembler.categorize(assembler.assemble(morningHistory()));

    expect(categorized.daily).toHaveLength(2);
    expect(categorized.conditional).toHaveLength(1);
    expect(categorized.sequence).toEqual([]);
    expect(categorized.periodic).toEqual([]);
  });

  it('filters suggestions touching one entity', () => {
    const assembler = new SuggestionAssembler(resolveDiscoveryConfig({}));
    const suggestions = assembler.assemble(morningHistory());

    expect(assembler.forEntity(suggestions, 'binary_sensor.motion').map((s) => s.id)).toEqual([
      'daily_binary_sensor_motion_0_7',
      'conditional_light_living_room_binary_sensor_motion_on',
    ]);
    expect(assembler.forEntity(suggestions, 'light.unknown')).toEqual([]);
  });

  it('logs miner counts at debug level', () => {
    const logger = mockLogger();
    new SuggestionAssembler(resolveDiscoveryConfig({}), { logger }).minePatterns(morningHistory());

    expect(logger.debug).toHaveBeenCalledWith('Mining finished', {
      daily: 2,
      sequence: 0,
      conditional: 1,
      periodic: 0,
    });
  });
});

// ---------- text helpers ----------

describe('formatConfidence', () => {
  it('rounds to a whole percentage', () => {
    expect(formatConfidence(0.857)).toBe('86%');
    expect(formatConfidence(1)).toBe('100%');
  });
});

describe('describePattern', () => {
  it('uses "Set … to" for states that are not on/off-like', () => {
    const pattern: PeriodicPattern = {
      type: 'periodic',
      entity_id: 'climate.living',
      domain: 'climate',
      state: 'heat',
      interval_hours: 6,
      confidence: 0.9,
      occurrences: 8,
    };

    expect(describePattern(pattern)).toEqual({
      title: 'Set climate.living to heat every 6 hours',
      description: 'This automation will set climate.living to heat every 6 hours. ' +
        'This pattern was detected with 90% confidence.',
    });
  });
});

describe('patternEntities', () => {
  it('lists sequence entities once each', () => {
    expect(
      patternEntities({
        type: 'sequence',
        steps: [
          { entity_id: 'switch.a', state: 'on', domain: 'switch' },
          { entity_id: 'switch.b', state: 'on', domain: 'switch' },
          { entity_id: 'switch.b', state: 'off', domain: 'switch' },
        ],
        confidence: 0.3,
        occurrences: 3,
      }),
    ).toEqual(['switch.a', 'switch.b']);
  });
});
