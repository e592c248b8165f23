import { describe, it, expect } from 'vitest';

import { CONSECUTIVE_DAYS, historyOf, repeatOn, row } from '../testing/fixtures.ts';
import { analyzeUsage } from './usage-analyzer.ts';

const options = {
  min_occurrences: 3,
  confidence_threshold: 0.7,
  max_suggestions: 5,
  usage_window_seconds: 60,
};

describe('analyzeUsage', () => {
  it('finds an hour of day an entity is usually switched in', () => {
    const histories = historyOf(repeatOn(CONSECUTIVE_DAYS, [['light.porch', 'on', '19:10:00']]));

    expect(analyzeUsage(histories, options)).toEqual([
      {
        type: 'time',
        entity_id: 'light.porch',
        trigger_time: '19:00',
        action_state: 'on',
        confidence: 1,
        occurrences: 3,
      },
    ]);
  });

  it('finds a sensor that triggers a light within a minute', () => {
    const histories = historyOf([
      row('binary_sensor.door', 'on', '2024-01-01T08:00:00Z'),
      row('light.hall', 'on', '2024-01-01T08:00:20Z'),
      row('binary_sensor.door', 'on', '2024-01-02T13:00:00Z'),
      row('light.hall', 'on', '2024-01-02T13:00:20Z'),
      row('binary_sensor.door', 'on', '2024-01-03T21:00:00Z'),
      row('light.hall', 'on', '2024-01-03T21:00:20Z'),
    ]);

    expect(analyzeUsage(histories, options)).toEqual([
      {
        type: 'state',
        entity_id: 'light.hall',
        trigger_entity: 'binary_sensor.door',
        trigger_state: 'on',
        action_state: 'on',
        confidence: 1,
        occurrences: 3,
      },
    ]);
  });

  it('ignores changes outside the usage window', () => {
    const histories = historyOf([
      row('binary_sensor.door', 'on', '2024-01-01T08:00:00Z'),
      row('light.hall', 'on', '2024-01-01T08:01:01Z'),
      row('binary_sensor.door', 'on', '2024-01-02T13:00:00Z'),
      row('light.hall', 'on', '2024-01-02T13:01:01Z'),
      row('binary_sensor.door', 'on', '2024-01-03T21:00:00Z'),
      row('light.hall', 'on', '2024-01-03T21:01:01Z'),
    ]);
    expect(analyzeUsage(histories, options)).toEqual([]);
  });

  it('sorts by confidence and keeps at most max_suggestions', () => {
    const histories = historyOf([
      ...repeatOn(CONSECUTIVE_DAYS, [['light.porch', 'on', '19:10:00']]),
      row('switch.heater', 'on', '2024-01-01T06:00:00Z'),
      row('switch.heater', 'on', '2024-01-02T06:00:00Z'),
      row('switch.heater', 'on', '2024-01-03T06:00:00Z'),
      row('switch.heater', 'off', '2024-01-04T06:00:00Z'),
    ]);

    const patterns = analyzeUsage(histories, options);
    expect(patterns.map((p) => [p.entity_id, p.confidence])).toEqual([
      ['light.porch', 1],
      ['switch.heater', 0.75],
    ]);
    expect(analyzeUsage(histories, { ...options, max_suggestions: 1 })).toHaveLength(1);
  });
});
