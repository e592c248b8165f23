import { describe, it, expect } from 'vitest';

import { describeActions, describeTrigger, describeTriggers } from './automation-describer.ts';

describe('describeTrigger', () => {
  it('describes state triggers', () => {
    expect(describeTrigger({ platform: 'state', entity_id: 'binary_sensor.door', to: 'on' })).toBe(
      "When binary_sensor.door changes to 'on'",
    );
    expect(describeTrigger({ platform: 'state', entity_id: 'binary_sensor.door', from: 'off', to: 'on' })).toBe(
      "When binary_sensor.door changes from 'off' to 'on'",
    );
    expect(describeTrigger({ platform: 'state', entity_id: 'binary_sensor.door' })).toBe(
      'When binary_sensor.door changes state',
    );
  });

  it('describes time triggers with weekdays', () => {
    expect(describeTrigger({ platform: 'time', at: '07:00:00', weekday: [1, 5] })).toBe(
      'At 07:00:00 on Monday, Friday',
    );
    expect(describeTrigger({ platform: 'time', at: '19:00:00' })).toBe('At 19:00:00');
  });

  it('describes time patterns and numeric thresholds', () => {
    expect(describeTrigger({ platform: 'time_pattern', hours: '/6' })).toBe('On time pattern hours /6');
    expect(describeTrigger({ platform: 'numeric_state', entity_id: 'sensor.temp', above: 25 })).toBe(
      'When sensor.temp goes above 25',
    );
    expect(describeTrigger({ platform: 'numeric_state', entity_id: 'sensor.temp', above: 18, below: 25 })).toBe(
      'When sensor.temp is between 18 and 25',
    );
  });

  it('flags a device trigger that has no device yet', () => {
    expect(
      describeTrigger({ platform: 'device', domain: 'mqtt', device_id: '', type: 'button_short_press' }),
    ).toBe('When mqtt device (not yet chosen) reports button_short_press');
  });
});

describe('describeTriggers', () => {
  it('handles empty, single and multiple lists', () => {
    expect(describeTriggers([])).toBe('No triggers defined');
    expect(describeTriggers([{ platform: 'webhook', webhook_id: 'door' }])).toBe('When webhook door is called');
    expect(
      describeTriggers([
        { platform: 'webhook', webhook_id: 'door' },
        { platform: 'time', at: '07:00' },
      ]),
    ).toBe('Multiple triggers: When webhook door is called, At 07:00');
  });
});

describe('describeActions', () => {
  it('lists service, targets and data', () => {
    expect(
      describeActions([
        { service: 'light.turn_on', target: { entity_id: ['light.a', 'light.b'] } },
        { service: 'climate.set_hvac_mode', target: { entity_id: 'climate.living' }, data: { hvac_mode: 'heat' } },
        { service: 'homeassistant.reload_all' },
      ]),
    ).toEqual([
      'light.turn_on → light.a, light.b',
      'climate.set_hvac_mode → climate.living (hvac_mode=heat)',
      'homeassistant.reload_all',
    ]);
  });
});
