import { describe, it, expect } from 'vitest';

import { CONSECUTIVE_DAYS, MONDAYS, historyOf, row } from '../testing/fixtures.ts';
import { mineDailyPatterns } from './daily-pattern-miner.ts';

const options = { min_occurrences: 3, confidence_threshold: 0.7 };

describe('mineDailyPatterns', () => {
  it('finds a light turned on at the same weekday and hour', () => {
    const histories = historyOf([
      row('light.living_room', 'on', `${MONDAYS[0]}T07:02:00Z`),
      row('light.living_room', 'on', `${MONDAYS[1]}T07:05:00Z`),
      row('light.living_room', 'on', `${MONDAYS[2]}T07:01:00Z`),
    ]);

    expect(mineDailyPatterns(histories, options)).toEqual([
      {
        type: 'daily',
        entity_id: 'light.living_room',
        domain: 'light',
        day_of_week: 0,
        hour: 7,
        state: 'on',
        confidence: 1,
        occurrences: 3,
      },
    ]);
  });

  it('does not merge different weekdays', () => {
    const histories = historyOf(
      CONSECUTIVE_DAYS.map((date) => row('light.living_room', 'on', `${date}T07:00:00Z`)),
    );
    expect(mineDailyPatterns(histories, options)).toEqual([]);
  });

  it('reports the majority state and its count', () => {
    const dates = [...MONDAYS, '2024-01-22'];
    const states = ['on', 'on', 'off', 'on'];
    const histories = historyOf(dates.map((date, i) => row('light.hall', states[i], `${date}T19:00:00Z`)));

    const [pattern] = mineDailyPatterns(histories, options);
    expect(pattern.state).toBe('on');
    expect(pattern.confidence).toBe(0.75);
    expect(pattern.occurrences).toBe(3);
  });

  it('suppresses buckets under the confidence threshold', () => {
    const dates = [...MONDAYS, '2024-01-22', '2024-01-29'];
    const states = ['on', 'off', 'on', 'off', 'on'];
    const histories = historyOf(dates.map((date, i) => row('light.hall', states[i], `${date}T19:00:00Z`)));

    // 3 of 5 = 0.6
    expect(mineDailyPatterns(histories, options)).toEqual([]);
  });

  it('gives a tie to the state seen first', () => {
    const dates = [...MONDAYS, '2024-01-22'];
    const states = ['off', 'on', 'on', 'off'];
    const histories = historyOf(dates.map((date, i) => row('light.hall', states[i], `${date}T19:00:00Z`)));

    const patterns = mineDailyPatterns(histories, { min_occurrences: 3, confidence_threshold: 0.5 });
    expect(patterns.map((p) => [p.state, p.confidence])).toEqual([['off', 0.5]]);
  });

  it('ignores entities with fewer events than min_occurrences', () => {
    const histories = historyOf(MONDAYS.slice(0, 2).map((date) => row('light.hall', 'on', `${date}T07:00:00Z`)));
    expect(mineDailyPatterns(histories, options)).toEqual([]);
  });

  it('buckets by the wall clock the timestamp was written in', () => {
    const histories = historyOf(MONDAYS.map((date) => row('light.hall', 'on', `${date}T07:00:00+02:00`)));

    const [pattern] = mineDailyPatterns(histories, options);
    expect(pattern.day_of_week).toBe(0);
    expect(pattern.hour).toBe(7);
  });
});
