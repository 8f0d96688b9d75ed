import { describe, it, expect } from 'vitest';

import {
  countByDay,
  countByHour,
  dayDistribution,
  hourDistribution,
  lookbackStart,
  mostActiveBin,
  partitionByRecency,
  recentWindowStart,
  weightedDistribution,
} from '../probability.js';
import { NOW, daysAgoAt, makeActivity } from '../../__tests__/helpers/fixtures.js';

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

describe('window boundaries', () => {
  it('looks back 365 days and treats the last 90 as recent', () => {
    expect(lookbackStart(NOW)).toEqual(new Date(2023, 5, 16, 12, 0, 0));
    expect(recentWindowStart(NOW)).toEqual(new Date(2024, 2, 17, 12, 0, 0));
  });
});

describe('partitionByRecency', () => {
  it('splits records at the recent window', () => {
    const recent = makeActivity('s1', daysAgoAt(NOW, 10, 20));
    const older = makeActivity('s1', daysAgoAt(NOW, 120, 20));

    const partition = partitionByRecency([recent, older], NOW);

    expect(partition.recent).toEqual([recent]);
    expect(partition.older).toEqual([older]);
  });

  it('counts a record exactly on the boundary as older', () => {
    const boundary = makeActivity('s1', recentWindowStart(NOW));

    const partition = partitionByRecency([boundary], NOW);

    expect(partition.recent).toHaveLength(0);
    expect(partition.older).toEqual([boundary]);
  });
});

describe('weightedDistribution', () => {
  it('blends recent and older frequencies 0.8 / 0.2', () => {
    const result = weightedDistribution([2, 2, 0], [0, 1, 3]);

    expect(result[0]).toBeCloseTo(0.4);
    expect(result[1]).toBeCloseTo(0.4 + 0.05);
    expect(result[2]).toBeCloseTo(0.15);
    expect(sum(result)).toBeCloseTo(1);
  });

  it('leaves total mass at 0.8 when there is no older data', () => {
    const result = weightedDistribution([1, 3], [0, 0]);

    expect(result[0]).toBeCloseTo(0.2);
    expect(result[1]).toBeCloseTo(0.6);
    expect(sum(result)).toBeCloseTo(0.8);
  });

  it('leaves total mass at 0.2 when there is no recent data', () => {
    const result = weightedDistribution([0, 0], [1, 1]);

    expect(result).toEqual([0.1, 0.1]);
  });

  it('returns all zeros for empty counts', () => {
    expect(weightedDistribution([0, 0, 0], [0, 0, 0])).toEqual([0, 0, 0]);
  });
});

describe('hour and day distributions', () => {
  it('weights a recent evening habit over an older late-night one', () => {
    const recent = Array.from({ length: 10 }, (_, i) => makeActivity('s1', daysAgoAt(NOW, 7 * (i + 1), 10)));
    const older = Array.from({ length: 10 }, () => makeActivity('s1', daysAgoAt(NOW, 154, 22)));
    const partition = partitionByRecency([...recent, ...older], NOW);

    const hours = hourDistribution(partition);
    const days = dayDistribution(partition);

    expect(hours).toHaveLength(24);
    expect(hours[10]).toBeCloseTo(0.8);
    expect(hours[22]).toBeCloseTo(0.2);
    expect(hours.filter((_, hour) => hour !== 10 && hour !== 22).every(p => p === 0)).toBe(true);

    // Both groups fall on Saturdays
    expect(days).toHaveLength(7);
    expect(days[6]).toBeCloseTo(1);
    expect(sum(days)).toBeCloseTo(1);
  });

  it('keeps every bin within [0, 1]', () => {
    const records = [
      makeActivity('s1', daysAgoAt(NOW, 3, 8)),
      makeActivity('s1', daysAgoAt(NOW, 4, 9)),
      makeActivity('s1', daysAgoAt(NOW, 200, 23)),
      makeActivity('s1', daysAgoAt(NOW, 300, 0)),
    ];
    const partition = partitionByRecency(records, NOW);

    for (const p of [...hourDistribution(partition), ...dayDistribution(partition)]) {
      expect(p).toBeGreaterThanOrEqual(0);
      expect(p).toBeLessThanOrEqual(1);
    }
  });
});

describe('counts and mostActiveBin', () => {
  it('bins by local hour and weekday', () => {
    // Friday 14 June 2024 and Thursday 13 June 2024
    const records = [
      makeActivity('s1', new Date(2024, 5, 14, 19, 30)),
      makeActivity('s1', new Date(2024, 5, 14, 19, 5)),
      makeActivity('s1', new Date(2024, 5, 13, 7, 0)),
    ];

    expect(countByHour(records)[19]).toBe(2);
    expect(countByHour(records)[7]).toBe(1);
    expect(countByDay(records)).toEqual([0, 0, 0, 0, 1, 2, 0]);
  });

  it('picks the lowest index on ties', () => {
    expect(mostActiveBin([0, 3, 3, 1])).toBe(1);
  });

  it('returns 0 when every bin is empty', () => {
    expect(mostActiveBin([0, 0, 0])).toBe(0);
  });
});
