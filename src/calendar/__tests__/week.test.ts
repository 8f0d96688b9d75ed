import { describe, it, expect } from 'vitest';

import { navigateWeek, normalizeWeekStart, weekBounds } from '../week.js';

// Monday 15 January 2024, mid-afternoon
const MONDAY = new Date(2024, 0, 15, 15, 42, 7);
const SUNDAY = new Date(2024, 0, 14);

describe('normalizeWeekStart', () => {
  it('moves to Sunday 00:00 of the same week', () => {
    expect(normalizeWeekStart(MONDAY)).toEqual(SUNDAY);
  });

  it('keeps a Sunday on its own day', () => {
    expect(normalizeWeekStart(new Date(2024, 0, 14, 23, 59))).toEqual(SUNDAY);
  });

  it('moves a Saturday back six days', () => {
    expect(normalizeWeekStart(new Date(2024, 0, 20, 8, 0))).toEqual(SUNDAY);
  });

  it('is idempotent', () => {
    const once = normalizeWeekStart(MONDAY);

    expect(normalizeWeekStart(once)).toEqual(once);
  });
});

describe('navigateWeek', () => {
  it.each([
    ['prev', new Date(2024, 0, 7)],
    ['previous', new Date(2024, 0, 7)],
    ['next', new Date(2024, 0, 21)],
    ['sideways', SUNDAY],
    ['', SUNDAY],
  ])('%s', (direction, expected) => {
    expect(navigateWeek(MONDAY, direction)).toEqual(expected);
  });

  it('returns to the normalized week after next then prev', () => {
    expect(navigateWeek(navigateWeek(MONDAY, 'next'), 'prev')).toEqual(SUNDAY);
  });

  it('crosses a year boundary', () => {
    expect(navigateWeek(new Date(2024, 0, 2), 'prev')).toEqual(new Date(2023, 11, 24));
  });
});

describe('weekBounds', () => {
  it('returns the week with its neighbours', () => {
    expect(weekBounds(MONDAY)).toEqual({
      week: SUNDAY,
      prevWeek: new Date(2024, 0, 7),
      nextWeek: new Date(2024, 0, 21),
    });
  });
});
