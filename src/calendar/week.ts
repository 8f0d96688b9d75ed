import { addDays, startOfWeek } from 'date-fns';

export const WEEK_DIRECTIONS = ['prev', 'previous', 'next'] as const;

/**
 * Sunday 00:00:00 local time on or before `t`
 */
export const normalizeWeekStart = (t: Date): Date => startOfWeek(t, { weekStartsOn: 0 });

/**
 * Step one week from the normalized `week`.
 * Unrecognised directions return the normalized week itself.
 */
export function navigateWeek(week: Date, direction: string): Date {
  const weekStart = normalizeWeekStart(week);

  switch (direction) {
    case 'prev':
    case 'previous':
      return addDays(weekStart, -7);
    case 'next':
      return addDays(weekStart, 7);
    default:
      return weekStart;
  }
}

export interface WeekBounds {
  week: Date;
  prevWeek: Date;
  nextWeek: Date;
}

export function weekBounds(week: Date): WeekBounds {
  return {
    week: normalizeWeekStart(week),
    prevWeek: navigateWeek(week, 'prev'),
    nextWeek: navigateWeek(week, 'next'),
  };
}
