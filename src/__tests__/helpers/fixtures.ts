/**
 * Builders for streamers, users and activity samples
 */

import type { Clock } from '../../clock.js';
import type { ActivityRecord, Heatmap, Platform, Streamer, User } from '../../domain/types.js';
import { DAYS_PER_WEEK, HOURS_PER_DAY } from '../../domain/types.js';

/** Saturday 15 June 2024, 12:00 local time */
export const NOW = new Date(2024, 5, 15, 12, 0, 0);

export function fixedClock(instant: Date = NOW): Clock {
  return { now: () => new Date(instant.getTime()) };
}

/**
 * Local time `days` calendar days before `now`, at `hour`:00
 */
export function daysAgoAt(now: Date, days: number, hour: number): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() - days, hour, 0, 0);
}

export function makeStreamer(id: string, overrides: Partial<Streamer> = {}): Streamer {
  return {
    id,
    name: `Streamer ${id}`,
    handles: { twitch: id },
    platforms: ['twitch'],
    createdAt: new Date(2024, 0, 1),
    updatedAt: new Date(2024, 0, 1),
    ...overrides,
  };
}

export function makeUser(id: string): User {
  return {
    id,
    googleId: `google-${id}`,
    email: `${id}@example.com`,
    createdAt: new Date(2024, 0, 1),
    updatedAt: new Date(2024, 0, 1),
  };
}

let recordSequence = 0;

export function makeActivity(
  streamerId: string,
  startTime: Date,
  endTime: Date = startTime,
  platform: Platform | null = 'twitch'
): ActivityRecord {
  recordSequence += 1;
  return {
    id: `activity-${recordSequence}`,
    streamerId,
    startTime,
    endTime,
    platform,
    createdAt: startTime,
  };
}

/**
 * Heatmap with every bin 0 except the ones given
 */
export function makeHeatmap(
  streamerId: string,
  hours: Record<number, number>,
  days: Record<number, number>
): Heatmap {
  return {
    streamerId,
    hours: Array.from({ length: HOURS_PER_DAY }, (_, hour) => hours[hour] ?? 0),
    daysOfWeek: Array.from({ length: DAYS_PER_WEEK }, (_, day) => days[day] ?? 0),
    dataPoints: 10,
    generatedAt: NOW,
  };
}

/**
 * One session per week for `weeks` weeks, `daysBefore` days before each
 * Saturday relative to NOW (0 = Saturday, 1 = Friday, ...), at `hour`:00
 */
export function weeklySessions(
  streamerId: string,
  hour: number,
  weeks: number,
  daysBefore = 0,
  now: Date = NOW
): ActivityRecord[] {
  return Array.from({ length: weeks }, (_, week) =>
    makeActivity(streamerId, daysAgoAt(now, 7 * (week + 1) + daysBefore, hour))
  );
}

/**
 * Await a promise expected to reject and hand back the error for inspection
 */
export async function captureError(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw new Error(`rejected with a non-Error value: ${String(error)}`);
  }
  throw new Error('expected promise to reject');
}
