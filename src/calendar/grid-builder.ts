/**
 * Calendar grid
 * Lays predicted slots out as [hour][dayOfWeek] cells for display
 */

import type { ProgrammeEntry, Streamer } from '../domain/types.js';
import { DAYS_PER_WEEK, HOURS_PER_DAY } from '../domain/types.js';

export interface CalendarEntry {
  streamerId: string;
  streamerName: string;
  probability: number;
  hour: number;
  dayOfWeek: number;
}

/** timeSlots[hour][dayOfWeek] */
export type TimeSlotGrid = CalendarEntry[][][];

const inRange = (value: number, size: number): boolean =>
  Number.isInteger(value) && value >= 0 && value < size;

export function emptyGrid(): TimeSlotGrid {
  return Array.from({ length: HOURS_PER_DAY }, () =>
    Array.from({ length: DAYS_PER_WEEK }, (): CalendarEntry[] => [])
  );
}

/**
 * Place entries into a 24×7 grid. Entries for streamers missing from the
 * map, or outside the grid, are dropped.
 */
export function buildTimeSlotGrid(
  entries: ProgrammeEntry[],
  streamerMap: ReadonlyMap<string, Streamer>
): TimeSlotGrid {
  const grid = emptyGrid();

  for (const entry of entries) {
    if (!inRange(entry.hour, HOURS_PER_DAY) || !inRange(entry.dayOfWeek, DAYS_PER_WEEK)) {
      continue;
    }

    const streamer = streamerMap.get(entry.streamerId);
    if (!streamer) {
      continue;
    }

    grid[entry.hour][entry.dayOfWeek].push({
      streamerId: entry.streamerId,
      streamerName: streamer.name,
      probability: entry.probability,
      hour: entry.hour,
      dayOfWeek: entry.dayOfWeek,
    });
  }

  return grid;
}

export const toStreamerMap = (streamers: Streamer[]): Map<string, Streamer> =>
  new Map(streamers.map(streamer => [streamer.id, streamer]));
