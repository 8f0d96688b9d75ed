/**
 * Domain Types
 * Streamers, activity history and the predictions derived from it
 */

export const PLATFORMS = ['youtube', 'twitch', 'kick'] as const;
export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some(platform => platform === value);
}

export const HOURS_PER_DAY = 24;
export const DAYS_PER_WEEK = 7;

export interface Streamer {
  id: string;
  name: string;
  /** Channel handle per platform the streamer broadcasts on */
  handles: Partial<Record<Platform, string>>;
  platforms: Platform[];
  createdAt: Date;
  updatedAt: Date;
}

export interface User {
  id: string;
  googleId: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * One observed live interval. A point-in-time sample has startTime === endTime.
 */
export interface ActivityRecord {
  id: string;
  streamerId: string;
  startTime: Date;
  endTime: Date;
  platform: Platform | null;
  createdAt: Date;
}

/**
 * Independent hour-of-day and day-of-week marginals for one streamer
 */
export interface Heatmap {
  streamerId: string;
  /** Index 0-23, local hour */
  hours: number[];
  /** Index 0-6, Sunday = 0 */
  daysOfWeek: number[];
  /** Activity records the marginals were computed from */
  dataPoints: number;
  generatedAt: Date;
}

export interface ActivityStats {
  streamerId: string;
  totalSessions: number;
  averageSessionDurationMs: number;
  lastActive: Date | null;
  mostActiveHour: number;
  mostActiveDay: number;
}

export interface ProgrammeEntry {
  streamerId: string;
  dayOfWeek: number;
  hour: number;
  probability: number;
}

export interface PredictedTime {
  dayOfWeek: number;
  hour: number;
  probability: number;
}

/**
 * Predicted week for a user's followed streamers
 */
export interface TVProgramme {
  userId: string;
  /** Sunday 00:00 local */
  week: Date;
  entries: ProgrammeEntry[];
  generatedAt: Date;
}

/**
 * Ordered allow-list of streamers a user (or guest, userId '') wants to see
 */
export interface CustomProgramme {
  id: string;
  userId: string;
  streamerIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ProgrammeCalendarView {
  week: Date;
  streamers: Streamer[];
  entries: ProgrammeEntry[];
  isCustom: boolean;
  isGuestSession: boolean;
  generatedAt: Date;
}

export interface StreamerWithFollowers {
  streamer: Streamer;
  followerCount: number;
}
