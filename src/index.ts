import { UserService } from './account/user-service.js';
import { systemClock, type Clock } from './clock.js';
import { CalendarService } from './calendar/calendar-service.js';
import type { DatabaseClient } from './db/index.js';
import { HeatmapEngine } from './heatmap/heatmap-engine.js';
import { CustomProgrammeService } from './programme/custom-programme-service.js';
import { ProgrammePredictor } from './programme/programme-predictor.js';
import { FollowerRanker } from './ranking/follower-ranker.js';
import { StreamerService } from './streamer/streamer-service.js';
import type {
  ActivityStore,
  CustomProgrammeStore,
  FollowStore,
  HeatmapStore,
  StreamerStore,
  UserStore,
} from './repository/interfaces.js';
import { SqliteActivityRepository } from './repository/sqlite/activity-repository.js';
import { SqliteCustomProgrammeRepository } from './repository/sqlite/custom-programme-repository.js';
import { SqliteFollowRepository } from './repository/sqlite/follow-repository.js';
import { SqliteHeatmapRepository } from './repository/sqlite/heatmap-repository.js';
import { SqliteStreamerRepository } from './repository/sqlite/streamer-repository.js';
import { SqliteUserRepository } from './repository/sqlite/user-repository.js';

export interface ScheduleStores {
  activityStore: ActivityStore;
  heatmapStore: HeatmapStore;
  followStore: FollowStore;
  streamerStore: StreamerStore;
  customProgrammeStore: CustomProgrammeStore;
  userStore: UserStore;
}

export interface ScheduleCore {
  stores: ScheduleStores;
  users: UserService;
  streamers: StreamerService;
  heatmaps: HeatmapEngine;
  ranker: FollowerRanker;
  predictor: ProgrammePredictor;
  customProgrammes: CustomProgrammeService;
  calendar: CalendarService;
}

export interface ScheduleCoreOptions {
  clock?: Clock;
  /** Streamers enumerated before follower ranking */
  streamerListLimit?: number;
}

/**
 * Wire the scheduling services over any set of stores
 */
export const createScheduleCore = (stores: ScheduleStores, options: ScheduleCoreOptions = {}): ScheduleCore => {
  const clock = options.clock ?? systemClock;

  const heatmaps = new HeatmapEngine({
    activityStore: stores.activityStore,
    heatmapStore: stores.heatmapStore,
    clock
  });
  const ranker = new FollowerRanker({
    streamerStore: stores.streamerStore,
    followStore: stores.followStore,
    listLimit: options.streamerListLimit
  });
  const predictor = new ProgrammePredictor({
    heatmaps,
    ranker,
    userStore: stores.userStore,
    followStore: stores.followStore,
    streamerStore: stores.streamerStore,
    customProgrammeStore: stores.customProgrammeStore,
    clock
  });

  return {
    stores,
    users: new UserService({ userStore: stores.userStore, followStore: stores.followStore, clock }),
    streamers: new StreamerService({ streamerStore: stores.streamerStore, clock }),
    heatmaps,
    ranker,
    predictor,
    customProgrammes: new CustomProgrammeService({
      customProgrammeStore: stores.customProgrammeStore,
      streamerStore: stores.streamerStore,
      followStore: stores.followStore,
      clock
    }),
    calendar: new CalendarService({ predictor, followStore: stores.followStore })
  };
};

export const createSqliteStores = (db: DatabaseClient): ScheduleStores => ({
  activityStore: new SqliteActivityRepository(db),
  heatmapStore: new SqliteHeatmapRepository(db),
  followStore: new SqliteFollowRepository(db),
  streamerStore: new SqliteStreamerRepository(db),
  customProgrammeStore: new SqliteCustomProgrammeRepository(db),
  userStore: new SqliteUserRepository(db)
});

export { normalizeWeekStart, navigateWeek } from './calendar/week.js';
export { buildTimeSlotGrid } from './calendar/grid-builder.js';
export type { CalendarEntry, TimeSlotGrid } from './calendar/grid-builder.js';
export type { CalendarView, FollowedCalendarView, ProgrammeCalendarGrid } from './calendar/calendar-service.js';
export * from './domain/types.js';
export * from './errors.js';
export type { Clock } from './clock.js';
export type { NewStreamer } from './streamer/streamer-service.js';
export type { StoreCallOptions } from './repository/interfaces.js';
