/**
 * Programme Predictor
 * Builds predicted weekly schedules from streamer heatmaps for the
 * followed, custom and global (most-followed) contexts
 */

import { systemClock, type Clock } from '../clock.js';
import type {
  CustomProgramme,
  PredictedTime,
  ProgrammeCalendarView,
  ProgrammeEntry,
  Streamer,
  TVProgramme,
} from '../domain/types.js';
import { DAYS_PER_WEEK } from '../domain/types.js';
import { InvalidInputError, NotFoundError, requireId } from '../errors.js';
import type { HeatmapSource } from '../heatmap/heatmap-engine.js';
import { logger } from '../logger.js';
import type { FollowerRanker } from '../ranking/follower-ranker.js';
import { DEFAULT_RANKING_LIMIT } from '../ranking/follower-ranker.js';
import type {
  CustomProgrammeStore,
  FollowStore,
  StoreCallOptions,
  StreamerStore,
  UserStore,
} from '../repository/interfaces.js';
import { callStore, isCancelled } from '../repository/store-call.js';
import { normalizeWeekStart } from '../calendar/week.js';
import { generateSlots, mostLikelyHour } from './slots.js';

export interface ProgrammePredictorDeps {
  heatmaps: HeatmapSource;
  ranker: FollowerRanker;
  userStore: UserStore;
  followStore: FollowStore;
  streamerStore: StreamerStore;
  customProgrammeStore: CustomProgrammeStore;
  clock?: Clock;
}

export class ProgrammePredictor {
  private readonly heatmaps: HeatmapSource;
  private readonly ranker: FollowerRanker;
  private readonly userStore: UserStore;
  private readonly followStore: FollowStore;
  private readonly streamerStore: StreamerStore;
  private readonly customProgrammeStore: CustomProgrammeStore;
  private readonly clock: Clock;

  constructor(deps: ProgrammePredictorDeps) {
    this.heatmaps = deps.heatmaps;
    this.ranker = deps.ranker;
    this.userStore = deps.userStore;
    this.followStore = deps.followStore;
    this.streamerStore = deps.streamerStore;
    this.customProgrammeStore = deps.customProgrammeStore;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Predicted week for everyone a user follows
   *
   * @throws InvalidInputError when userId is empty
   * @throws NotFoundError when the user does not exist
   */
  async generateProgramme(userId: string, week: Date, options?: StoreCallOptions): Promise<TVProgramme> {
    requireId(userId, 'user ID');

    const user = await callStore('get user', options, () => this.userStore.getById(userId, options));
    if (!user) {
      throw new NotFoundError('user', userId);
    }

    const streamers = await callStore('list followed streamers', options, () =>
      this.followStore.listFollowedStreamers(userId, options)
    );

    const entries = await this.collectEntries(streamers.map(s => s.id), options);

    logger.debug(
      { userId, followedStreamers: streamers.length, entries: entries.length },
      'generated followed programme'
    );

    return {
      userId,
      week: normalizeWeekStart(week),
      entries,
      generatedAt: this.clock.now(),
    };
  }

  /**
   * Most likely hour for a streamer to be live on one day of the week.
   * Unlike the batch variants, heatmap errors propagate.
   *
   * @param dayOfWeek - 0 (Sunday) to 6 (Saturday)
   */
  async getPredictedLiveTime(
    streamerId: string,
    dayOfWeek: number,
    options?: StoreCallOptions
  ): Promise<PredictedTime> {
    requireId(streamerId, 'streamer ID');
    if (!Number.isInteger(dayOfWeek) || dayOfWeek < 0 || dayOfWeek >= DAYS_PER_WEEK) {
      throw new InvalidInputError('day of week must be between 0 and 6');
    }

    const heatmap = await this.heatmaps.generateHeatmap(streamerId, options);
    return mostLikelyHour(heatmap, dayOfWeek);
  }

  /**
   * Calendar restricted to exactly the programme's streamers, each once.
   * Streamers that no longer exist are left out; streamers without
   * history are listed but contribute no entries.
   */
  async generateCalendarFromProgramme(
    programme: CustomProgramme,
    week: Date,
    options?: StoreCallOptions
  ): Promise<ProgrammeCalendarView> {
    const streamers: Streamer[] = [];
    const entries: ProgrammeEntry[] = [];

    for (const streamerId of new Set(programme.streamerIds)) {
      let streamer: Streamer | null;
      try {
        streamer = await callStore('get streamer', options, () =>
          this.streamerStore.getById(streamerId, options)
        );
      } catch (error) {
        if (isCancelled(options)) {
          throw error;
        }
        logger.debug({ err: error, streamerId }, 'skipping unresolvable programme streamer');
        continue;
      }

      if (!streamer) {
        logger.debug({ streamerId, programmeId: programme.id }, 'programme streamer no longer exists');
        continue;
      }

      streamers.push(streamer);
      entries.push(...(await this.entriesFor(streamerId, options)));
    }

    return {
      week: normalizeWeekStart(week),
      streamers,
      entries,
      isCustom: true,
      isGuestSession: programme.userId === '',
      generatedAt: this.clock.now(),
    };
  }

  /**
   * Calendar of the most-followed streamers
   *
   * @param limit - How many streamers to include; 0 or less means 10
   */
  async generateGlobalProgramme(
    week: Date,
    limit: number,
    options?: StoreCallOptions
  ): Promise<ProgrammeCalendarView> {
    const ranked = await this.ranker.getStreamersRankedByFollowers(limit, options);
    const streamers = ranked.map(r => r.streamer);
    const entries = await this.collectEntries(streamers.map(s => s.id), options);

    logger.debug(
      { limit, streamers: streamers.length, entries: entries.length },
      'generated global programme'
    );

    return {
      week: normalizeWeekStart(week),
      streamers,
      entries,
      isCustom: false,
      isGuestSession: false,
      generatedAt: this.clock.now(),
    };
  }

  /**
   * The custom calendar when the user has a non-empty custom programme,
   * otherwise the global one
   */
  async getProgrammeView(
    userId: string,
    week: Date,
    options?: StoreCallOptions
  ): Promise<ProgrammeCalendarView> {
    if (userId !== '') {
      let programme: CustomProgramme | null = null;
      try {
        programme = await callStore('get custom programme', options, () =>
          this.customProgrammeStore.getByUserId(userId, options)
        );
      } catch (error) {
        if (isCancelled(options)) {
          throw error;
        }
        logger.warn({ err: error, userId }, 'custom programme lookup failed, showing global programme');
      }

      if (programme && programme.streamerIds.length > 0) {
        return this.generateCalendarFromProgramme(programme, week, options);
      }
    }

    return this.generateGlobalProgramme(week, DEFAULT_RANKING_LIMIT, options);
  }

  private async collectEntries(streamerIds: string[], options?: StoreCallOptions): Promise<ProgrammeEntry[]> {
    const entries: ProgrammeEntry[] = [];
    for (const streamerId of streamerIds) {
      entries.push(...(await this.entriesFor(streamerId, options)));
    }
    return entries;
  }

  /**
   * Slots for one streamer; a streamer whose heatmap cannot be produced
   * contributes nothing instead of failing the whole programme
   */
  private async entriesFor(streamerId: string, options?: StoreCallOptions): Promise<ProgrammeEntry[]> {
    try {
      const heatmap = await this.heatmaps.generateHeatmap(streamerId, options);
      return generateSlots(heatmap);
    } catch (error) {
      if (isCancelled(options)) {
        throw error;
      }
      logger.debug({ err: error, streamerId }, 'skipping streamer without heatmap');
      return [];
    }
  }
}
