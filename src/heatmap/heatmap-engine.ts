/**
 * Heatmap Engine
 * Turns a streamer's activity history into hour and day-of-week probabilities
 */

import { v4 as uuidv4 } from 'uuid';

import { systemClock, type Clock } from '../clock.js';
import type {
  ActivityRecord,
  ActivityStats,
  Heatmap,
  Platform,
} from '../domain/types.js';
import { InsufficientDataError, requireId } from '../errors.js';
import { logger } from '../logger.js';
import type { ActivityStore, HeatmapStore, StoreCallOptions } from '../repository/interfaces.js';
import { callStore } from '../repository/store-call.js';
import {
  countByDay,
  countByHour,
  dayDistribution,
  hourDistribution,
  lookbackStart,
  mostActiveBin,
  partitionByRecency,
} from './probability.js';

export interface HeatmapEngineDeps {
  activityStore: ActivityStore;
  heatmapStore: HeatmapStore;
  clock?: Clock;
}

/**
 * Anything that can produce a heatmap on demand.
 * The programme predictor depends on this rather than on the engine class.
 */
export interface HeatmapSource {
  generateHeatmap(streamerId: string, options?: StoreCallOptions): Promise<Heatmap>;
}

export class HeatmapEngine implements HeatmapSource {
  private readonly activityStore: ActivityStore;
  private readonly heatmapStore: HeatmapStore;
  private readonly clock: Clock;

  constructor(deps: HeatmapEngineDeps) {
    this.activityStore = deps.activityStore;
    this.heatmapStore = deps.heatmapStore;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Recompute and persist the heatmap for a streamer.
   *
   * Reads the full year of history every time (no incremental update).
   * Concurrent calls for the same streamer race on the upsert; the result
   * is a pure function of stored activity so either writer is correct.
   *
   * @throws InvalidInputError when streamerId is empty
   * @throws InsufficientDataError when there is no activity in the last year
   * @throws StoreFailureError when a repository call fails or is cancelled
   */
  async generateHeatmap(streamerId: string, options?: StoreCallOptions): Promise<Heatmap> {
    requireId(streamerId, 'streamer ID');

    const now = this.clock.now();
    const records = await this.readHistory(streamerId, now, options);

    if (records.length === 0) {
      logger.debug({ streamerId }, 'no activity history, heatmap not generated');
      throw new InsufficientDataError(streamerId);
    }

    const partition = partitionByRecency(records, now);
    const heatmap: Heatmap = {
      streamerId,
      hours: hourDistribution(partition),
      daysOfWeek: dayDistribution(partition),
      dataPoints: records.length,
      generatedAt: now,
    };

    const existing = await callStore('get heatmap', options, () =>
      this.heatmapStore.getByStreamerId(streamerId, options)
    );

    if (existing) {
      await callStore('update heatmap', options, () => this.heatmapStore.update(heatmap, options));
    } else {
      await callStore('create heatmap', options, () => this.heatmapStore.create(heatmap, options));
    }

    logger.debug(
      {
        streamerId,
        dataPoints: heatmap.dataPoints,
        recentRecords: partition.recent.length,
        olderRecords: partition.older.length,
        replaced: existing !== null,
      },
      'heatmap generated'
    );

    return heatmap;
  }

  /**
   * Session statistics over the last year. A streamer with no history gets zeros.
   */
  async getActivityStats(streamerId: string, options?: StoreCallOptions): Promise<ActivityStats> {
    requireId(streamerId, 'streamer ID');

    const records = await this.readHistory(streamerId, this.clock.now(), options);

    if (records.length === 0) {
      return {
        streamerId,
        totalSessions: 0,
        averageSessionDurationMs: 0,
        lastActive: null,
        mostActiveHour: 0,
        mostActiveDay: 0,
      };
    }

    let totalDurationMs = 0;
    let lastActive = records[0].startTime;
    for (const record of records) {
      totalDurationMs += record.endTime.getTime() - record.startTime.getTime();
      if (record.startTime > lastActive) {
        lastActive = record.startTime;
      }
    }

    return {
      streamerId,
      totalSessions: records.length,
      averageSessionDurationMs: totalDurationMs / records.length,
      lastActive,
      mostActiveHour: mostActiveBin(countByHour(records)),
      mostActiveDay: mostActiveBin(countByDay(records)),
    };
  }

  /**
   * Append a point-in-time live sample (start and end are the same instant)
   */
  async recordActivity(
    streamerId: string,
    timestamp: Date,
    platform: Platform | null = null,
    options?: StoreCallOptions
  ): Promise<ActivityRecord> {
    requireId(streamerId, 'streamer ID');

    const record: ActivityRecord = {
      id: uuidv4(),
      streamerId,
      startTime: timestamp,
      endTime: timestamp,
      platform,
      createdAt: this.clock.now(),
    };

    await callStore('record activity', options, () => this.activityStore.create(record, options));

    logger.debug({ streamerId, platform, timestamp: timestamp.toISOString() }, 'activity recorded');

    return record;
  }

  private readHistory(streamerId: string, now: Date, options?: StoreCallOptions): Promise<ActivityRecord[]> {
    const since = lookbackStart(now);
    return callStore('read activity records', options, () =>
      this.activityStore.listByStreamerSince(streamerId, since, options)
    );
  }
}
