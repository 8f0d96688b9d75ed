/**
 * Weighted activity distributions
 * Pure functions behind heatmap generation and activity statistics
 */

import { subDays } from 'date-fns';

import type { ActivityRecord } from '../domain/types.js';
import { DAYS_PER_WEEK, HOURS_PER_DAY } from '../domain/types.js';

/** Total history read for a heatmap */
export const LOOKBACK_DAYS = 365;

/** Records newer than this count as recent */
export const RECENT_WINDOW_DAYS = 90;

export const RECENT_WEIGHT = 0.8;
export const OLDER_WEIGHT = 0.2;

export interface RecencyPartition {
  recent: ActivityRecord[];
  older: ActivityRecord[];
}

export const lookbackStart = (now: Date): Date => subDays(now, LOOKBACK_DAYS);

export const recentWindowStart = (now: Date): Date => subDays(now, RECENT_WINDOW_DAYS);

/**
 * Split records at the recent-window boundary.
 * A record exactly on the boundary is older.
 */
export function partitionByRecency(records: ActivityRecord[], now: Date): RecencyPartition {
  const cutoff = recentWindowStart(now).getTime();
  const recent: ActivityRecord[] = [];
  const older: ActivityRecord[] = [];

  for (const record of records) {
    if (record.startTime.getTime() > cutoff) {
      recent.push(record);
    } else {
      older.push(record);
    }
  }

  return { recent, older };
}

/**
 * Count records per bin using the bin index chosen by `binOf`
 */
export function countBins(
  records: ActivityRecord[],
  binCount: number,
  binOf: (startTime: Date) => number
): number[] {
  const counts = new Array<number>(binCount).fill(0);
  for (const record of records) {
    counts[binOf(record.startTime)] += 1;
  }
  return counts;
}

/**
 * Blend the recent and older frequency distributions 0.8 / 0.2.
 *
 * An empty window contributes nothing, so a streamer with only recent data
 * ends up with total mass 0.8 rather than 1.0. Callers rely on this.
 */
export function weightedDistribution(recentCounts: number[], olderCounts: number[]): number[] {
  const recentTotal = recentCounts.reduce((sum, count) => sum + count, 0);
  const olderTotal = olderCounts.reduce((sum, count) => sum + count, 0);

  return recentCounts.map((recentCount, bin) => {
    let probability = 0;
    if (recentTotal > 0) {
      probability += (recentCount / recentTotal) * RECENT_WEIGHT;
    }
    if (olderTotal > 0) {
      probability += (olderCounts[bin] / olderTotal) * OLDER_WEIGHT;
    }
    return probability;
  });
}

const hourOf = (startTime: Date): number => startTime.getHours();
const dayOf = (startTime: Date): number => startTime.getDay();

export function hourDistribution({ recent, older }: RecencyPartition): number[] {
  return weightedDistribution(
    countBins(recent, HOURS_PER_DAY, hourOf),
    countBins(older, HOURS_PER_DAY, hourOf)
  );
}

export function dayDistribution({ recent, older }: RecencyPartition): number[] {
  return weightedDistribution(
    countBins(recent, DAYS_PER_WEEK, dayOf),
    countBins(older, DAYS_PER_WEEK, dayOf)
  );
}

export const countByHour = (records: ActivityRecord[]): number[] =>
  countBins(records, HOURS_PER_DAY, hourOf);

export const countByDay = (records: ActivityRecord[]): number[] =>
  countBins(records, DAYS_PER_WEEK, dayOf);

/**
 * Index of the strict maximum; the lowest index wins ties
 */
export function mostActiveBin(counts: number[]): number {
  let best = 0;
  let bestCount = 0;
  counts.forEach((count, bin) => {
    if (count > bestCount) {
      bestCount = count;
      best = bin;
    }
  });
  return best;
}
