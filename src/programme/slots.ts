/**
 * Programme slot rule
 * Combines the day and hour marginals of a heatmap into predicted slots
 */

import type { Heatmap, PredictedTime, ProgrammeEntry } from '../domain/types.js';
import { DAYS_PER_WEEK, HOURS_PER_DAY } from '../domain/types.js';

/** A day must exceed this to produce any slots */
export const DAY_PROBABILITY_THRESHOLD = 0.1;

/** A day×hour product must exceed this to become a slot */
export const SLOT_PROBABILITY_THRESHOLD = 0.05;

/**
 * Every (day, hour) slot whose combined probability clears both thresholds,
 * day-major then hour order
 */
export function generateSlots(heatmap: Heatmap): ProgrammeEntry[] {
  const entries: ProgrammeEntry[] = [];

  for (let dayOfWeek = 0; dayOfWeek < DAYS_PER_WEEK; dayOfWeek++) {
    const dayProbability = heatmap.daysOfWeek[dayOfWeek];
    if (dayProbability <= DAY_PROBABILITY_THRESHOLD) {
      continue;
    }

    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      const probability = dayProbability * heatmap.hours[hour];
      if (probability > SLOT_PROBABILITY_THRESHOLD) {
        entries.push({ streamerId: heatmap.streamerId, dayOfWeek, hour, probability });
      }
    }
  }

  return entries;
}

/**
 * Most probable hour on one day. Ties keep the earliest hour;
 * a day with no signal predicts hour 0 at probability 0.
 */
export function mostLikelyHour(heatmap: Heatmap, dayOfWeek: number): PredictedTime {
  const dayProbability = heatmap.daysOfWeek[dayOfWeek];
  let hour = 0;
  let probability = 0;

  for (let candidate = 0; candidate < HOURS_PER_DAY; candidate++) {
    const combined = dayProbability * heatmap.hours[candidate];
    if (combined > probability) {
      probability = combined;
      hour = candidate;
    }
  }

  return { dayOfWeek, hour, probability };
}
