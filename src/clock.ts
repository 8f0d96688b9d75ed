/**
 * Source of the current instant.
 * Passed into the engines so tests can pin "now" without touching globals.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
