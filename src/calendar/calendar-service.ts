/**
 * Calendar Service
 * Assembles the calendar value object handed to the presentation layer
 */

import type { ProgrammeCalendarView, Streamer, TVProgramme } from '../domain/types.js';
import type { ProgrammePredictor } from '../programme/programme-predictor.js';
import type { FollowStore, StoreCallOptions } from '../repository/interfaces.js';
import { callStore } from '../repository/store-call.js';
import { buildTimeSlotGrid, toStreamerMap, type TimeSlotGrid } from './grid-builder.js';
import { navigateWeek, weekBounds } from './week.js';

export interface CalendarView {
  week: Date;
  prevWeek: Date;
  nextWeek: Date;
  streamerMap: Map<string, Streamer>;
  timeSlots: TimeSlotGrid;
}

export interface FollowedCalendarView extends CalendarView {
  programme: TVProgramme;
}

export interface ProgrammeCalendarGrid extends CalendarView {
  programme: ProgrammeCalendarView;
  isCustom: boolean;
  isGuestSession: boolean;
}

export interface CalendarServiceDeps {
  predictor: ProgrammePredictor;
  followStore: FollowStore;
}

export class CalendarService {
  private readonly predictor: ProgrammePredictor;
  private readonly followStore: FollowStore;

  constructor(deps: CalendarServiceDeps) {
    this.predictor = deps.predictor;
    this.followStore = deps.followStore;
  }

  /**
   * Grid of the user's followed streamers for the week containing `week`
   */
  async getCalendarView(userId: string, week: Date, options?: StoreCallOptions): Promise<FollowedCalendarView> {
    const programme = await this.predictor.generateProgramme(userId, week, options);
    const followed = await callStore('list followed streamers', options, () =>
      this.followStore.listFollowedStreamers(userId, options)
    );

    const streamerMap = toStreamerMap(followed);

    return {
      ...weekBounds(week),
      programme,
      streamerMap,
      timeSlots: buildTimeSlotGrid(programme.entries, streamerMap),
    };
  }

  /**
   * Grid for the home page: the user's custom programme if they have one,
   * the most-followed streamers otherwise
   */
  async getProgrammeCalendarView(
    userId: string,
    week: Date,
    options?: StoreCallOptions
  ): Promise<ProgrammeCalendarGrid> {
    const programme = await this.predictor.getProgrammeView(userId, week, options);
    const streamerMap = toStreamerMap(programme.streamers);

    return {
      ...weekBounds(week),
      programme,
      streamerMap,
      timeSlots: buildTimeSlotGrid(programme.entries, streamerMap),
      isCustom: programme.isCustom,
      isGuestSession: programme.isGuestSession,
    };
  }

  navigateWeek(week: Date, direction: string): Date {
    return navigateWeek(week, direction);
  }
}
