import { describe, it, expect, beforeEach } from 'vitest';

import { createScheduleCore, type ScheduleCore } from '../../index.js';
import {
  createInMemoryStores,
  fixedClock,
  makeStreamer,
  makeUser,
  weeklySessions,
  type InMemoryStores,
} from '../../__tests__/helpers/index.js';

const WEEK = new Date(2024, 0, 17, 15, 30);

describe('CalendarService', () => {
  let stores: InMemoryStores;
  let core: ScheduleCore;

  beforeEach(async () => {
    stores = createInMemoryStores();
    core = createScheduleCore(stores, { clock: fixedClock() });

    await stores.streamerStore.create(makeStreamer('s1', { name: 'Alpha' }));
    await stores.streamerStore.create(makeStreamer('s2', { name: 'Bravo' }));
    await stores.userStore.create(makeUser('u1'));
    stores.activityStore.records.push(...weeklySessions('s1', 20, 10));
    await stores.followStore.follow('u1', 's1');
    await stores.followStore.follow('u1', 's2');
  });

  describe('getCalendarView', () => {
    it('lays out the followed programme with week navigation', async () => {
      const view = await core.calendar.getCalendarView('u1', WEEK);

      expect(view.week).toEqual(new Date(2024, 0, 14));
      expect(view.prevWeek).toEqual(new Date(2024, 0, 7));
      expect(view.nextWeek).toEqual(new Date(2024, 0, 21));
      expect([...view.streamerMap.keys()]).toEqual(['s1', 's2']);
      expect(view.timeSlots[20][6].map(e => e.streamerName)).toEqual(['Alpha']);
      expect(view.programme.entries).toHaveLength(1);
    });
  });

  describe('getProgrammeCalendarView', () => {
    it('shows the most-followed streamers to guests', async () => {
      const view = await core.calendar.getProgrammeCalendarView('', WEEK);

      expect(view.isCustom).toBe(false);
      expect(view.isGuestSession).toBe(false);
      expect(view.programme.streamers.map(s => s.id)).toEqual(['s1', 's2']);
      expect(view.timeSlots[20][6].map(e => e.streamerId)).toEqual(['s1']);
    });

    it('shows a custom programme', async () => {
      await core.customProgrammes.createCustomProgramme('u1', ['s2']);

      const view = await core.calendar.getProgrammeCalendarView('u1', WEEK);

      expect(view.isCustom).toBe(true);
      expect([...view.streamerMap.keys()]).toEqual(['s2']);
      expect(view.timeSlots.flat(2)).toEqual([]);
    });
  });

  it('navigates weeks', () => {
    expect(core.calendar.navigateWeek(WEEK, 'next')).toEqual(new Date(2024, 0, 21));
  });
});
