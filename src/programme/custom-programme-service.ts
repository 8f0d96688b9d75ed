/**
 * Custom programme management
 * Registered users keep one persisted programme; guests get an unsaved one
 */

import { v4 as uuidv4 } from 'uuid';

import { systemClock, type Clock } from '../clock.js';
import type { CustomProgramme, Streamer } from '../domain/types.js';
import { NotFoundError, requireId } from '../errors.js';
import { logger } from '../logger.js';
import type {
  CustomProgrammeStore,
  FollowStore,
  StoreCallOptions,
  StreamerStore,
} from '../repository/interfaces.js';
import { callStore } from '../repository/store-call.js';

export interface CustomProgrammeServiceDeps {
  customProgrammeStore: CustomProgrammeStore;
  streamerStore: StreamerStore;
  followStore: FollowStore;
  clock?: Clock;
}

/** Drop repeated IDs, keeping first-seen order */
const uniqueIds = (ids: string[]): string[] => Array.from(new Set(ids));

export class CustomProgrammeService {
  private readonly store: CustomProgrammeStore;
  private readonly streamerStore: StreamerStore;
  private readonly followStore: FollowStore;
  private readonly clock: Clock;

  constructor(deps: CustomProgrammeServiceDeps) {
    this.store = deps.customProgrammeStore;
    this.streamerStore = deps.streamerStore;
    this.followStore = deps.followStore;
    this.clock = deps.clock ?? systemClock;
  }

  async createCustomProgramme(
    userId: string,
    streamerIds: string[],
    options?: StoreCallOptions
  ): Promise<CustomProgramme> {
    requireId(userId, 'user ID');

    const now = this.clock.now();
    const programme: CustomProgramme = {
      id: uuidv4(),
      userId,
      streamerIds: uniqueIds(streamerIds),
      createdAt: now,
      updatedAt: now,
    };

    await callStore('create custom programme', options, () => this.store.create(programme, options));
    logger.info({ userId, programmeId: programme.id, streamers: programme.streamerIds.length }, 'custom programme created');

    return programme;
  }

  /**
   * @throws NotFoundError when the user has no custom programme
   */
  async getCustomProgramme(userId: string, options?: StoreCallOptions): Promise<CustomProgramme> {
    requireId(userId, 'user ID');

    const programme = await callStore('get custom programme', options, () =>
      this.store.getByUserId(userId, options)
    );
    if (!programme) {
      throw new NotFoundError('custom programme', userId);
    }
    return programme;
  }

  async updateCustomProgramme(
    userId: string,
    streamerIds: string[],
    options?: StoreCallOptions
  ): Promise<CustomProgramme> {
    const programme = await this.getCustomProgramme(userId, options);
    return this.save({ ...programme, streamerIds: uniqueIds(streamerIds) }, options);
  }

  async deleteCustomProgramme(userId: string, options?: StoreCallOptions): Promise<void> {
    requireId(userId, 'user ID');
    await callStore('delete custom programme', options, () => this.store.delete(userId, options));
    logger.info({ userId }, 'custom programme deleted');
  }

  /**
   * Session-scoped programme for a visitor without an account. Not persisted.
   */
  createGuestProgramme(streamerIds: string[]): CustomProgramme {
    const now = this.clock.now();
    return {
      id: uuidv4(),
      userId: '',
      streamerIds: uniqueIds(streamerIds),
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Persist a guest session for a newly registered user: every guest follow,
   * then the guest programme if it lists any streamers. A programme the user
   * already has is replaced by the guest's list.
   *
   * @returns The saved programme, or null when there was nothing to save
   */
  async migrateGuestData(
    userId: string,
    guestFollows: string[],
    guestProgramme: CustomProgramme | null,
    options?: StoreCallOptions
  ): Promise<CustomProgramme | null> {
    requireId(userId, 'user ID');
    const follows = uniqueIds(guestFollows);
    follows.forEach(streamerId => requireId(streamerId, 'streamer ID'));

    for (const streamerId of follows) {
      await callStore('migrate guest follow', options, () => this.followStore.follow(userId, streamerId, options));
    }

    if (!guestProgramme || guestProgramme.streamerIds.length === 0) {
      logger.info({ userId, follows: follows.length }, 'guest data migrated without a programme');
      return null;
    }

    const existing = await callStore('get custom programme', options, () =>
      this.store.getByUserId(userId, options)
    );
    const programme = existing
      ? await this.save({ ...existing, streamerIds: uniqueIds(guestProgramme.streamerIds) }, options)
      : await this.createCustomProgramme(userId, guestProgramme.streamerIds, options);

    logger.info(
      { userId, follows: follows.length, programmeId: programme.id, replaced: existing !== null },
      'guest data migrated'
    );
    return programme;
  }

  /** Adding a streamer that is already present is a no-op */
  async addStreamerToProgramme(
    userId: string,
    streamerId: string,
    options?: StoreCallOptions
  ): Promise<CustomProgramme> {
    requireId(userId, 'user ID');
    requireId(streamerId, 'streamer ID');

    const programme = await this.getCustomProgramme(userId, options);
    if (programme.streamerIds.includes(streamerId)) {
      return programme;
    }
    return this.save({ ...programme, streamerIds: [...programme.streamerIds, streamerId] }, options);
  }

  async removeStreamerFromProgramme(
    userId: string,
    streamerId: string,
    options?: StoreCallOptions
  ): Promise<CustomProgramme> {
    requireId(userId, 'user ID');
    requireId(streamerId, 'streamer ID');

    const programme = await this.getCustomProgramme(userId, options);
    return this.save(
      { ...programme, streamerIds: programme.streamerIds.filter(id => id !== streamerId) },
      options
    );
  }

  /**
   * The programme's streamers in programme order, skipping any that no longer exist
   */
  async listProgrammeStreamers(userId: string, options?: StoreCallOptions): Promise<Streamer[]> {
    const programme = await this.getCustomProgramme(userId, options);
    const found = await callStore('get programme streamers', options, () =>
      this.streamerStore.getByIds(programme.streamerIds, options)
    );

    const byId = new Map(found.map(streamer => [streamer.id, streamer]));
    return programme.streamerIds.flatMap(id => {
      const streamer = byId.get(id);
      return streamer ? [streamer] : [];
    });
  }

  private async save(programme: CustomProgramme, options?: StoreCallOptions): Promise<CustomProgramme> {
    const updated: CustomProgramme = { ...programme, updatedAt: this.clock.now() };
    await callStore('update custom programme', options, () => this.store.update(updated, options));
    logger.debug({ userId: updated.userId, streamers: updated.streamerIds.length }, 'custom programme updated');
    return updated;
  }
}
