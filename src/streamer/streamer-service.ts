/**
 * Streamer catalogue
 */

import { v4 as uuidv4 } from 'uuid';

import { systemClock, type Clock } from '../clock.js';
import type { Platform, Streamer } from '../domain/types.js';
import { PLATFORMS } from '../domain/types.js';
import { InvalidInputError, NotFoundError, requireId } from '../errors.js';
import { logger } from '../logger.js';
import type { StoreCallOptions, StreamerStore } from '../repository/interfaces.js';
import { callStore } from '../repository/store-call.js';

/** Page size when listing without a positive limit */
export const DEFAULT_LIST_LIMIT = 50;

export interface NewStreamer {
  name: string;
  handles: Partial<Record<Platform, string>>;
}

export interface StreamerServiceDeps {
  streamerStore: StreamerStore;
  clock?: Clock;
}

export class StreamerService {
  private readonly store: StreamerStore;
  private readonly clock: Clock;

  constructor(deps: StreamerServiceDeps) {
    this.store = deps.streamerStore;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Add a streamer; platforms are derived from the handles given
   *
   * @throws InvalidInputError when the name is empty or no handle is given
   */
  async addStreamer(input: NewStreamer, options?: StoreCallOptions): Promise<Streamer> {
    if (input.name.trim() === '') {
      throw new InvalidInputError('streamer name cannot be empty');
    }

    const handles: Partial<Record<Platform, string>> = {};
    for (const platform of PLATFORMS) {
      const handle = input.handles[platform]?.trim();
      if (handle) {
        handles[platform] = handle;
      }
    }

    const platforms = PLATFORMS.filter(platform => handles[platform] !== undefined);
    if (platforms.length === 0) {
      throw new InvalidInputError('at least one platform handle is required');
    }

    const now = this.clock.now();
    const streamer: Streamer = {
      id: uuidv4(),
      name: input.name.trim(),
      handles,
      platforms,
      createdAt: now,
      updatedAt: now,
    };

    await callStore('add streamer', options, () => this.store.create(streamer, options));
    logger.info({ streamerId: streamer.id, name: streamer.name, platforms }, 'streamer added');

    return streamer;
  }

  async getStreamer(streamerId: string, options?: StoreCallOptions): Promise<Streamer> {
    requireId(streamerId, 'streamer ID');

    const streamer = await callStore('get streamer', options, () => this.store.getById(streamerId, options));
    if (!streamer) {
      throw new NotFoundError('streamer', streamerId);
    }
    return streamer;
  }

  async listStreamers(limit: number, options?: StoreCallOptions): Promise<Streamer[]> {
    const effectiveLimit = limit > 0 ? limit : DEFAULT_LIST_LIMIT;
    return callStore('list streamers', options, () => this.store.list(effectiveLimit, options));
  }
}
