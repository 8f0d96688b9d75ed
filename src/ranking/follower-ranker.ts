/**
 * Follower Ranker
 * Orders streamers by how many users follow them
 */

import { APP_ENV } from '../config.js';
import type { StreamerWithFollowers } from '../domain/types.js';
import { logger } from '../logger.js';
import type { FollowStore, StoreCallOptions, StreamerStore } from '../repository/interfaces.js';
import { callStore, isCancelled } from '../repository/store-call.js';

export const DEFAULT_RANKING_LIMIT = 10;

export interface FollowerRankerDeps {
  streamerStore: StreamerStore;
  followStore: FollowStore;
  /** How many streamers to enumerate before ranking (default: STREAMER_LIST_LIMIT) */
  listLimit?: number;
}

export class FollowerRanker {
  private readonly streamerStore: StreamerStore;
  private readonly followStore: FollowStore;
  private readonly listLimit: number;

  constructor(deps: FollowerRankerDeps) {
    this.streamerStore = deps.streamerStore;
    this.followStore = deps.followStore;
    this.listLimit = deps.listLimit ?? APP_ENV.STREAMER_LIST_LIMIT;
  }

  /**
   * Streamers sorted by follower count, highest first.
   * Equal counts keep the store's enumeration order.
   *
   * @param limit - Maximum results; 0 or less means 10
   */
  async getStreamersRankedByFollowers(
    limit: number,
    options?: StoreCallOptions
  ): Promise<StreamerWithFollowers[]> {
    const effectiveLimit = limit > 0 ? limit : DEFAULT_RANKING_LIMIT;

    const streamers = await callStore('list streamers', options, () =>
      this.streamerStore.list(this.listLimit, options)
    );

    const ranked: StreamerWithFollowers[] = [];
    for (const streamer of streamers) {
      let followerCount = 0;
      try {
        followerCount = await callStore('count followers', options, () =>
          this.followStore.getFollowerCount(streamer.id, options)
        );
      } catch (error) {
        if (isCancelled(options)) {
          throw error;
        }
        logger.warn({ err: error, streamerId: streamer.id }, 'follower count unavailable, ranking as 0');
      }
      ranked.push({ streamer, followerCount });
    }

    ranked.sort((a, b) => b.followerCount - a.followerCount);

    return ranked.slice(0, effectiveLimit);
  }
}
