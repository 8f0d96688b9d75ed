import { and, asc, count, eq } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { follows, streamers } from '../../db/schema.js';
import type { Streamer } from '../../domain/types.js';
import type { FollowStore, StoreCallOptions } from '../interfaces.js';
import { toStreamer } from './streamer-repository.js';

export class SqliteFollowRepository implements FollowStore {
  constructor(private readonly db: DatabaseClient) {}

  /** Following twice is a no-op */
  async follow(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db
      .insert(follows)
      .values({ userId, streamerId, createdAt: new Date() })
      .onConflictDoNothing();
  }

  async unfollow(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db
      .delete(follows)
      .where(and(eq(follows.userId, userId), eq(follows.streamerId, streamerId)));
  }

  async listFollowedStreamers(userId: string, options?: StoreCallOptions): Promise<Streamer[]> {
    options?.signal?.throwIfAborted();
    const rows = await this.db
      .select({ streamer: streamers })
      .from(follows)
      .innerJoin(streamers, eq(follows.streamerId, streamers.id))
      .where(eq(follows.userId, userId))
      .orderBy(asc(streamers.name));
    return rows.map(row => toStreamer(row.streamer));
  }

  async getFollowerCount(streamerId: string, options?: StoreCallOptions): Promise<number> {
    options?.signal?.throwIfAborted();
    const [result] = await this.db
      .select({ count: count() })
      .from(follows)
      .where(eq(follows.streamerId, streamerId));
    return result?.count ?? 0;
  }
}
