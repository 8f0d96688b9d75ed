import { asc, eq, inArray } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { streamers, type StreamerRecord } from '../../db/schema.js';
import type { Streamer } from '../../domain/types.js';
import { PLATFORMS } from '../../domain/types.js';
import type { StoreCallOptions, StreamerStore } from '../interfaces.js';
import { parseHandles } from './json-columns.js';

export function toStreamer(record: StreamerRecord): Streamer {
  const handles = parseHandles(record.handles);
  return {
    id: record.id,
    name: record.name,
    handles,
    platforms: PLATFORMS.filter(platform => handles[platform] !== undefined),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt
  };
}

export class SqliteStreamerRepository implements StreamerStore {
  constructor(private readonly db: DatabaseClient) {}

  async create(streamer: Streamer, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db.insert(streamers).values({
      id: streamer.id,
      name: streamer.name,
      handles: JSON.stringify(streamer.handles),
      createdAt: streamer.createdAt,
      updatedAt: streamer.updatedAt
    });
  }

  async getById(id: string, options?: StoreCallOptions): Promise<Streamer | null> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db.select().from(streamers).where(eq(streamers.id, id)).limit(1);
    return record ? toStreamer(record) : null;
  }

  async getByIds(ids: string[], options?: StoreCallOptions): Promise<Streamer[]> {
    options?.signal?.throwIfAborted();
    if (ids.length === 0) {
      return [];
    }
    const records = await this.db.select().from(streamers).where(inArray(streamers.id, ids));
    return records.map(toStreamer);
  }

  async list(limit: number, options?: StoreCallOptions): Promise<Streamer[]> {
    options?.signal?.throwIfAborted();
    const records = await this.db
      .select()
      .from(streamers)
      .orderBy(asc(streamers.createdAt), asc(streamers.id))
      .limit(limit);
    return records.map(toStreamer);
  }
}
