import { asc, eq } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { customProgrammes, customProgrammeStreamers } from '../../db/schema.js';
import type { CustomProgramme } from '../../domain/types.js';
import type { CustomProgrammeStore, StoreCallOptions } from '../interfaces.js';

/**
 * Programme rows plus one association row per streamer, ordered by position
 */
export class SqliteCustomProgrammeRepository implements CustomProgrammeStore {
  constructor(private readonly db: DatabaseClient) {}

  async create(programme: CustomProgramme, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    this.db.transaction(tx => {
      tx.insert(customProgrammes)
        .values({
          id: programme.id,
          userId: programme.userId,
          createdAt: programme.createdAt,
          updatedAt: programme.updatedAt
        })
        .run();
      this.insertStreamers(tx, programme);
    });
  }

  async getByUserId(userId: string, options?: StoreCallOptions): Promise<CustomProgramme | null> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db
      .select()
      .from(customProgrammes)
      .where(eq(customProgrammes.userId, userId))
      .limit(1);

    if (!record) {
      return null;
    }

    const rows = await this.db
      .select({ streamerId: customProgrammeStreamers.streamerId })
      .from(customProgrammeStreamers)
      .where(eq(customProgrammeStreamers.programmeId, record.id))
      .orderBy(asc(customProgrammeStreamers.position));

    return {
      id: record.id,
      userId: record.userId,
      streamerIds: rows.map(row => row.streamerId),
      createdAt: record.createdAt,
      updatedAt: record.updatedAt
    };
  }

  /** Replaces the streamer list wholesale */
  async update(programme: CustomProgramme, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    this.db.transaction(tx => {
      tx.update(customProgrammes)
        .set({ updatedAt: programme.updatedAt })
        .where(eq(customProgrammes.id, programme.id))
        .run();
      tx.delete(customProgrammeStreamers)
        .where(eq(customProgrammeStreamers.programmeId, programme.id))
        .run();
      this.insertStreamers(tx, programme);
    });
  }

  async delete(userId: string, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db
      .select({ id: customProgrammes.id })
      .from(customProgrammes)
      .where(eq(customProgrammes.userId, userId))
      .limit(1);

    if (!record) {
      return;
    }

    this.db.transaction(tx => {
      tx.delete(customProgrammeStreamers).where(eq(customProgrammeStreamers.programmeId, record.id)).run();
      tx.delete(customProgrammes).where(eq(customProgrammes.id, record.id)).run();
    });
  }

  private insertStreamers(tx: Pick<DatabaseClient, 'insert'>, programme: CustomProgramme): void {
    if (programme.streamerIds.length === 0) {
      return;
    }
    tx.insert(customProgrammeStreamers)
      .values(
        programme.streamerIds.map((streamerId, position) => ({
          programmeId: programme.id,
          streamerId,
          position
        }))
      )
      .run();
  }
}
