import { and, desc, eq, gte } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { activityRecords, type ActivityRecordRow } from '../../db/schema.js';
import type { ActivityRecord } from '../../domain/types.js';
import { isPlatform } from '../../domain/types.js';
import type { ActivityStore, StoreCallOptions } from '../interfaces.js';

const toActivityRecord = (row: ActivityRecordRow): ActivityRecord => ({
  id: row.id,
  streamerId: row.streamerId,
  startTime: row.startTime,
  endTime: row.endTime,
  platform: row.platform !== null && isPlatform(row.platform) ? row.platform : null,
  createdAt: row.createdAt
});

export class SqliteActivityRepository implements ActivityStore {
  constructor(private readonly db: DatabaseClient) {}

  async create(record: ActivityRecord, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db.insert(activityRecords).values(record);
  }

  async listByStreamerSince(streamerId: string, since: Date, options?: StoreCallOptions): Promise<ActivityRecord[]> {
    options?.signal?.throwIfAborted();
    const rows = await this.db
      .select()
      .from(activityRecords)
      .where(and(eq(activityRecords.streamerId, streamerId), gte(activityRecords.startTime, since)))
      .orderBy(desc(activityRecords.startTime));
    return rows.map(toActivityRecord);
  }
}
