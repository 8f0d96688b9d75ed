import { eq } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { heatmaps, type HeatmapRecord } from '../../db/schema.js';
import type { Heatmap } from '../../domain/types.js';
import { DAYS_PER_WEEK, HOURS_PER_DAY } from '../../domain/types.js';
import type { HeatmapStore, StoreCallOptions } from '../interfaces.js';
import { parseProbabilities } from './json-columns.js';

type HeatmapInsert = typeof heatmaps.$inferInsert;

function toDbRecord(heatmap: Heatmap): HeatmapInsert {
  return {
    streamerId: heatmap.streamerId,
    hours: JSON.stringify(heatmap.hours),
    daysOfWeek: JSON.stringify(heatmap.daysOfWeek),
    dataPoints: heatmap.dataPoints,
    generatedAt: heatmap.generatedAt
  };
}

function fromDbRecord(record: HeatmapRecord): Heatmap {
  return {
    streamerId: record.streamerId,
    hours: parseProbabilities(record.hours, HOURS_PER_DAY),
    daysOfWeek: parseProbabilities(record.daysOfWeek, DAYS_PER_WEEK),
    dataPoints: record.dataPoints,
    generatedAt: record.generatedAt
  };
}

export class SqliteHeatmapRepository implements HeatmapStore {
  constructor(private readonly db: DatabaseClient) {}

  async getByStreamerId(streamerId: string, options?: StoreCallOptions): Promise<Heatmap | null> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db.select().from(heatmaps).where(eq(heatmaps.streamerId, streamerId)).limit(1);
    return record ? fromDbRecord(record) : null;
  }

  async create(heatmap: Heatmap, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db.insert(heatmaps).values(toDbRecord(heatmap));
  }

  async update(heatmap: Heatmap, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const { streamerId, ...fields } = toDbRecord(heatmap);
    await this.db.update(heatmaps).set(fields).where(eq(heatmaps.streamerId, streamerId));
  }
}
