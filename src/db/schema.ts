import { integer, primaryKey, text } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { sqliteTable, uniqueIndex, index } from 'drizzle-orm/sqlite-core';

export const streamers = sqliteTable('streamers', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  handles: text('handles').notNull().default('{}'), // JSON object: platform -> channel handle
  createdAt: integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .default(sql`(strftime('%s','now')*1000)`),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' })
    .notNull()
    .default(sql`(strftime('%s','now')*1000)`)
});

export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey(),
    googleId: text('google_id').notNull(),
    email: text('email').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull()
  },
  table => ({
    googleIdIdx: uniqueIndex('users_google_id_unique').on(table.googleId)
  })
);

export const follows = sqliteTable(
  'follows',
  {
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    streamerId: text('streamer_id')
      .notNull()
      .references(() => streamers.id, { onDelete: 'cascade' }),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull()
  },
  table => ({
    pk: primaryKey({ columns: [table.userId, table.streamerId] }),
    streamerIdx: index('follows_streamer_id_idx').on(table.streamerId)
  })
);

/**
 * Observed live intervals, append-only
 * Point-in-time samples have start_time = end_time
 */
export const activityRecords = sqliteTable(
  'activity_records',
  {
    id: text('id').primaryKey(),
    streamerId: text('streamer_id')
      .notNull()
      .references(() => streamers.id, { onDelete: 'cascade' }),
    startTime: integer('start_time', { mode: 'timestamp_ms' }).notNull(),
    endTime: integer('end_time', { mode: 'timestamp_ms' }).notNull(),
    platform: text('platform'), // 'youtube', 'twitch', 'kick' or null when unknown
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull()
  },
  table => ({
    streamerStartIdx: index('activity_records_streamer_start_idx').on(table.streamerId, table.startTime)
  })
);

/**
 * One row per streamer, overwritten on every regeneration
 */
export const heatmaps = sqliteTable('heatmaps', {
  streamerId: text('streamer_id')
    .primaryKey()
    .references(() => streamers.id, { onDelete: 'cascade' }),
  hours: text('hours').notNull(), // JSON array of 24 probabilities
  daysOfWeek: text('days_of_week').notNull(), // JSON array of 7 probabilities, Sunday first
  dataPoints: integer('data_points').notNull(),
  generatedAt: integer('generated_at', { mode: 'timestamp_ms' }).notNull()
});

/**
 * Registered users' custom programmes (guest programmes live in the session)
 */
export const customProgrammes = sqliteTable(
  'custom_programmes',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull()
  },
  table => ({
    userIdx: uniqueIndex('custom_programmes_user_unique').on(table.userId)
  })
);

export const customProgrammeStreamers = sqliteTable(
  'custom_programme_streamers',
  {
    programmeId: text('programme_id')
      .notNull()
      .references(() => customProgrammes.id, { onDelete: 'cascade' }),
    streamerId: text('streamer_id').notNull(),
    position: integer('position').notNull()
  },
  table => ({
    pk: primaryKey({ columns: [table.programmeId, table.streamerId] })
  })
);

export type StreamerRecord = typeof streamers.$inferSelect;
export type UserRecord = typeof users.$inferSelect;
export type FollowRecord = typeof follows.$inferSelect;
export type ActivityRecordRow = typeof activityRecords.$inferSelect;
export type HeatmapRecord = typeof heatmaps.$inferSelect;
export type CustomProgrammeRecord = typeof customProgrammes.$inferSelect;
export type CustomProgrammeStreamerRecord = typeof customProgrammeStreamers.$inferSelect;
