/**
 * Repository contracts consumed by the scheduling core.
 * Services depend on these only; src/repository/sqlite holds the SQLite implementations.
 */

import type {
  ActivityRecord,
  CustomProgramme,
  Heatmap,
  Streamer,
  User,
} from '../domain/types.js';

export interface StoreCallOptions {
  /** Aborting cancels the in-flight call */
  signal?: AbortSignal;
}

export interface ActivityStore {
  create(record: ActivityRecord, options?: StoreCallOptions): Promise<void>;
  /** Records whose startTime is at or after `since` */
  listByStreamerSince(streamerId: string, since: Date, options?: StoreCallOptions): Promise<ActivityRecord[]>;
}

export interface HeatmapStore {
  getByStreamerId(streamerId: string, options?: StoreCallOptions): Promise<Heatmap | null>;
  create(heatmap: Heatmap, options?: StoreCallOptions): Promise<void>;
  update(heatmap: Heatmap, options?: StoreCallOptions): Promise<void>;
}

export interface FollowStore {
  follow(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void>;
  unfollow(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void>;
  listFollowedStreamers(userId: string, options?: StoreCallOptions): Promise<Streamer[]>;
  getFollowerCount(streamerId: string, options?: StoreCallOptions): Promise<number>;
}

export interface StreamerStore {
  create(streamer: Streamer, options?: StoreCallOptions): Promise<void>;
  getById(id: string, options?: StoreCallOptions): Promise<Streamer | null>;
  getByIds(ids: string[], options?: StoreCallOptions): Promise<Streamer[]>;
  /** Enumeration order is the store's own (oldest first for SQLite) */
  list(limit: number, options?: StoreCallOptions): Promise<Streamer[]>;
}

export interface CustomProgrammeStore {
  create(programme: CustomProgramme, options?: StoreCallOptions): Promise<void>;
  getByUserId(userId: string, options?: StoreCallOptions): Promise<CustomProgramme | null>;
  update(programme: CustomProgramme, options?: StoreCallOptions): Promise<void>;
  delete(userId: string, options?: StoreCallOptions): Promise<void>;
}

export interface UserStore {
  create(user: User, options?: StoreCallOptions): Promise<void>;
  getById(id: string, options?: StoreCallOptions): Promise<User | null>;
  getByGoogleId(googleId: string, options?: StoreCallOptions): Promise<User | null>;
}
