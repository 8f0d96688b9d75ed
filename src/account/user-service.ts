/**
 * User accounts and follows
 */

import { v4 as uuidv4 } from 'uuid';

import { systemClock, type Clock } from '../clock.js';
import type { Streamer, User } from '../domain/types.js';
import { InvalidInputError, NotFoundError, requireId } from '../errors.js';
import { logger } from '../logger.js';
import type { FollowStore, StoreCallOptions, UserStore } from '../repository/interfaces.js';
import { callStore } from '../repository/store-call.js';

export interface UserServiceDeps {
  userStore: UserStore;
  followStore: FollowStore;
  clock?: Clock;
}

export class UserService {
  private readonly userStore: UserStore;
  private readonly followStore: FollowStore;
  private readonly clock: Clock;

  constructor(deps: UserServiceDeps) {
    this.userStore = deps.userStore;
    this.followStore = deps.followStore;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Register a user from their Google account. Signing in again with the
   * same Google ID returns the existing user.
   */
  async createUser(googleId: string, email: string, options?: StoreCallOptions): Promise<User> {
    if (googleId === '') {
      throw new InvalidInputError('google ID cannot be empty');
    }
    if (email === '') {
      throw new InvalidInputError('email cannot be empty');
    }

    const existing = await callStore('find user by google ID', options, () =>
      this.userStore.getByGoogleId(googleId, options)
    );
    if (existing) {
      return existing;
    }

    const now = this.clock.now();
    const user: User = { id: uuidv4(), googleId, email, createdAt: now, updatedAt: now };

    await callStore('create user', options, () => this.userStore.create(user, options));
    logger.info({ userId: user.id }, 'user created');

    return user;
  }

  async getUser(userId: string, options?: StoreCallOptions): Promise<User> {
    requireId(userId, 'user ID');

    const user = await callStore('get user', options, () => this.userStore.getById(userId, options));
    if (!user) {
      throw new NotFoundError('user', userId);
    }
    return user;
  }

  /** Following a streamer twice is a no-op */
  async followStreamer(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void> {
    requireId(userId, 'user ID');
    requireId(streamerId, 'streamer ID');

    await callStore('follow streamer', options, () => this.followStore.follow(userId, streamerId, options));
    logger.debug({ userId, streamerId }, 'streamer followed');
  }

  async unfollowStreamer(userId: string, streamerId: string, options?: StoreCallOptions): Promise<void> {
    requireId(userId, 'user ID');
    requireId(streamerId, 'streamer ID');

    await callStore('unfollow streamer', options, () => this.followStore.unfollow(userId, streamerId, options));
    logger.debug({ userId, streamerId }, 'streamer unfollowed');
  }

  async getUserFollows(userId: string, options?: StoreCallOptions): Promise<Streamer[]> {
    requireId(userId, 'user ID');

    return callStore('list followed streamers', options, () =>
      this.followStore.listFollowedStreamers(userId, options)
    );
  }
}
