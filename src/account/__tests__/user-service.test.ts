import { describe, it, expect, beforeEach, vi } from 'vitest';

import { UserService } from '../user-service.js';
import { InvalidInputError, NotFoundError } from '../../errors.js';
import {
  NOW,
  captureError,
  createInMemoryStores,
  fixedClock,
  makeStreamer,
  type InMemoryStores,
} from '../../__tests__/helpers/index.js';

describe('UserService', () => {
  let stores: InMemoryStores;
  let service: UserService;

  beforeEach(async () => {
    stores = createInMemoryStores();
    service = new UserService({ userStore: stores.userStore, followStore: stores.followStore, clock: fixedClock() });
    await stores.streamerStore.create(makeStreamer('s1', { name: 'Alpha' }));
    await stores.streamerStore.create(makeStreamer('s2', { name: 'Bravo' }));
  });

  describe('createUser', () => {
    it('registers a new user', async () => {
      const user = await service.createUser('google-1', 'viewer@example.com');

      expect(user).toMatchObject({ googleId: 'google-1', email: 'viewer@example.com', createdAt: NOW, updatedAt: NOW });
      expect(await service.getUser(user.id)).toEqual(user);
    });

    it('returns the existing user for a known Google ID', async () => {
      const first = await service.createUser('google-1', 'viewer@example.com');
      const create = vi.spyOn(stores.userStore, 'create');

      const again = await service.createUser('google-1', 'viewer@example.com');

      expect(again).toEqual(first);
      expect(create).not.toHaveBeenCalled();
    });

    it.each([
      ['', 'viewer@example.com', 'google ID cannot be empty'],
      ['google-1', '', 'email cannot be empty'],
    ])('rejects googleId "%s" with email "%s"', async (googleId, email, message) => {
      const error = await captureError(service.createUser(googleId, email));

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error.message).toBe(message);
    });
  });

  it('throws NotFoundError for an unknown user', async () => {
    await expect(service.getUser('nobody')).rejects.toThrow(NotFoundError);
  });

  describe('follows', () => {
    it('follows once and lists followed streamers', async () => {
      await service.followStreamer('u1', 's2');
      await service.followStreamer('u1', 's2');
      await service.followStreamer('u1', 's1');

      const followed = await service.getUserFollows('u1');

      expect(followed.map(s => s.id)).toEqual(['s1', 's2']);
      expect(stores.followStore.follows).toHaveLength(2);
    });

    it('unfollows', async () => {
      await service.followStreamer('u1', 's1');

      await service.unfollowStreamer('u1', 's1');

      expect(await service.getUserFollows('u1')).toEqual([]);
    });

    it('rejects an empty streamer ID', async () => {
      await expect(service.followStreamer('u1', '')).rejects.toThrow('streamer ID cannot be empty');
    });
  });
});
