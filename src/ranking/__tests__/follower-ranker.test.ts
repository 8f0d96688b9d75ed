import { describe, it, expect, beforeEach, vi } from 'vitest';

import { FollowerRanker } from '../follower-ranker.js';
import { StoreFailureError } from '../../errors.js';
import { captureError, createInMemoryStores, makeStreamer, type InMemoryStores } from '../../__tests__/helpers/index.js';

describe('FollowerRanker', () => {
  let stores: InMemoryStores;

  const rankerWith = (listLimit?: number): FollowerRanker =>
    new FollowerRanker({ streamerStore: stores.streamerStore, followStore: stores.followStore, listLimit });

  const ids = (ranked: Array<{ streamer: { id: string } }>): string[] => ranked.map(r => r.streamer.id);

  beforeEach(async () => {
    stores = createInMemoryStores();
    for (const id of ['s1', 's2', 's3', 's4']) {
      await stores.streamerStore.create(makeStreamer(id));
    }
    // s3: 3, s2: 1, s4: 1, s1: 0
    for (const user of ['u1', 'u2', 'u3']) {
      await stores.followStore.follow(user, 's3');
    }
    await stores.followStore.follow('u1', 's2');
    await stores.followStore.follow('u2', 's4');
  });

  it('orders by follower count, keeping enumeration order on ties', async () => {
    const ranked = await rankerWith().getStreamersRankedByFollowers(10);

    expect(ids(ranked)).toEqual(['s3', 's2', 's4', 's1']);
    expect(ranked.map(r => r.followerCount)).toEqual([3, 1, 1, 0]);
  });

  it('truncates to the limit', async () => {
    const ranked = await rankerWith().getStreamersRankedByFollowers(2);

    expect(ids(ranked)).toEqual(['s3', 's2']);
  });

  it.each([0, -5])('treats limit %s as 10', async limit => {
    for (let i = 5; i <= 12; i++) {
      await stores.streamerStore.create(makeStreamer(`s${i}`));
    }

    const ranked = await rankerWith().getStreamersRankedByFollowers(limit);

    expect(ranked).toHaveLength(10);
  });

  it('only ranks the enumerated streamers', async () => {
    const ranked = await rankerWith(2).getStreamersRankedByFollowers(10);

    expect(ids(ranked)).toEqual(['s2', 's1']);
  });

  it('ranks a streamer whose count fails as having no followers', async () => {
    stores.followStore.failingCounts.add('s3');

    const ranked = await rankerWith().getStreamersRankedByFollowers(10);

    expect(ids(ranked)).toEqual(['s2', 's4', 's1', 's3']);
    expect(ranked[3].followerCount).toBe(0);
  });

  it('propagates a listing failure', async () => {
    vi.spyOn(stores.streamerStore, 'list').mockRejectedValue(new Error('no such table: streamers'));

    const error = await captureError(rankerWith().getStreamersRankedByFollowers(10));

    expect(error).toBeInstanceOf(StoreFailureError);
    expect(error.message).toBe('failed to list streamers');
  });

  it('propagates a count failure after cancellation', async () => {
    const controller = new AbortController();
    vi.spyOn(stores.followStore, 'getFollowerCount').mockImplementation(() => {
      controller.abort();
      return Promise.reject(new Error('interrupted'));
    });

    const error = await captureError(
      rankerWith().getStreamersRankedByFollowers(10, { signal: controller.signal })
    );

    expect(error).toBeInstanceOf(StoreFailureError);
    expect(error.message).toBe('failed to count followers');
  });
});
