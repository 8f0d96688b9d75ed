import { eq } from 'drizzle-orm';

import type { DatabaseClient } from '../../db/index.js';
import { users } from '../../db/schema.js';
import type { User } from '../../domain/types.js';
import type { StoreCallOptions, UserStore } from '../interfaces.js';

export class SqliteUserRepository implements UserStore {
  constructor(private readonly db: DatabaseClient) {}

  async create(user: User, options?: StoreCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    await this.db.insert(users).values(user);
  }

  async getById(id: string, options?: StoreCallOptions): Promise<User | null> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return record ?? null;
  }

  async getByGoogleId(googleId: string, options?: StoreCallOptions): Promise<User | null> {
    options?.signal?.throwIfAborted();
    const [record] = await this.db.select().from(users).where(eq(users.googleId, googleId)).limit(1);
    return record ?? null;
  }
}
