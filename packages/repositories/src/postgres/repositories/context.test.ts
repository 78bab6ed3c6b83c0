import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
import type { PasswordHasher, TransactionalRepositoryContext } from '../../interfaces/index.js';
import { createTestDatabase, type TestDatabase } from '../../test-support/pglite.js';

const fakeHasher: PasswordHasher = {
  hash: async (password) => `hashed:${password}`,
  verify: async (password, hashed) => hashed === `hashed:${password}`,
};

let testDb: TestDatabase;
let repos: TransactionalRepositoryContext;

beforeAll(async () => {
  testDb = await createTestDatabase();
  repos = createTransactionalPgRepositoryContext(testDb.db, { passwordHasher: fakeHasher });
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await testDb.reset();
});

describe('createPgRepositoryContext', () => {
  it('uses the given password hasher', async () => {
    const plain = createPgRepositoryContext(testDb.db, { passwordHasher: fakeHasher });

    await plain.users.create({ id: 'user-a', email: 'ada@example.com', password: 'test-password' });

    expect((await plain.users.authenticate('ada@example.com', 'test-password'))?.id).toBe('user-a');
  });
});

describe('transaction', () => {
  it('commits work across repositories', async () => {
    const total = await repos.transaction(async (tx) => {
      const activity = await tx.activities.create({ id: 'trip', title: 'Hut trip' });
      await tx.transactions.create({ activityId: activity, amount: -4500 });
      await tx.transactions.create({ activityId: activity, amount: -500 });
      return (await tx.activities.get('trip'))?.transactionsTotal;
    });

    expect(total).toBe(-5000);
    expect((await repos.transactions.list({ activityIds: ['trip'] })).total).toBe(2);
  });

  it('rolls back every repository when the callback throws', async () => {
    await expect(
      repos.transaction(async (tx) => {
        await tx.locations.create({ id: 'hut', name: 'Mountain Hut' });
        await tx.activities.create({ id: 'trip', title: 'Hut trip', locationId: 'hut' });
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await repos.locations.get('hut')).toBeNull();
    expect(await repos.activities.get('trip')).toBeNull();
  });

  it('rolls back when a nested repository call fails', async () => {
    await expect(
      repos.transaction(async (tx) => {
        await tx.users.create({ id: 'user-a', email: 'ada@example.com', password: 'test-password' });
        await tx.activities.create({ title: 'Run', userIds: ['user-a', 'missing'] });
      })
    ).rejects.toThrow();

    expect(await repos.users.get('user-a')).toBeNull();
  });
});
