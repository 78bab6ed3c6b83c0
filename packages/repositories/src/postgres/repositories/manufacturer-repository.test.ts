import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import type { ManufacturerWithRole } from '@waypoint/protocol';
import { PgManufacturerRepository } from './manufacturer-repository.js';
import { manufacturerAccesses, users } from '../schema/index.js';
import { EmptyFieldError } from '../../errors.js';
import { createTestDatabase, type TestDatabase } from '../../test-support/pglite.js';

let testDb: TestDatabase;
let repo: PgManufacturerRepository;

beforeAll(async () => {
  testDb = await createTestDatabase();
  repo = new PgManufacturerRepository(testDb.db);
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await testDb.reset();
  await testDb.db.insert(users).values([
    { id: 'user-a', email: 'ada@example.com', hashedPassword: 'hash', fullName: 'Ada' },
    { id: 'user-b', email: 'Bob@example.com', hashedPassword: 'hash' },
  ]);
  testDb.statements.length = 0;
});

function summary(items: ManufacturerWithRole[]) {
  return items.map((item) => [item.manufacturer.name, item.role]);
}

describe('create / get', () => {
  it('round-trips every field', async () => {
    const created = await repo.create({
      id: 'mfr-1',
      name: 'Edelrid',
      shortName: 'ER',
      description: 'Ropes and harnesses',
      website: 'https://example.com/edelrid',
      hidden: false,
    });

    const expected = {
      id: 'mfr-1',
      name: 'Edelrid',
      shortName: 'ER',
      description: 'Ropes and harnesses',
      website: 'https://example.com/edelrid',
      hidden: false,
    };
    expect(created).toEqual(expected);
    expect(await repo.get('mfr-1')).toEqual(expected);
  });

  it('is hidden unless stated otherwise', async () => {
    const created = await repo.create({ name: 'Prototype' });

    expect(created.hidden).toBe(true);
    expect(created.shortName).toBeNull();
  });

  it('grants initial accesses', async () => {
    await repo.create({
      id: 'mfr-1',
      name: 'Edelrid',
      accesses: [{ userId: 'user-a', role: 'owner' }, { userId: 'user-b' }],
    });

    expect(await repo.getAccess('mfr-1', 'user-a')).toBe('owner');
    expect(await repo.getAccess('mfr-1', 'user-b')).toBe('shared');
  });

  it('rejects an empty name without writing', async () => {
    await expect(repo.create({ name: '' })).rejects.toThrow(EmptyFieldError);
    expect(testDb.writes()).toHaveLength(0);
  });

  it('finds manufacturers by name', async () => {
    await repo.create({ id: 'mfr-1', name: 'Edelrid', hidden: false });

    expect((await repo.getByName('Edelrid'))?.id).toBe('mfr-1');
    expect((await repo.getByName('Edelrid', { hidden: false }))?.id).toBe('mfr-1');
    expect(await repo.getByName('Edelrid', { hidden: true })).toBeNull();
    expect(await repo.getByName('Mammut')).toBeNull();
  });
});

describe('update', () => {
  beforeEach(async () => {
    await repo.create({ id: 'mfr-1', name: 'Edelrid', shortName: 'ER', hidden: true });
    testDb.statements.length = 0;
  });

  it('applies sparse changes', async () => {
    await repo.update('mfr-1', { shortName: '', hidden: false });

    expect(await repo.get('mfr-1')).toMatchObject({
      name: 'Edelrid',
      shortName: null,
      hidden: false,
    });
  });

  it('rejects clearing hidden', async () => {
    await expect(repo.update('mfr-1', { hidden: null })).rejects.toThrow('hidden cannot be empty');
    expect(testDb.writes()).toHaveLength(0);
  });

  it('issues no statement for an empty request', async () => {
    await repo.update('mfr-1', {});

    expect(testDb.statements).toHaveLength(0);
  });
});

describe('list', () => {
  beforeEach(async () => {
    await repo.create({
      name: 'Edelrid',
      hidden: false,
      accesses: [{ userId: 'user-a', role: 'owner' }],
    });
    await repo.create({ name: 'mammut', hidden: false });
    await repo.create({
      name: 'Prototype',
      hidden: true,
      accesses: [{ userId: 'user-a', role: 'editor' }],
    });
    await repo.create({
      name: 'Secret',
      hidden: true,
      accesses: [{ userId: 'user-b', role: 'shared' }],
    });
    await repo.create({ name: 'Zeta', hidden: true });
  });

  it('lists everything without filters', async () => {
    const page = await repo.list();

    expect(summary(page.items)).toEqual([
      ['Edelrid', null],
      ['mammut', null],
      ['Prototype', null],
      ['Secret', null],
      ['Zeta', null],
    ]);
    expect(page.total).toBe(5);
  });

  it('filters by visibility without a user', async () => {
    expect(summary((await repo.list({ hidden: false })).items)).toEqual([
      ['Edelrid', null],
      ['mammut', null],
    ]);
    expect(summary((await repo.list({ hidden: true })).items)).toEqual([
      ['Prototype', null],
      ['Secret', null],
      ['Zeta', null],
    ]);
  });

  it('ignores roles without a user', async () => {
    expect((await repo.list({ accessRoles: ['owner'] })).total).toBe(5);
  });

  it('lists public manufacturers or those the user has access to', async () => {
    const page = await repo.list({ userId: 'user-a' });

    expect(summary(page.items)).toEqual([
      ['Edelrid', 'owner'],
      ['mammut', null],
      ['Prototype', 'editor'],
    ]);
    expect(page.total).toBe(3);
    expect(summary((await repo.list({ userId: 'user-b' })).items)).toEqual([
      ['Edelrid', null],
      ['mammut', null],
      ['Secret', 'shared'],
    ]);
  });

  it('treats empty roles as no role filter', async () => {
    expect((await repo.list({ userId: 'user-a', accessRoles: [] })).total).toBe(3);
  });

  it('lists only public manufacturers for hidden: false', async () => {
    const page = await repo.list({ userId: 'user-a', hidden: false });

    expect(summary(page.items)).toEqual([
      ['Edelrid', 'owner'],
      ['mammut', null],
    ]);
  });

  it('lists hidden manufacturers the user has access to for hidden: true', async () => {
    const page = await repo.list({ userId: 'user-a', hidden: true });

    expect(summary(page.items)).toEqual([['Prototype', 'editor']]);
    expect(page.total).toBe(1);
  });

  it('filters by the roles the user holds', async () => {
    expect(
      summary((await repo.list({ userId: 'user-a', accessRoles: ['owner', 'admin'] })).items)
    ).toEqual([['Edelrid', 'owner']]);
    expect(
      summary((await repo.list({ userId: 'user-a', accessRoles: ['editor'], hidden: false })).items)
    ).toEqual([]);
    expect(
      summary((await repo.list({ userId: 'user-a', accessRoles: ['editor'], hidden: true })).items)
    ).toEqual([['Prototype', 'editor']]);
  });

  it('pages the results', async () => {
    const page = await repo.list({ userId: 'user-a' }, { skip: 1, limit: 1 });

    expect(summary(page.items)).toEqual([['mammut', null]]);
    expect(page.total).toBe(3);
  });
});

describe('access grants', () => {
  beforeEach(async () => {
    await repo.create({ id: 'mfr-1', name: 'Edelrid' });
    await repo.create({ id: 'mfr-2', name: 'Mammut' });
  });

  it('upserts a single grant', async () => {
    await repo.setAccess('mfr-1', 'user-a');
    expect(await repo.getAccess('mfr-1', 'user-a')).toBe('shared');

    await repo.setAccess('mfr-1', 'user-a', 'admin');
    expect(await repo.getAccess('mfr-1', 'user-a')).toBe('admin');
  });

  it('sets several grants and keeps unlisted ones', async () => {
    await repo.setAccess('mfr-1', 'user-b', 'editor');

    await repo.setAccesses('mfr-1', [
      { userId: 'user-a', role: 'shared' },
      { userId: 'user-a', role: 'owner' },
    ]);

    expect(await repo.getAccess('mfr-1', 'user-a')).toBe('owner');
    expect(await repo.getAccess('mfr-1', 'user-b')).toBe('editor');
  });

  it('returns null without a grant', async () => {
    expect(await repo.getAccess('mfr-1', 'user-a')).toBeNull();
  });

  it('lists grants with their users by email', async () => {
    await repo.setAccess('mfr-1', 'user-b', 'editor');
    await repo.setAccess('mfr-1', 'user-a', 'owner');
    await repo.setAccess('mfr-2', 'user-a', 'shared');

    expect(await repo.listAccesses('mfr-1')).toEqual([
      {
        role: 'owner',
        user: {
          id: 'user-a',
          email: 'ada@example.com',
          fullName: 'Ada',
          isActive: true,
          isSuperuser: false,
        },
      },
      {
        role: 'editor',
        user: {
          id: 'user-b',
          email: 'Bob@example.com',
          fullName: null,
          isActive: true,
          isSuperuser: false,
        },
      },
    ]);
  });

  it('removes one grant', async () => {
    await repo.setAccesses('mfr-1', [{ userId: 'user-a' }, { userId: 'user-b' }]);

    await repo.removeAccess('mfr-1', 'user-a');

    expect(await repo.getAccess('mfr-1', 'user-a')).toBeNull();
    expect(await repo.getAccess('mfr-1', 'user-b')).toBe('shared');
  });

  it('removes every grant of a manufacturer', async () => {
    await repo.setAccesses('mfr-1', [{ userId: 'user-a' }, { userId: 'user-b' }]);
    await repo.setAccess('mfr-2', 'user-a');

    await repo.removeAllAccesses('mfr-1');

    expect(await repo.listAccesses('mfr-1')).toEqual([]);
    expect(await repo.getAccess('mfr-2', 'user-a')).toBe('shared');
  });

  it('drops grants with the manufacturer or the user', async () => {
    await repo.setAccess('mfr-1', 'user-a');
    await repo.setAccess('mfr-2', 'user-b');

    await repo.delete('mfr-1');
    await testDb.db.delete(users).where(eq(users.id, 'user-b'));

    expect(await testDb.db.select().from(manufacturerAccesses)).toEqual([]);
  });

  it('propagates foreign key violations', async () => {
    await expect(repo.setAccess('missing', 'user-a')).rejects.toThrow();
  });
});
