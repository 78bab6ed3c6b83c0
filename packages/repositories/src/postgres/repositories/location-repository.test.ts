import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import { PgLocationRepository } from './location-repository.js';
import { locationFavorites, users } from '../schema/index.js';
import { EmptyFieldError, ValidationError } from '../../errors.js';
import { createTestDatabase, type TestDatabase } from '../../test-support/pglite.js';

let testDb: TestDatabase;
let repo: PgLocationRepository;

beforeAll(async () => {
  testDb = await createTestDatabase();
  repo = new PgLocationRepository(testDb.db);
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await testDb.reset();
});

describe('create / get', () => {
  it('round-trips every field', async () => {
    await repo.create({ id: 'region', name: 'Bavaria', locationType: 'region' });
    const created = await repo.create({
      id: 'crag',
      name: 'Base Camp',
      abbreviation: 'BC',
      website: 'https://example.com/base-camp',
      locationType: 'crag',
      parentId: 'region',
      activityTypes: ['Climbing/Sport Climbing', 'Climbing/Bouldering'],
    });

    const expected = {
      id: 'crag',
      name: 'Base Camp',
      abbreviation: 'BC',
      website: 'https://example.com/base-camp',
      locationType: 'crag',
      parentId: 'region',
      activityTypes: ['Climbing/Bouldering', 'Climbing/Sport Climbing'],
    };
    expect(created).toEqual(expected);
    expect(await repo.get('crag')).toEqual(expected);
  });

  it('stores an empty abbreviation as null', async () => {
    const created = await repo.create({ id: 'camp', name: 'Base Camp', abbreviation: '' });

    expect(created.abbreviation).toBeNull();
    expect(created.locationType).toBe('other');
  });

  it('validates names and websites', async () => {
    await expect(repo.create({ name: '' })).rejects.toThrow(EmptyFieldError);
    await expect(repo.create({ name: 'BC' })).rejects.toThrow(ValidationError);
    await expect(repo.create({ name: 'Base Camp', website: 'base camp' })).rejects.toThrow(
      ValidationError
    );
    await expect(repo.create({ name: 'Base Camp', abbreviation: 'B' })).rejects.toThrow(
      'abbreviation'
    );
    expect(testDb.writes()).toHaveLength(0);
  });

  it('returns null for unknown ids', async () => {
    expect(await repo.get('missing')).toBeNull();
  });
});

describe('update', () => {
  beforeEach(async () => {
    await repo.create({
      id: 'camp',
      name: 'Base Camp',
      abbreviation: 'BC',
      website: 'https://example.com',
      locationType: 'area',
      activityTypes: ['Hiking/Hiking Trail'],
    });
    testDb.statements.length = 0;
  });

  it('leaves omitted fields as they are', async () => {
    await repo.update('camp', { abbreviation: undefined, name: 'Base Camp North' });

    expect(await repo.get('camp')).toMatchObject({
      name: 'Base Camp North',
      abbreviation: 'BC',
      website: 'https://example.com',
      locationType: 'area',
    });
  });

  it('clears with the empty string, then keeps the cleared value', async () => {
    await repo.update('camp', { abbreviation: '' });
    expect((await repo.get('camp'))?.abbreviation).toBeNull();

    await repo.update('camp', { abbreviation: undefined });
    expect((await repo.get('camp'))?.abbreviation).toBeNull();
  });

  it('rejects clearing required fields', async () => {
    await expect(repo.update('camp', { name: null })).rejects.toThrow('name cannot be empty');
    await expect(repo.update('camp', { locationType: null })).rejects.toThrow(
      'locationType cannot be empty'
    );
    expect(testDb.writes()).toHaveLength(0);
  });

  it('replaces activity types', async () => {
    await repo.update('camp', { activityTypes: ['Winter/Ski Touring', 'Winter/Snow Shoeing'] });
    expect((await repo.get('camp'))?.activityTypes).toEqual([
      'Winter/Ski Touring',
      'Winter/Snow Shoeing',
    ]);

    await repo.update('camp', { activityTypes: [] });
    expect((await repo.get('camp'))?.activityTypes).toEqual([]);
  });

  it('issues no statement for an empty request', async () => {
    await repo.update('camp', {});

    expect(testDb.statements).toHaveLength(0);
  });
});

describe('list', () => {
  beforeEach(async () => {
    await repo.create({ id: 'bavaria', name: 'Bavaria', locationType: 'region' });
    await repo.create({ id: 'jura', name: 'frankenjura', locationType: 'area', parentId: 'bavaria' });
    await repo.create({ id: 'kochel', name: 'Kochel', locationType: 'crag', parentId: 'bavaria' });
    await repo.create({ id: 'gym', name: 'Boulderhalle', locationType: 'gym' });
  });

  it('orders by name ignoring case', async () => {
    const page = await repo.list();

    expect(page.items.map((l) => l.id)).toEqual(['bavaria', 'gym', 'jura', 'kochel']);
    expect(page.total).toBe(4);
  });

  it('filters by location type', async () => {
    const page = await repo.list({ locationTypes: ['crag', 'gym'] });

    expect(page.items.map((l) => l.id)).toEqual(['gym', 'kochel']);
  });

  it('filters by parent with the null marker', async () => {
    expect((await repo.list({ parentIds: ['bavaria'] })).items.map((l) => l.id)).toEqual([
      'jura',
      'kochel',
    ]);
    expect((await repo.list({ parentIds: [null] })).items.map((l) => l.id)).toEqual([
      'bavaria',
      'gym',
    ]);
    expect((await repo.list({ parentIds: ['bavaria', null] })).total).toBe(4);
  });

  it('pages results', async () => {
    const page = await repo.list({}, { skip: 2, limit: 1 });

    expect(page.items.map((l) => l.id)).toEqual(['jura']);
    expect(page.total).toBe(4);
  });
});

describe('delete', () => {
  it('detaches children', async () => {
    await repo.create({ id: 'bavaria', name: 'Bavaria' });
    await repo.create({ id: 'kochel', name: 'Kochel', parentId: 'bavaria' });

    await repo.delete('bavaria');

    expect(await repo.get('bavaria')).toBeNull();
    expect((await repo.get('kochel'))?.parentId).toBeNull();
  });
});

describe('getParentPath', () => {
  it('lists ancestors nearest first', async () => {
    await repo.create({ id: 'bavaria', name: 'Bavaria' });
    await repo.create({ id: 'jura', name: 'Frankenjura', parentId: 'bavaria' });
    await repo.create({ id: 'wall', name: 'Weißenstein', parentId: 'jura' });

    expect(await repo.getParentPath('wall')).toEqual([
      { id: 'jura', name: 'Frankenjura' },
      { id: 'bavaria', name: 'Bavaria' },
    ]);
    expect(await repo.getParentPath('bavaria')).toEqual([]);
  });
});

describe('favorites', () => {
  beforeEach(async () => {
    await testDb.db.insert(users).values([
      { id: 'user-a', email: 'a@example.com', hashedPassword: 'hash' },
      { id: 'user-b', email: 'b@example.com', hashedPassword: 'hash' },
    ]);
    await repo.create({ id: 'kochel', name: 'Kochel' });
    await repo.create({ id: 'jura', name: 'Frankenjura' });
  });

  it('adds favorites once', async () => {
    await repo.addFavorite('kochel', 'user-a');
    await repo.addFavorite('kochel', 'user-a');

    const rows = await testDb.db
      .select()
      .from(locationFavorites)
      .where(eq(locationFavorites.userId, 'user-a'));
    expect(rows).toEqual([{ locationId: 'kochel', userId: 'user-a' }]);
    expect(await repo.isFavorite('kochel', 'user-a')).toBe(true);
    expect(await repo.isFavorite('kochel', 'user-b')).toBe(false);
  });

  it('removes favorites', async () => {
    await repo.addFavorite('kochel', 'user-a');
    await repo.removeFavorite('kochel', 'user-a');

    expect(await repo.isFavorite('kochel', 'user-a')).toBe(false);
  });

  it('lists the favorites of a user by name', async () => {
    await repo.addFavorite('kochel', 'user-a');
    await repo.addFavorite('jura', 'user-a');
    await repo.addFavorite('jura', 'user-b');

    const page = await repo.listFavorites('user-a');

    expect(page.items.map((l) => l.name)).toEqual(['Frankenjura', 'Kochel']);
    expect(page.total).toBe(2);
    expect((await repo.listFavorites('user-b')).items.map((l) => l.id)).toEqual(['jura']);
  });

  it('drops favorites of deleted locations', async () => {
    await repo.addFavorite('kochel', 'user-a');
    await repo.delete('kochel');

    expect(await repo.listFavorites('user-a')).toEqual({ items: [], total: 0 });
  });
});
