import { and, asc, eq, getTableColumns, inArray, sql } from 'drizzle-orm';
import { z } from 'zod';
import {
  LOCATION_TYPES,
  type ActivityType,
  type Id,
  type Location,
  type LocationType,
  type Page,
  type PageRequest,
  type ParentPathEntry,
} from '@waypoint/protocol';
import type { Database } from '../db.js';
import { locations, locationActivityTypes, locationFavorites } from '../schema/index.js';
import type {
  LocationRepository,
  CreateLocationInput,
  UpdateLocationInput,
  LocationFilter,
} from '../../interfaces/index.js';
import { fields, resolveCreate, resolveUpdate, isEmptyChangeSet } from '../../core/update-resolver.js';
import { inArrayOrSkip, inArrayWithNull } from '../../core/nullable-in-filter.js';
import { replaceAssociations } from '../../core/association-sync.js';
import { allOf, qualified, selectPage, DEFAULT_PAGE } from '../../core/query-assembler.js';
import { walkParentPath } from '../../core/parent-path.js';
import { logger } from '../../logger.js';

const log = logger.child({ module: 'locations' });

export const locationFields = {
  name: fields.text('name', { required: true, minLength: 3, maxLength: 255 }),
  abbreviation: fields.text('abbreviation', { minLength: 2, maxLength: 255 }),
  website: fields.text('website', { url: true, maxLength: 2083 }),
  locationType: fields.value<LocationType>('locationType', z.enum(LOCATION_TYPES), {
    required: true,
    defaultValue: 'other',
  }),
  parentId: fields.reference('parentId'),
};

/**
 * Location columns plus its activity types, for selects from `locations`
 */
export const locationColumns = {
  ...getTableColumns(locations),
  activityTypes: sql<ActivityType[]>`array(
    select ${locationActivityTypes.activityType} from ${locationActivityTypes}
    where ${locationActivityTypes.locationId} = ${qualified(locations.id)}
    order by 1)`.as('activity_type_list'),
};

/**
 * Case-insensitive name, then id
 */
export const locationOrder = [asc(sql`lower(${locations.name})`), asc(locations.id)];

type LocationRow = typeof locations.$inferSelect & { activityTypes: ActivityType[] };

export function rowToLocation(row: LocationRow): Location {
  return {
    id: row.id,
    name: row.name,
    abbreviation: row.abbreviation,
    website: row.website,
    locationType: row.locationType,
    parentId: row.parentId,
    activityTypes: row.activityTypes,
  };
}

export class PgLocationRepository implements LocationRepository {
  constructor(private db: Database) {}

  async create(input: CreateLocationInput): Promise<Location> {
    const id = input.id ?? crypto.randomUUID();
    const values = {
      id,
      name: resolveCreate(locationFields.name, input.name),
      abbreviation: resolveCreate(locationFields.abbreviation, input.abbreviation),
      website: resolveCreate(locationFields.website, input.website),
      locationType: resolveCreate(locationFields.locationType, input.locationType),
      parentId: resolveCreate(locationFields.parentId, input.parentId),
    };

    const row = await this.db.transaction(async (tx) => {
      await tx.insert(locations).values(values);
      await this.syncActivityTypes(tx, id, input.activityTypes);

      const [created] = await tx.select(locationColumns).from(locations).where(eq(locations.id, id));
      return created;
    });

    log.debug({ locationId: id }, 'created location');
    return rowToLocation(row);
  }

  async get(id: Id): Promise<Location | null> {
    const [row] = await this.db.select(locationColumns).from(locations).where(eq(locations.id, id));
    return row ? rowToLocation(row) : null;
  }

  async list(filter: LocationFilter = {}, page: PageRequest = DEFAULT_PAGE): Promise<Page<Location>> {
    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select(locationColumns).from(locations).$dynamic(),
      where: allOf(
        inArrayOrSkip(locations.locationType, filter.locationTypes),
        inArrayWithNull(locations.parentId, filter.parentIds)
      ),
      orderBy: locationOrder,
      page,
    });

    return { items: rows.map(rowToLocation), total };
  }

  async update(id: Id, input: UpdateLocationInput): Promise<void> {
    const changes = {
      name: resolveUpdate(locationFields.name, input.name),
      abbreviation: resolveUpdate(locationFields.abbreviation, input.abbreviation),
      website: resolveUpdate(locationFields.website, input.website),
      locationType: resolveUpdate(locationFields.locationType, input.locationType),
      parentId: resolveUpdate(locationFields.parentId, input.parentId),
    };
    const hasChanges = !isEmptyChangeSet(changes);

    if (!hasChanges && input.activityTypes === undefined) {
      log.debug({ locationId: id }, 'nothing to update');
      return;
    }

    await this.db.transaction(async (tx) => {
      const found = hasChanges
        ? await tx
            .update(locations)
            .set(changes)
            .where(eq(locations.id, id))
            .returning({ id: locations.id })
        : await tx.select({ id: locations.id }).from(locations).where(eq(locations.id, id));

      if (found.length === 0) return;

      await this.syncActivityTypes(tx, id, input.activityTypes);
    });

    log.debug({ locationId: id, fields: Object.keys(input) }, 'updated location');
  }

  async delete(id: Id): Promise<void> {
    await this.db.delete(locations).where(eq(locations.id, id));
    log.debug({ locationId: id }, 'deleted location');
  }

  async getParentPath(id: Id): Promise<ParentPathEntry[]> {
    const [start] = await this.db
      .select({ parentId: locations.parentId })
      .from(locations)
      .where(eq(locations.id, id));
    if (!start) return [];

    return walkParentPath(id, start.parentId, async (parentId) => {
      const [node] = await this.db
        .select({ id: locations.id, name: locations.name, parentId: locations.parentId })
        .from(locations)
        .where(eq(locations.id, parentId));
      return node ?? null;
    });
  }

  async addFavorite(locationId: Id, userId: Id): Promise<void> {
    await this.db.insert(locationFavorites).values({ locationId, userId }).onConflictDoNothing();
  }

  async isFavorite(locationId: Id, userId: Id): Promise<boolean> {
    const rows = await this.db
      .select({ locationId: locationFavorites.locationId })
      .from(locationFavorites)
      .where(and(eq(locationFavorites.locationId, locationId), eq(locationFavorites.userId, userId)))
      .limit(1);
    return rows.length > 0;
  }

  async removeFavorite(locationId: Id, userId: Id): Promise<void> {
    await this.db
      .delete(locationFavorites)
      .where(and(eq(locationFavorites.locationId, locationId), eq(locationFavorites.userId, userId)));
  }

  async listFavorites(userId: Id, page: PageRequest = DEFAULT_PAGE): Promise<Page<Location>> {
    const favorites = this.db
      .select({ id: locationFavorites.locationId })
      .from(locationFavorites)
      .where(eq(locationFavorites.userId, userId));

    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select(locationColumns).from(locations).$dynamic(),
      where: inArray(locations.id, favorites),
      orderBy: locationOrder,
      page,
    });

    return { items: rows.map(rowToLocation), total };
  }

  private syncActivityTypes(
    tx: Database,
    locationId: Id,
    activityTypes: readonly ActivityType[] | undefined
  ) {
    return replaceAssociations(tx, {
      table: locationActivityTypes,
      owner: locationActivityTypes.locationId,
      ownerId: locationId,
      targets: activityTypes,
      toRow: (ownerId, activityType) => ({ locationId: ownerId, activityType }),
    });
  }
}
