import { asc, eq, getTableColumns, inArray, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type {
  Activity,
  ActivityType,
  Id,
  Location,
  Page,
  PageRequest,
  ParentPathEntry,
} from '@waypoint/protocol';
import type { Database } from '../db.js';
import {
  activities,
  activityTypes,
  activityUsers,
  locations,
  transactions,
} from '../schema/index.js';
import type {
  ActivityRepository,
  CreateActivityInput,
  UpdateActivityInput,
  ActivityFilter,
} from '../../interfaces/index.js';
import { fields, resolveCreate, resolveUpdate, isEmptyChangeSet } from '../../core/update-resolver.js';
import { inArrayOrSkip, inArrayWithNull } from '../../core/nullable-in-filter.js';
import { replaceAssociations } from '../../core/association-sync.js';
import {
  allOf,
  assertPageRequest,
  qualified,
  selectPage,
  DEFAULT_PAGE,
} from '../../core/query-assembler.js';
import { walkParentPath } from '../../core/parent-path.js';
import { locationColumns, locationOrder, rowToLocation } from './location-repository.js';
import { logger } from '../../logger.js';

const log = logger.child({ module: 'activities' });

export const activityFields = {
  title: fields.text('title', { required: true, maxLength: 255 }),
  description: fields.text('description', { maxLength: 2048 }),
  start: fields.datetime('start'),
  durationSeconds: fields.value('durationSeconds', z.number().int().nonnegative()),
  locationId: fields.reference('locationId'),
  parentId: fields.reference('parentId'),
};

/**
 * Activity columns plus participants, types and the sum of its transactions
 */
const activityColumns = {
  ...getTableColumns(activities),
  userIds: sql<Id[]>`array(
    select ${activityUsers.userId} from ${activityUsers}
    where ${activityUsers.activityId} = ${qualified(activities.id)}
    order by 1)`.as('user_id_list'),
  types: sql<ActivityType[]>`array(
    select ${activityTypes.activityType} from ${activityTypes}
    where ${activityTypes.activityId} = ${qualified(activities.id)}
    order by 1)`.as('activity_type_list'),
  transactionsTotal: sql<number>`coalesce((
    select sum(${transactions.amount}) from ${transactions}
    where ${transactions.activityId} = ${qualified(activities.id)}), 0)`
    .mapWith(Number)
    .as('transactions_total'),
};

// Most recent first; activities without a start go last
const activityOrder = [sql`${activities.start} desc nulls last`, asc(activities.id)];

type ActivityRow = typeof activities.$inferSelect & {
  userIds: Id[];
  types: ActivityType[];
  transactionsTotal: number;
};

function rowToActivity(row: ActivityRow): Activity {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    start: row.start?.toISOString() ?? null,
    durationSeconds: row.durationSeconds,
    locationId: row.locationId,
    parentId: row.parentId,
    userIds: row.userIds,
    types: row.types,
    transactionsTotal: row.transactionsTotal,
  };
}

export class PgActivityRepository implements ActivityRepository {
  constructor(private db: Database) {}

  async create(input: CreateActivityInput): Promise<Activity> {
    const id = input.id ?? crypto.randomUUID();
    const values = {
      id,
      title: resolveCreate(activityFields.title, input.title),
      description: resolveCreate(activityFields.description, input.description),
      start: resolveCreate(activityFields.start, input.start),
      durationSeconds: resolveCreate(activityFields.durationSeconds, input.durationSeconds),
      locationId: resolveCreate(activityFields.locationId, input.locationId),
      parentId: resolveCreate(activityFields.parentId, input.parentId),
    };

    const row = await this.db.transaction(async (tx) => {
      await tx.insert(activities).values(values);
      await this.syncUsers(tx, id, input.userIds);
      await this.syncTypes(tx, id, input.types);

      const [created] = await tx
        .select(activityColumns)
        .from(activities)
        .where(eq(activities.id, id));
      return created;
    });

    log.debug({ activityId: id }, 'created activity');
    return rowToActivity(row);
  }

  async get(id: Id): Promise<Activity | null> {
    const [row] = await this.db
      .select(activityColumns)
      .from(activities)
      .where(eq(activities.id, id));
    return row ? rowToActivity(row) : null;
  }

  async list(filter: ActivityFilter = {}, page: PageRequest = DEFAULT_PAGE): Promise<Page<Activity>> {
    const byUser = inArrayOrSkip(activityUsers.userId, filter.userIds);
    const byType = inArrayOrSkip(activityTypes.activityType, filter.types);

    log.debug({ filter, page }, 'list activities');

    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select(activityColumns).from(activities).$dynamic(),
      where: allOf(
        byUser && inArray(activities.id, this.participatedIn(byUser)),
        inArrayWithNull(activities.locationId, filter.locationIds),
        inArrayWithNull(activities.parentId, filter.parentIds),
        byType &&
          inArray(
            activities.id,
            this.db.select({ id: activityTypes.activityId }).from(activityTypes).where(byType)
          )
      ),
      orderBy: activityOrder,
      page,
    });

    return { items: rows.map(rowToActivity), total };
  }

  listByUserId(userId: Id, page?: PageRequest): Promise<Page<Activity>> {
    return this.list({ userIds: [userId] }, page);
  }

  listByLocationId(locationId: Id | null, page?: PageRequest): Promise<Page<Activity>> {
    return this.list({ locationIds: [locationId] }, page);
  }

  async listLocationsByUserIds(
    userIds: readonly Id[],
    page: PageRequest = DEFAULT_PAGE
  ): Promise<Page<Location>> {
    assertPageRequest(page);

    const byUser = inArrayOrSkip(activityUsers.userId, userIds);
    if (!byUser) return { items: [], total: 0 };

    const visited = this.db
      .select({ id: activities.locationId })
      .from(activities)
      .where(inArray(activities.id, this.participatedIn(byUser)));

    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select(locationColumns).from(locations).$dynamic(),
      where: inArray(locations.id, visited),
      orderBy: locationOrder,
      page,
    });

    return { items: rows.map(rowToLocation), total };
  }

  async listTypesByUserIds(userIds: readonly Id[]): Promise<ActivityType[]> {
    const byUser = inArrayOrSkip(activityUsers.userId, userIds);
    if (!byUser) return [];

    const rows = await this.db
      .selectDistinct({ activityType: activityTypes.activityType })
      .from(activityTypes)
      .where(inArray(activityTypes.activityId, this.participatedIn(byUser)))
      .orderBy(asc(activityTypes.activityType));

    return rows.map((row) => row.activityType);
  }

  async getParentPath(id: Id): Promise<ParentPathEntry[]> {
    const [start] = await this.db
      .select({ parentId: activities.parentId })
      .from(activities)
      .where(eq(activities.id, id));
    if (!start) return [];

    return walkParentPath(id, start.parentId, async (parentId) => {
      const [node] = await this.db
        .select({ id: activities.id, name: activities.title, parentId: activities.parentId })
        .from(activities)
        .where(eq(activities.id, parentId));
      return node ?? null;
    });
  }

  async update(id: Id, input: UpdateActivityInput): Promise<void> {
    const changes = {
      title: resolveUpdate(activityFields.title, input.title),
      description: resolveUpdate(activityFields.description, input.description),
      start: resolveUpdate(activityFields.start, input.start),
      durationSeconds: resolveUpdate(activityFields.durationSeconds, input.durationSeconds),
      locationId: resolveUpdate(activityFields.locationId, input.locationId),
      parentId: resolveUpdate(activityFields.parentId, input.parentId),
    };
    const hasChanges = !isEmptyChangeSet(changes);

    if (!hasChanges && input.userIds === undefined && input.types === undefined) {
      log.debug({ activityId: id }, 'nothing to update');
      return;
    }

    await this.db.transaction(async (tx) => {
      const found = hasChanges
        ? await tx
            .update(activities)
            .set(changes)
            .where(eq(activities.id, id))
            .returning({ id: activities.id })
        : await tx.select({ id: activities.id }).from(activities).where(eq(activities.id, id));

      if (found.length === 0) return;

      await this.syncUsers(tx, id, input.userIds);
      await this.syncTypes(tx, id, input.types);
    });

    log.debug({ activityId: id, fields: Object.keys(input) }, 'updated activity');
  }

  async delete(id: Id): Promise<void> {
    await this.db.delete(activities).where(eq(activities.id, id));
    log.debug({ activityId: id }, 'deleted activity');
  }

  /**
   * IDs of activities with a participant matching `byUser`
   */
  private participatedIn(byUser: SQL) {
    return this.db
      .select({ id: activityUsers.activityId })
      .from(activityUsers)
      .where(byUser);
  }

  private syncUsers(tx: Database, activityId: Id, userIds: readonly Id[] | undefined) {
    return replaceAssociations(tx, {
      table: activityUsers,
      owner: activityUsers.activityId,
      ownerId: activityId,
      targets: userIds,
      toRow: (ownerId, userId) => ({ activityId: ownerId, userId }),
    });
  }

  private syncTypes(tx: Database, activityId: Id, types: readonly ActivityType[] | undefined) {
    return replaceAssociations(tx, {
      table: activityTypes,
      owner: activityTypes.activityId,
      ownerId: activityId,
      targets: types,
      toRow: (ownerId, activityType) => ({ activityId: ownerId, activityType }),
    });
  }
}
