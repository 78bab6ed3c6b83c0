import { and, asc, eq, getTableColumns, sql } from 'drizzle-orm';
import { z } from 'zod';
import type {
  Id,
  Manufacturer,
  ManufacturerAccessRole,
  ManufacturerUserAccess,
  ManufacturerWithRole,
  Page,
  PageRequest,
} from '@waypoint/protocol';
import type { Database } from '../db.js';
import { manufacturers, manufacturerAccesses, users } from '../schema/index.js';
import type {
  ManufacturerRepository,
  CreateManufacturerInput,
  UpdateManufacturerInput,
  ManufacturerAccessInput,
  ManufacturerFilter,
} from '../../interfaces/index.js';
import { fields, resolveCreate, resolveUpdate, isEmptyChangeSet } from '../../core/update-resolver.js';
import { inArrayOrSkip } from '../../core/nullable-in-filter.js';
import { excluded, upsertAssociations } from '../../core/association-sync.js';
import { allOf, anyOf, selectPage, DEFAULT_PAGE } from '../../core/query-assembler.js';
import { userColumns } from './user-repository.js';
import { logger } from '../../logger.js';

const log = logger.child({ module: 'manufacturers' });

export const manufacturerFields = {
  name: fields.text('name', { required: true, minLength: 1, maxLength: 255 }),
  shortName: fields.text('shortName', { maxLength: 255 }),
  description: fields.text('description', { maxLength: 2048 }),
  website: fields.text('website', { url: true, maxLength: 2083 }),
  hidden: fields.value('hidden', z.boolean(), { required: true, defaultValue: true }),
};

const DEFAULT_ROLE: ManufacturerAccessRole = 'shared';

type ManufacturerRow = typeof manufacturers.$inferSelect;

function rowToManufacturer(row: ManufacturerRow): Manufacturer {
  return {
    id: row.id,
    name: row.name,
    shortName: row.shortName,
    description: row.description,
    website: row.website,
    hidden: row.hidden,
  };
}

/**
 * One row per user; the last grant of a user wins
 */
function accessRows(manufacturerId: Id, accesses: readonly ManufacturerAccessInput[]) {
  const roles = new Map<Id, ManufacturerAccessRole>();
  for (const access of accesses) {
    roles.set(access.userId, access.role ?? DEFAULT_ROLE);
  }
  return [...roles].map(([userId, role]) => ({ manufacturerId, userId, role }));
}

/**
 * Visibility of manufacturers for a list request.
 *
 * Without a user only `hidden` filters. With a user, the user's grants
 * decide: a plain request sees public manufacturers OR those the user has
 * access to; every further dimension narrows with AND.
 */
function visibleTo(filter: ManufacturerFilter) {
  const { userId, hidden } = filter;
  const roles = filter.accessRoles?.length ? filter.accessRoles : undefined;

  if (userId === undefined) {
    return hidden === undefined ? undefined : eq(manufacturers.hidden, hidden);
  }

  const publicOnly = roles === undefined && hidden === false;
  const byUser = publicOnly ? undefined : eq(manufacturerAccesses.userId, userId);
  const byRole = inArrayOrSkip(manufacturerAccesses.role, roles);
  const byHidden =
    hidden !== undefined
      ? eq(manufacturers.hidden, hidden)
      : roles === undefined
        ? eq(manufacturers.hidden, false)
        : undefined;

  if (roles === undefined && hidden === undefined) {
    return anyOf(byUser, byHidden);
  }
  return allOf(byUser, byRole, byHidden);
}

export class PgManufacturerRepository implements ManufacturerRepository {
  constructor(private db: Database) {}

  async create(input: CreateManufacturerInput): Promise<Manufacturer> {
    const id = input.id ?? crypto.randomUUID();
    const values = {
      id,
      name: resolveCreate(manufacturerFields.name, input.name),
      shortName: resolveCreate(manufacturerFields.shortName, input.shortName),
      description: resolveCreate(manufacturerFields.description, input.description),
      website: resolveCreate(manufacturerFields.website, input.website),
      hidden: resolveCreate(manufacturerFields.hidden, input.hidden),
    };

    const row = await this.db.transaction(async (tx) => {
      const [created] = await tx.insert(manufacturers).values(values).returning();
      await this.upsertAccesses(tx, id, input.accesses ?? []);
      return created;
    });

    log.debug({ manufacturerId: id }, 'created manufacturer');
    return rowToManufacturer(row);
  }

  async get(id: Id): Promise<Manufacturer | null> {
    const [row] = await this.db.select().from(manufacturers).where(eq(manufacturers.id, id));
    return row ? rowToManufacturer(row) : null;
  }

  async getByName(name: string, options: { hidden?: boolean } = {}): Promise<Manufacturer | null> {
    const [row] = await this.db
      .select()
      .from(manufacturers)
      .where(
        and(
          eq(manufacturers.name, name),
          options.hidden === undefined ? undefined : eq(manufacturers.hidden, options.hidden)
        )
      )
      .orderBy(asc(manufacturers.id))
      .limit(1);
    return row ? rowToManufacturer(row) : null;
  }

  async list(
    filter: ManufacturerFilter = {},
    page: PageRequest = DEFAULT_PAGE
  ): Promise<Page<ManufacturerWithRole>> {
    const { userId } = filter;
    const grantOfUser = and(
      eq(manufacturerAccesses.manufacturerId, manufacturers.id),
      userId === undefined ? sql`false` : eq(manufacturerAccesses.userId, userId)
    );

    log.debug({ filter, page }, 'list manufacturers');

    const { rows, total } = await selectPage(this.db, {
      source: (tx) =>
        tx
          .select({ ...getTableColumns(manufacturers), role: manufacturerAccesses.role })
          .from(manufacturers)
          .leftJoin(manufacturerAccesses, grantOfUser)
          .$dynamic(),
      where: visibleTo(filter),
      orderBy: [asc(sql`lower(${manufacturers.name})`), asc(manufacturers.id)],
      page,
    });

    return {
      items: rows.map(({ role, ...manufacturer }) => ({
        manufacturer: rowToManufacturer(manufacturer),
        role,
      })),
      total,
    };
  }

  async update(id: Id, input: UpdateManufacturerInput): Promise<void> {
    const changes = {
      name: resolveUpdate(manufacturerFields.name, input.name),
      shortName: resolveUpdate(manufacturerFields.shortName, input.shortName),
      description: resolveUpdate(manufacturerFields.description, input.description),
      website: resolveUpdate(manufacturerFields.website, input.website),
      hidden: resolveUpdate(manufacturerFields.hidden, input.hidden),
    };

    if (isEmptyChangeSet(changes)) {
      log.debug({ manufacturerId: id }, 'nothing to update');
      return;
    }

    await this.db.update(manufacturers).set(changes).where(eq(manufacturers.id, id));
    log.debug({ manufacturerId: id, fields: Object.keys(input) }, 'updated manufacturer');
  }

  async delete(id: Id): Promise<void> {
    await this.db.delete(manufacturers).where(eq(manufacturers.id, id));
    log.debug({ manufacturerId: id }, 'deleted manufacturer');
  }

  async setAccess(
    manufacturerId: Id,
    userId: Id,
    role: ManufacturerAccessRole = DEFAULT_ROLE
  ): Promise<void> {
    await this.upsertAccesses(this.db, manufacturerId, [{ userId, role }]);
    log.debug({ manufacturerId, userId, role }, 'set manufacturer access');
  }

  async setAccesses(
    manufacturerId: Id,
    accesses: readonly ManufacturerAccessInput[]
  ): Promise<void> {
    await this.db.transaction((tx) => this.upsertAccesses(tx, manufacturerId, accesses));
    log.debug({ manufacturerId, count: accesses.length }, 'set manufacturer accesses');
  }

  async getAccess(manufacturerId: Id, userId: Id): Promise<ManufacturerAccessRole | null> {
    const [row] = await this.db
      .select({ role: manufacturerAccesses.role })
      .from(manufacturerAccesses)
      .where(
        and(
          eq(manufacturerAccesses.manufacturerId, manufacturerId),
          eq(manufacturerAccesses.userId, userId)
        )
      );
    return row ? row.role : null;
  }

  async listAccesses(manufacturerId: Id): Promise<ManufacturerUserAccess[]> {
    return this.db
      .select({ role: manufacturerAccesses.role, user: userColumns })
      .from(manufacturerAccesses)
      .innerJoin(users, eq(users.id, manufacturerAccesses.userId))
      .where(eq(manufacturerAccesses.manufacturerId, manufacturerId))
      .orderBy(asc(sql`lower(${users.email})`), asc(users.id));
  }

  async removeAccess(manufacturerId: Id, userId: Id): Promise<void> {
    await this.db
      .delete(manufacturerAccesses)
      .where(
        and(
          eq(manufacturerAccesses.manufacturerId, manufacturerId),
          eq(manufacturerAccesses.userId, userId)
        )
      );
    log.debug({ manufacturerId, userId }, 'removed manufacturer access');
  }

  async removeAllAccesses(manufacturerId: Id): Promise<void> {
    await this.db
      .delete(manufacturerAccesses)
      .where(eq(manufacturerAccesses.manufacturerId, manufacturerId));
    log.debug({ manufacturerId }, 'removed all manufacturer accesses');
  }

  private upsertAccesses(
    tx: Database,
    manufacturerId: Id,
    accesses: readonly ManufacturerAccessInput[]
  ) {
    return upsertAssociations(tx, {
      table: manufacturerAccesses,
      target: [manufacturerAccesses.manufacturerId, manufacturerAccesses.userId],
      rows: accessRows(manufacturerId, accesses),
      set: { role: excluded(manufacturerAccesses.role) },
    });
  }
}
