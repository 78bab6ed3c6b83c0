// Paged reads with a matching total count
//
// A list operation is a base select (table plus joins), a set of optional
// filter dimensions and an ordering. selectPage() applies the same combined
// predicate to the page query and the count query and runs both inside one
// read-only, repeatable-read transaction so they see the same snapshot.

import { and, count, getTableName, or, sql, type SQL } from 'drizzle-orm';
import type { PgColumn, PgSelect } from 'drizzle-orm/pg-core';
import type { PageRequest } from '@waypoint/protocol';
import { ValidationError } from '../errors.js';
import type { Database } from '../postgres/db.js';

/**
 * Page used when a list operation is called without one
 */
export const DEFAULT_PAGE: PageRequest = { skip: 0, limit: 100 };

/**
 * One filter dimension. undefined means the dimension is inactive.
 */
export type FilterDimension = SQL | undefined;

/**
 * AND the active dimensions. undefined when none is active.
 */
export function allOf(...dimensions: FilterDimension[]): SQL | undefined {
  return and(...dimensions);
}

/**
 * OR the active dimensions. undefined when none is active.
 */
export function anyOf(...dimensions: FilterDimension[]): SQL | undefined {
  return or(...dimensions);
}

/**
 * A column with its table name, for correlated subqueries in a selection.
 *
 * Single-table selects render columns without their table, so an outer
 * column inside a subquery would bind to a same-named inner column.
 */
export function qualified(column: PgColumn): SQL {
  return sql`${sql.identifier(getTableName(column.table))}.${sql.identifier(column.name)}`;
}

export type PageQuery<TSelect extends PgSelect> = {
  /**
   * Build the dynamic base select on the given handle. Called twice per
   * read: once for the page, once for the count.
   */
  source: (tx: Database) => TSelect;

  where: SQL | undefined;

  /**
   * Ordering of the page. End with a unique column to keep pages stable.
   */
  orderBy: (PgColumn | SQL | SQL.Aliased)[];

  page: PageRequest;
};

export type SelectedPage<TRows> = {
  rows: TRows;
  total: number;
};

/**
 * Reject negative or fractional pagination values.
 */
export function assertPageRequest(page: PageRequest): void {
  for (const key of ['skip', 'limit'] as const) {
    const value = page[key];
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${key} must be a non-negative integer`, {
        field: key,
        details: { value },
      });
    }
  }
}

/**
 * Run the page query and the count query over the same predicate and snapshot.
 */
export async function selectPage<TSelect extends PgSelect>(
  db: Database,
  query: PageQuery<TSelect>
): Promise<SelectedPage<Awaited<TSelect>>> {
  assertPageRequest(query.page);

  return db.transaction(
    async (tx) => {
      const rows = await query
        .source(tx)
        .where(query.where)
        .orderBy(...query.orderBy)
        .offset(query.page.skip)
        .limit(query.page.limit);

      const matching = query.source(tx).where(query.where).as('matching');
      const [result] = await tx.select({ total: count() }).from(matching);

      return { rows, total: result?.total ?? 0 };
    },
    { isolationLevel: 'repeatable read', accessMode: 'read only' }
  );
}
