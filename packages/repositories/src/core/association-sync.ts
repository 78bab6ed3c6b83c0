// Replace-all synchronization of association (join) tables
//
// These helpers issue statements on the handle they are given and never
// open, commit or roll back a transaction themselves. Callers run them
// inside the transaction that also carries the owner's UPDATE, so a failure
// anywhere leaves the previous association set in place.

import { eq, sql, type SQL } from 'drizzle-orm';
import type { PgColumn, PgInsertValue, PgTable, PgUpdateSetSource } from 'drizzle-orm/pg-core';
import type { Id } from '@waypoint/protocol';
import type { Database } from '../postgres/db.js';

export type ReplaceAssociationsOptions<TTable extends PgTable, TTarget> = {
  table: TTable;

  /**
   * Column of `table` holding the owner's identifier
   */
  owner: PgColumn;

  ownerId: Id;

  /**
   * Desired set of targets. undefined leaves the association untouched,
   * an empty collection removes every row of the owner.
   */
  targets: Iterable<TTarget> | undefined;

  toRow: (ownerId: Id, target: TTarget) => PgInsertValue<TTable>;
};

/**
 * Make the owner's rows in an association table equal to `targets`:
 * delete all of them, then insert one row per distinct target.
 *
 * @returns true when the association was rewritten, false when skipped
 */
export async function replaceAssociations<TTable extends PgTable, TTarget>(
  tx: Database,
  options: ReplaceAssociationsOptions<TTable, TTarget>
): Promise<boolean> {
  if (options.targets === undefined) return false;

  const targets = [...new Set(options.targets)];

  await tx.delete(options.table).where(eq(options.owner, options.ownerId));

  if (targets.length > 0) {
    await tx
      .insert(options.table)
      .values(targets.map((target) => options.toRow(options.ownerId, target)));
  }

  return true;
}

export type UpsertAssociationsOptions<TTable extends PgTable> = {
  table: TTable;

  /**
   * Columns of the association's composite key
   */
  target: PgColumn[];

  /**
   * Rows to insert. Each key must appear at most once.
   */
  rows: PgInsertValue<TTable>[];

  /**
   * Columns to overwrite when a row with the same key exists
   */
  set: PgUpdateSetSource<TTable>;
};

/**
 * Insert association rows, updating rows whose key already exists.
 * Rows of the owner that are not listed stay as they are.
 */
export async function upsertAssociations<TTable extends PgTable>(
  tx: Database,
  options: UpsertAssociationsOptions<TTable>
): Promise<void> {
  if (options.rows.length === 0) return;

  await tx
    .insert(options.table)
    .values(options.rows)
    .onConflictDoUpdate({ target: options.target, set: options.set });
}

/**
 * The value proposed for `column` by the conflicting insert, for use in
 * an upsert's `set`.
 */
export function excluded(column: PgColumn): SQL {
  return sql.raw(`excluded."${column.name}"`);
}
