// In-process Postgres for repository tests
//
// Every test file gets its own PGlite instance with the checked-in
// migrations applied through Drizzle's migrator. Statements issued through
// Drizzle are recorded so tests can assert on what was (or was not) written.

import { fileURLToPath } from 'node:url';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { migrate } from 'drizzle-orm/pglite/migrator';
import * as schema from '../postgres/schema/index.js';
import type { Database } from '../postgres/db.js';

export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

const TABLES = [
  'transactions',
  'equipment_manufacturer_accesses',
  'equipment_manufacturers',
  'activity_types',
  'activity_users',
  'activities',
  'location_favorites',
  'location_activity_types',
  'locations',
  'users',
];

export type RecordedStatement = {
  sql: string;
  params: unknown[];
};

export type TestDatabase = {
  db: Database;
  statements: RecordedStatement[];

  /**
   * Statements that modify rows (INSERT, UPDATE, DELETE)
   */
  writes(): RecordedStatement[];

  /**
   * Empty every table and forget recorded statements.
   */
  reset(): Promise<void>;

  close(): Promise<void>;
};

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();

  const statements: RecordedStatement[] = [];
  const pglite = drizzle(client, {
    schema,
    logger: {
      logQuery(sql, params) {
        statements.push({ sql, params });
      },
    },
  });
  await migrate(pglite, { migrationsFolder: MIGRATIONS_FOLDER });
  statements.length = 0;

  const db: Database = pglite;

  return {
    db,
    statements,
    writes: () => statements.filter((s) => /^\s*(insert|update|delete)\b/i.test(s.sql)),
    async reset() {
      await client.exec(`TRUNCATE ${TABLES.map((t) => `"${t}"`).join(', ')} CASCADE`);
      statements.length = 0;
    },
    close: () => client.close(),
  };
}
