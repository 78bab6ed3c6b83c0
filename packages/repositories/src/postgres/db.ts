import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';
import { loadConfig, type Config } from '../config.js';
import { logger } from '../logger.js';

export type Schema = typeof schema;

/**
 * Any Drizzle handle over the tracker schema: a pooled connection or a
 * transaction opened on one. Repositories accept either.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  const db: Database = drizzle(client, { schema });

  return { db, client };
}

/**
 * Create a database from the environment configuration.
 */
export function connect(config: Config = loadConfig()) {
  const { host, pathname } = new URL(config.database.url);
  logger.info(
    { host, database: pathname.slice(1), maxConnections: config.database.maxConnections },
    'connecting to database'
  );

  return createDatabase({
    connectionString: config.database.url,
    maxConnections: config.database.maxConnections,
  });
}
