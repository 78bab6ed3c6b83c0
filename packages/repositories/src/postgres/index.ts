// Postgres storage: connection, schema and repositories
export { createDatabase, connect, type Database, type DatabaseConfig, type Schema } from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
