// @waypoint/repositories
// Data access for the tracker: repository interfaces, the shared update,
// filter, association and paging core, and the Postgres implementation.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Updates are sparse: omitted fields stay, null clears, values set

export * from './interfaces/index.js';
export * from './errors.js';
export { loadConfig, type Config, type LogLevel } from './config.js';
export { logger, type Logger } from './logger.js';
export { createBcryptPasswordHasher, DEFAULT_BCRYPT_ROUNDS } from './auth/bcrypt-password-hasher.js';
export type { DateTimeInput } from './core/datetime.js';
export { DEFAULT_PAGE } from './core/query-assembler.js';
export * as postgres from './postgres/index.js';
