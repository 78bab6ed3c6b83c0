// Postgres repository implementations
export { PgActivityRepository, activityFields } from './activity-repository.js';
export { PgLocationRepository, locationFields } from './location-repository.js';
export { PgManufacturerRepository, manufacturerFields } from './manufacturer-repository.js';
export { PgTransactionRepository, transactionFields } from './transaction-repository.js';
export { PgUserRepository, userFields } from './user-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
  type PgRepositoryContextOptions,
} from './context.js';
