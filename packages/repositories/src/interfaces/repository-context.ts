import type { ActivityRepository } from './activity-repository.js';
import type { LocationRepository } from './location-repository.js';
import type { ManufacturerRepository } from './manufacturer-repository.js';
import type { TransactionRepository } from './transaction-repository.js';
import type { UserRepository } from './user-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * Pass a RepositoryContext to any code that needs data access, and you can
 * swap implementations without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const page = await repos.activities.listByUserId(userId);
 * ```
 */
export interface RepositoryContext {
  readonly activities: ActivityRepository;
  readonly locations: LocationRepository;
  readonly manufacturers: ManufacturerRepository;
  readonly transactions: TransactionRepository;
  readonly users: UserRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * @returns The return value of the function
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
