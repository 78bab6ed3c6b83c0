import type { Database } from '../db.js';
import type {
  PasswordHasher,
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgActivityRepository } from './activity-repository.js';
import { PgLocationRepository } from './location-repository.js';
import { PgManufacturerRepository } from './manufacturer-repository.js';
import { PgTransactionRepository } from './transaction-repository.js';
import { PgUserRepository } from './user-repository.js';
import { createBcryptPasswordHasher } from '../../auth/bcrypt-password-hasher.js';

export type PgRepositoryContextOptions = {
  /**
   * Defaults to bcrypt
   */
  passwordHasher?: PasswordHasher;
};

function createRepositories(db: Database, passwordHasher: PasswordHasher): RepositoryContext {
  return {
    activities: new PgActivityRepository(db),
    locations: new PgLocationRepository(db),
    manufacturers: new PgManufacturerRepository(db),
    transactions: new PgTransactionRepository(db),
    users: new PgUserRepository(db, passwordHasher),
  };
}

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = connect();
 * const repos = createPgRepositoryContext(db);
 *
 * const activity = await repos.activities.create({ title: 'Morning run' });
 * ```
 */
export function createPgRepositoryContext(
  db: Database,
  options: PgRepositoryContextOptions = {}
): RepositoryContext {
  return createRepositories(db, options.passwordHasher ?? createBcryptPasswordHasher());
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * // Create an activity and book its costs atomically
 * await repos.transaction(async (txRepos) => {
 *   const activity = await txRepos.activities.create({ title: 'Hut trip' });
 *   await txRepos.transactions.create({ activityId: activity, amount: -4500 });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database,
  options: PgRepositoryContextOptions = {}
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(
    db,
    options.passwordHasher ?? createBcryptPasswordHasher()
  );
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * Repositories handed to transaction() callbacks run on the transaction
 * handle; their own transactions become savepoints.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly activities: PgActivityRepository;
  readonly locations: PgLocationRepository;
  readonly manufacturers: PgManufacturerRepository;
  readonly transactions: PgTransactionRepository;
  readonly users: PgUserRepository;

  constructor(
    private db: Database,
    private passwordHasher: PasswordHasher
  ) {
    this.activities = new PgActivityRepository(db);
    this.locations = new PgLocationRepository(db);
    this.manufacturers = new PgManufacturerRepository(db);
    this.transactions = new PgTransactionRepository(db);
    this.users = new PgUserRepository(db, passwordHasher);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction((tx) => fn(createRepositories(tx, this.passwordHasher)));
  }
}
