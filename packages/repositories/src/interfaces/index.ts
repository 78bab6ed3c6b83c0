// Repository interfaces
// These define the contracts for data access, independent of the store.

export type {
  ActivityRepository,
  CreateActivityInput,
  UpdateActivityInput,
  ActivityFilter,
} from './activity-repository.js';

export type {
  LocationRepository,
  CreateLocationInput,
  UpdateLocationInput,
  LocationFilter,
} from './location-repository.js';

export type {
  ManufacturerRepository,
  CreateManufacturerInput,
  UpdateManufacturerInput,
  ManufacturerAccessInput,
  ManufacturerFilter,
} from './manufacturer-repository.js';

export type {
  TransactionRepository,
  CreateTransactionInput,
  UpdateTransactionInput,
  TransactionFilter,
} from './transaction-repository.js';

export type {
  UserRepository,
  CreateUserInput,
  UpdateUserInput,
  UserFilter,
} from './user-repository.js';

export type { PasswordHasher } from './password-hasher.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
