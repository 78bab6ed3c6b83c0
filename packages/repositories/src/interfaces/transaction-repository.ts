import type {
  EntityRef,
  Id,
  Page,
  PageRequest,
  Transaction,
  TransactionCategory,
} from '@waypoint/protocol';
import type { DateTimeInput } from '../core/datetime.js';

/**
 * Input for creating a new Transaction. Every field is optional.
 */
export type CreateTransactionInput = {
  id?: Id;
  activityId?: EntityRef | null;
  locationId?: EntityRef | null;
  userId?: EntityRef | null;
  date?: DateTimeInput | null;
  amount?: number | null;
  category?: TransactionCategory | null;
  description?: string | null;
  note?: string | null;
};

/**
 * Partial update of a Transaction
 */
export type UpdateTransactionInput = Omit<CreateTransactionInput, 'id'>;

/**
 * Filter for listing Transactions.
 * A null in `activityIds` or `locationIds` matches transactions without one.
 */
export type TransactionFilter = {
  userIds?: readonly Id[];
  activityIds?: readonly (Id | null)[];
  locationIds?: readonly (Id | null)[];
};

/**
 * Repository interface for Transaction operations.
 */
export interface TransactionRepository {
  create(input: CreateTransactionInput): Promise<Transaction>;

  /**
   * @returns Transaction or null if not found
   */
  get(id: Id): Promise<Transaction | null>;

  /**
   * List Transactions, most recent first
   */
  list(filter?: TransactionFilter, page?: PageRequest): Promise<Page<Transaction>>;

  update(id: Id, input: UpdateTransactionInput): Promise<void>;

  delete(id: Id): Promise<void>;
}
