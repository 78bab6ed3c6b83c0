// Transaction types - money spent or received

import type { Id, Timestamp } from './common.js';

export const TRANSACTION_CATEGORIES = [
  'Other',
  'Food',
  'Travel',
  'Accommodation',
  'Equipment',
  'Fees',
] as const;

export type TransactionCategory = (typeof TRANSACTION_CATEGORIES)[number];

/**
 * A Transaction is a single expense or income.
 *
 * All references are soft: deleting the activity, location or user
 * keeps the transaction and clears the reference.
 */
export type Transaction = {
  id: Id;
  activityId: Id | null;
  locationId: Id | null;
  userId: Id | null;
  date: Timestamp | null;

  /**
   * Amount in minor currency units. Negative values are expenses.
   */
  amount: number | null;

  category: TransactionCategory | null;
  description: string | null;
  note: string | null;
};
