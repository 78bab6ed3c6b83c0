// Transaction totals

import type { Id } from '../types/common.js';
import type { Transaction } from '../types/transactions.js';

/**
 * Sum the amounts of the given transactions.
 *
 * When `userIds` is non-empty only transactions owned by one of those users
 * count. Transactions without an amount count as zero.
 */
export function calcTransactionsTotal(
  transactions: readonly Pick<Transaction, 'amount' | 'userId'>[],
  userIds?: Iterable<Id>
): number {
  const owners = new Set(userIds ?? []);
  const counted =
    owners.size === 0
      ? transactions
      : transactions.filter((t) => t.userId !== null && owners.has(t.userId));

  return counted.reduce((total, t) => total + (t.amount ?? 0), 0);
}
