import { eq, sql, asc } from 'drizzle-orm';
import { z } from 'zod';
import {
  TRANSACTION_CATEGORIES,
  type Id,
  type Page,
  type PageRequest,
  type Transaction,
} from '@waypoint/protocol';
import type { Database } from '../db.js';
import { transactions } from '../schema/index.js';
import type {
  TransactionRepository,
  CreateTransactionInput,
  UpdateTransactionInput,
  TransactionFilter,
} from '../../interfaces/index.js';
import { fields, resolveCreate, resolveUpdate, isEmptyChangeSet } from '../../core/update-resolver.js';
import { inArrayOrSkip, inArrayWithNull } from '../../core/nullable-in-filter.js';
import { allOf, selectPage, DEFAULT_PAGE } from '../../core/query-assembler.js';
import { logger } from '../../logger.js';

const log = logger.child({ module: 'transactions' });

export const transactionFields = {
  activityId: fields.reference('activityId'),
  locationId: fields.reference('locationId'),
  userId: fields.reference('userId'),
  date: fields.datetime('date'),
  amount: fields.value('amount', z.number().int()),
  category: fields.value('category', z.enum(TRANSACTION_CATEGORIES)),
  description: fields.text('description', { maxLength: 2048 }),
  note: fields.text('note', { maxLength: 1024 }),
};

type TransactionRow = typeof transactions.$inferSelect;

function rowToTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    activityId: row.activityId,
    locationId: row.locationId,
    userId: row.userId,
    date: row.date?.toISOString() ?? null,
    amount: row.amount,
    category: row.category,
    description: row.description,
    note: row.note,
  };
}

export class PgTransactionRepository implements TransactionRepository {
  constructor(private db: Database) {}

  async create(input: CreateTransactionInput): Promise<Transaction> {
    const id = input.id ?? crypto.randomUUID();

    const [row] = await this.db
      .insert(transactions)
      .values({
        id,
        activityId: resolveCreate(transactionFields.activityId, input.activityId),
        locationId: resolveCreate(transactionFields.locationId, input.locationId),
        userId: resolveCreate(transactionFields.userId, input.userId),
        date: resolveCreate(transactionFields.date, input.date),
        amount: resolveCreate(transactionFields.amount, input.amount),
        category: resolveCreate(transactionFields.category, input.category),
        description: resolveCreate(transactionFields.description, input.description),
        note: resolveCreate(transactionFields.note, input.note),
      })
      .returning();

    log.debug({ transactionId: id }, 'created transaction');
    return rowToTransaction(row);
  }

  async get(id: Id): Promise<Transaction | null> {
    const [row] = await this.db.select().from(transactions).where(eq(transactions.id, id));
    return row ? rowToTransaction(row) : null;
  }

  async list(
    filter: TransactionFilter = {},
    page: PageRequest = DEFAULT_PAGE
  ): Promise<Page<Transaction>> {
    log.debug({ filter, page }, 'list transactions');

    const { rows, total } = await selectPage(this.db, {
      source: (tx) => tx.select().from(transactions).$dynamic(),
      where: allOf(
        inArrayOrSkip(transactions.userId, filter.userIds),
        inArrayWithNull(transactions.activityId, filter.activityIds),
        inArrayWithNull(transactions.locationId, filter.locationIds)
      ),
      orderBy: [sql`${transactions.date} desc nulls last`, asc(transactions.id)],
      page,
    });

    return { items: rows.map(rowToTransaction), total };
  }

  async update(id: Id, input: UpdateTransactionInput): Promise<void> {
    const changes = {
      activityId: resolveUpdate(transactionFields.activityId, input.activityId),
      locationId: resolveUpdate(transactionFields.locationId, input.locationId),
      userId: resolveUpdate(transactionFields.userId, input.userId),
      date: resolveUpdate(transactionFields.date, input.date),
      amount: resolveUpdate(transactionFields.amount, input.amount),
      category: resolveUpdate(transactionFields.category, input.category),
      description: resolveUpdate(transactionFields.description, input.description),
      note: resolveUpdate(transactionFields.note, input.note),
    };

    if (isEmptyChangeSet(changes)) {
      log.debug({ transactionId: id }, 'nothing to update');
      return;
    }

    await this.db.update(transactions).set(changes).where(eq(transactions.id, id));
    log.debug({ transactionId: id, fields: Object.keys(input) }, 'updated transaction');
  }

  async delete(id: Id): Promise<void> {
    await this.db.delete(transactions).where(eq(transactions.id, id));
    log.debug({ transactionId: id }, 'deleted transaction');
  }
}
