import { pgTable, text, timestamp, integer, index } from 'drizzle-orm/pg-core';
import { TRANSACTION_CATEGORIES } from '@waypoint/protocol';
import { users } from './users.js';
import { locations } from './locations.js';
import { activities } from './activities.js';

/**
 * Transactions table - money spent or received, in minor units.
 */
export const transactions = pgTable(
  'transactions',
  {
    id: text('id').primaryKey(),
    activityId: text('activity_id').references(() => activities.id, { onDelete: 'set null' }),
    locationId: text('location_id').references(() => locations.id, { onDelete: 'set null' }),
    userId: text('user_id').references(() => users.id, { onDelete: 'set null' }),
    date: timestamp('date', { withTimezone: true }),
    amount: integer('amount'),
    category: text('category', { enum: TRANSACTION_CATEGORIES }),
    description: text('description'),
    note: text('note'),
  },
  (table) => [
    index('transactions_activity_idx').on(table.activityId),
    index('transactions_location_idx').on(table.locationId),
    index('transactions_user_idx').on(table.userId),
    index('transactions_date_idx').on(table.date),
  ]
);
