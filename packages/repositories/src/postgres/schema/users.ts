import { pgTable, text, boolean, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Users table - accounts that take part in activities and own transactions.
 */
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    hashedPassword: text('hashed_password').notNull(),
    fullName: text('full_name'),
    isActive: boolean('is_active').notNull().default(true),
    isSuperuser: boolean('is_superuser').notNull().default(false),
  },
  (table) => [uniqueIndex('users_email_idx').on(table.email)]
);
