import { pgTable, text, boolean, index, primaryKey } from 'drizzle-orm/pg-core';
import { MANUFACTURER_ACCESS_ROLES } from '@waypoint/protocol';
import { users } from './users.js';

/**
 * Equipment manufacturers. Hidden manufacturers are visible only to users
 * holding an access grant.
 */
export const manufacturers = pgTable(
  'equipment_manufacturers',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    shortName: text('short_name'),
    description: text('description'),
    website: text('website'),
    hidden: boolean('hidden').notNull().default(true),
  },
  (table) => [index('equipment_manufacturers_name_idx').on(table.name)]
);

/**
 * Access grants: one role per (manufacturer, user).
 */
export const manufacturerAccesses = pgTable(
  'equipment_manufacturer_accesses',
  {
    manufacturerId: text('manufacturer_id')
      .notNull()
      .references(() => manufacturers.id, { onDelete: 'cascade' }),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    role: text('role', { enum: MANUFACTURER_ACCESS_ROLES }).notNull().default('shared'),
  },
  (table) => [
    primaryKey({ columns: [table.manufacturerId, table.userId] }),
    index('equipment_manufacturer_accesses_user_idx').on(table.userId),
  ]
);
