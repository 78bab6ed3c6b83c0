import { pgTable, text, index, primaryKey, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { ACTIVITY_TYPES, LOCATION_TYPES } from '@waypoint/protocol';
import { users } from './users.js';

/**
 * Locations table - places, nested through parent_id (region > area > crag).
 */
export const locations = pgTable(
  'locations',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    abbreviation: text('abbreviation'),
    website: text('website'),
    locationType: text('location_type', { enum: LOCATION_TYPES }).notNull().default('other'),
    parentId: text('parent_id').references((): AnyPgColumn => locations.id, {
      onDelete: 'set null',
    }),
  },
  (table) => [
    index('locations_parent_idx').on(table.parentId),
    index('locations_type_idx').on(table.locationType),
  ]
);

/**
 * Activity types offered at a location.
 */
export const locationActivityTypes = pgTable(
  'location_activity_types',
  {
    locationId: text('location_id')
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    activityType: text('activity_type', { enum: ACTIVITY_TYPES }).notNull(),
  },
  (table) => [primaryKey({ columns: [table.locationId, table.activityType] })]
);

/**
 * Locations a user marked as favorite.
 */
export const locationFavorites = pgTable(
  'location_favorites',
  {
    locationId: text('location_id')
      .notNull()
      .references(() => locations.id, { onDelete: 'cascade' }),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.locationId, table.userId] }),
    index('location_favorites_user_idx').on(table.userId),
  ]
);
