import {
  pgTable,
  text,
  timestamp,
  integer,
  index,
  primaryKey,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { ACTIVITY_TYPES } from '@waypoint/protocol';
import { users } from './users.js';
import { locations } from './locations.js';

/**
 * Activities table - things done at a place and time, nested through parent_id
 * (a trip containing days containing climbs).
 */
export const activities = pgTable(
  'activities',
  {
    id: text('id').primaryKey(),
    title: text('title').notNull(),
    description: text('description'),
    start: timestamp('start', { withTimezone: true }),
    durationSeconds: integer('duration_seconds'),
    locationId: text('location_id').references(() => locations.id, { onDelete: 'set null' }),
    parentId: text('parent_id').references((): AnyPgColumn => activities.id, {
      onDelete: 'set null',
    }),
  },
  (table) => [
    index('activities_start_idx').on(table.start),
    index('activities_location_idx').on(table.locationId),
    index('activities_parent_idx').on(table.parentId),
  ]
);

/**
 * Participants of an activity.
 */
export const activityUsers = pgTable(
  'activity_users',
  {
    activityId: text('activity_id')
      .notNull()
      .references(() => activities.id, { onDelete: 'cascade' }),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.activityId, table.userId] }),
    index('activity_users_user_idx').on(table.userId),
  ]
);

/**
 * Type tags of an activity.
 */
export const activityTypes = pgTable(
  'activity_types',
  {
    activityId: text('activity_id')
      .notNull()
      .references(() => activities.id, { onDelete: 'cascade' }),
    activityType: text('activity_type', { enum: ACTIVITY_TYPES }).notNull(),
  },
  (table) => [primaryKey({ columns: [table.activityId, table.activityType] })]
);
