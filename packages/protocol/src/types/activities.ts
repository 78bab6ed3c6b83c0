// Activity types - things a user did, somewhere, at some point in time

import type { Id, Timestamp } from './common.js';

/**
 * Activity types, grouped by the prefix before the slash.
 */
export const ACTIVITY_TYPES = [
  'Indoor/Sport Climbing',
  'Indoor/Bouldering',
  'Running/Jogging',
  'Running/Trail Running',
  'Hiking/City Walking',
  'Hiking/Hiking Trail',
  'Hiking/Long Distance Hiking',
  'Mountaineering/Mountain Hike',
  'Mountaineering/Alpine Tour',
  'Climbing/Bouldering',
  'Climbing/Sport Climbing',
  'Climbing/Alpine Climbing',
  'Climbing/Ice Climbing',
  'Climbing/Via Ferrata',
  'Winter/Winter Hiking',
  'Winter/Snow Shoeing',
  'Winter/Ski Touring',
  'Winter/Ski Alpine',
  'Cycling/Bike Riding',
  'Cycling/Mountain Biking',
  'Cycling/Road Cycling',
  'Cycling/Gravel Biking',
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

/**
 * An Activity is a single outing or session.
 *
 * Activities form a tree through `parentId` (a multi-day tour with its
 * daily stages, for example). Deleting a parent detaches its children.
 */
export type Activity = {
  id: Id;
  title: string;
  description: string | null;

  /**
   * Start of the activity in UTC
   */
  start: Timestamp | null;

  /**
   * Duration in whole seconds
   */
  durationSeconds: number | null;

  locationId: Id | null;
  parentId: Id | null;

  /**
   * Users taking part in the activity
   */
  userIds: Id[];

  types: ActivityType[];

  /**
   * Sum of the amounts of all transactions attached to this activity
   */
  transactionsTotal: number;
};
