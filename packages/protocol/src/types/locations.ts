// Location types - places activities and transactions happen at

import type { Id } from './common.js';
import type { ActivityType } from './activities.js';

export const LOCATION_TYPES = ['other', 'region', 'area', 'crag', 'poi', 'city', 'gym'] as const;

export type LocationType = (typeof LOCATION_TYPES)[number];

/**
 * A Location is a named place. Locations nest through `parentId`
 * (a crag inside an area inside a region).
 */
export type Location = {
  id: Id;
  name: string;
  abbreviation: string | null;
  website: string | null;
  locationType: LocationType;
  parentId: Id | null;

  /**
   * Activity types that can be done at this location
   */
  activityTypes: ActivityType[];
};
