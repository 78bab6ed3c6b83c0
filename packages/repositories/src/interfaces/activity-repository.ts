import type {
  Activity,
  ActivityType,
  EntityRef,
  Id,
  Location,
  Page,
  PageRequest,
  ParentPathEntry,
} from '@waypoint/protocol';
import type { DateTimeInput } from '../core/datetime.js';

/**
 * Input for creating a new Activity
 */
export type CreateActivityInput = {
  id?: Id;
  title: string;
  description?: string | null;
  start?: DateTimeInput | null;
  durationSeconds?: number | null;
  locationId?: EntityRef | null;
  parentId?: EntityRef | null;
  userIds?: readonly Id[];
  types?: readonly ActivityType[];
};

/**
 * Partial update of an Activity.
 *
 * Omitted fields are left as they are; null (or '' for text) clears a field.
 * `userIds` and `types` replace the stored set when given; `[]` removes all.
 */
export type UpdateActivityInput = {
  title?: string | null;
  description?: string | null;
  start?: DateTimeInput | null;
  durationSeconds?: number | null;
  locationId?: EntityRef | null;
  parentId?: EntityRef | null;
  userIds?: readonly Id[];
  types?: readonly ActivityType[];
};

/**
 * Filter for listing Activities. Omitted or empty dimensions do not filter.
 * A null in `locationIds` or `parentIds` matches activities without one.
 */
export type ActivityFilter = {
  userIds?: readonly Id[];
  locationIds?: readonly (Id | null)[];
  parentIds?: readonly (Id | null)[];
  types?: readonly ActivityType[];
};

/**
 * Repository interface for Activity operations.
 */
export interface ActivityRepository {
  /**
   * Create a new Activity with its participants and types
   */
  create(input: CreateActivityInput): Promise<Activity>;

  /**
   * Get an Activity by ID
   * @returns Activity or null if not found
   */
  get(id: Id): Promise<Activity | null>;

  /**
   * List Activities, most recent first
   */
  list(filter?: ActivityFilter, page?: PageRequest): Promise<Page<Activity>>;

  /**
   * Activities a user took part in
   */
  listByUserId(userId: Id, page?: PageRequest): Promise<Page<Activity>>;

  /**
   * Activities at a location; null lists activities without one
   */
  listByLocationId(locationId: Id | null, page?: PageRequest): Promise<Page<Activity>>;

  /**
   * Distinct locations of the activities any of the users took part in
   */
  listLocationsByUserIds(userIds: readonly Id[], page?: PageRequest): Promise<Page<Location>>;

  /**
   * Distinct types of the activities any of the users took part in
   */
  listTypesByUserIds(userIds: readonly Id[]): Promise<ActivityType[]>;

  /**
   * Ancestors of an Activity, nearest first
   */
  getParentPath(id: Id): Promise<ParentPathEntry[]>;

  /**
   * Apply a partial update. Unknown IDs are ignored.
   */
  update(id: Id, input: UpdateActivityInput): Promise<void>;

  /**
   * Delete an Activity. Its participants and types go with it; child
   * activities and transactions are detached.
   */
  delete(id: Id): Promise<void>;
}
