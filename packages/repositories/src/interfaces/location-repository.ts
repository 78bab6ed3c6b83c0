import type {
  ActivityType,
  EntityRef,
  Id,
  Location,
  LocationType,
  Page,
  PageRequest,
  ParentPathEntry,
} from '@waypoint/protocol';

/**
 * Input for creating a new Location
 */
export type CreateLocationInput = {
  id?: Id;
  name: string;
  abbreviation?: string | null;
  website?: string | null;
  locationType?: LocationType;
  parentId?: EntityRef | null;
  activityTypes?: readonly ActivityType[];
};

/**
 * Partial update of a Location
 */
export type UpdateLocationInput = {
  name?: string | null;
  abbreviation?: string | null;
  website?: string | null;
  locationType?: LocationType | null;
  parentId?: EntityRef | null;
  activityTypes?: readonly ActivityType[];
};

/**
 * Filter for listing Locations
 */
export type LocationFilter = {
  locationTypes?: readonly LocationType[];
  parentIds?: readonly (Id | null)[];
};

/**
 * Repository interface for Location operations.
 *
 * Locations nest through `parentId`; deleting a parent detaches its children.
 */
export interface LocationRepository {
  create(input: CreateLocationInput): Promise<Location>;

  /**
   * @returns Location or null if not found
   */
  get(id: Id): Promise<Location | null>;

  /**
   * List Locations ordered by name
   */
  list(filter?: LocationFilter, page?: PageRequest): Promise<Page<Location>>;

  update(id: Id, input: UpdateLocationInput): Promise<void>;

  delete(id: Id): Promise<void>;

  /**
   * Ancestors of a Location, nearest first
   */
  getParentPath(id: Id): Promise<ParentPathEntry[]>;

  /**
   * Mark a Location as a favorite of a user. Adding it twice is a no-op.
   */
  addFavorite(locationId: Id, userId: Id): Promise<void>;

  isFavorite(locationId: Id, userId: Id): Promise<boolean>;

  removeFavorite(locationId: Id, userId: Id): Promise<void>;

  /**
   * A user's favorite Locations ordered by name
   */
  listFavorites(userId: Id, page?: PageRequest): Promise<Page<Location>>;
}
