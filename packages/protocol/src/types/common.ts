// Common types used across the protocol

/**
 * ISO 8601 timestamp string, always in UTC
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * A reference to another record, either by its identifier or by
 * any object carrying that identifier (e.g. a previously loaded entity).
 */
export type EntityRef = Id | { id: Id };

/**
 * One step of a parent chain, nearest parent first.
 */
export type ParentPathEntry = {
  id: Id;
  name: string;
};

/**
 * Pagination window for list operations
 */
export type PageRequest = {
  /**
   * Number of matching rows to skip
   */
  skip: number;

  /**
   * Maximum number of rows to return
   */
  limit: number;
};

/**
 * One page of results together with the number of rows matching
 * the same filters without pagination.
 */
export type Page<T> = {
  items: T[];
  total: number;
};
