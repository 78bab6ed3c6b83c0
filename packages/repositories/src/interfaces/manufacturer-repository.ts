import type {
  Id,
  Manufacturer,
  ManufacturerAccessRole,
  ManufacturerUserAccess,
  ManufacturerWithRole,
  Page,
  PageRequest,
} from '@waypoint/protocol';

/**
 * A user's access grant as given on create or setAccesses
 */
export type ManufacturerAccessInput = {
  userId: Id;
  role?: ManufacturerAccessRole;
};

/**
 * Input for creating a new Manufacturer
 */
export type CreateManufacturerInput = {
  id?: Id;
  name: string;
  shortName?: string | null;
  description?: string | null;
  website?: string | null;
  hidden?: boolean;
  accesses?: readonly ManufacturerAccessInput[];
};

/**
 * Partial update of a Manufacturer. Access grants have their own operations.
 */
export type UpdateManufacturerInput = {
  name?: string | null;
  shortName?: string | null;
  description?: string | null;
  website?: string | null;
  hidden?: boolean | null;
};

/**
 * Filter for listing Manufacturers.
 *
 * Without `userId` only `hidden` applies. With `userId` and no other
 * dimension, public manufacturers and those the user has access to are
 * listed. With `hidden: false` only public ones; with `hidden: true` only
 * hidden ones the user has access to; with `accessRoles` only those where
 * the user holds one of the roles.
 */
export type ManufacturerFilter = {
  userId?: Id;
  hidden?: boolean;
  accessRoles?: readonly ManufacturerAccessRole[];
};

/**
 * Repository interface for equipment Manufacturers and their access grants.
 */
export interface ManufacturerRepository {
  create(input: CreateManufacturerInput): Promise<Manufacturer>;

  /**
   * @returns Manufacturer or null if not found
   */
  get(id: Id): Promise<Manufacturer | null>;

  /**
   * Find a Manufacturer by its exact name
   */
  getByName(name: string, options?: { hidden?: boolean }): Promise<Manufacturer | null>;

  /**
   * List Manufacturers ordered by name, each with the role `filter.userId`
   * holds on it (null without a grant or without `userId`).
   */
  list(filter?: ManufacturerFilter, page?: PageRequest): Promise<Page<ManufacturerWithRole>>;

  update(id: Id, input: UpdateManufacturerInput): Promise<void>;

  delete(id: Id): Promise<void>;

  /**
   * Grant a role, replacing the user's current one
   */
  setAccess(manufacturerId: Id, userId: Id, role?: ManufacturerAccessRole): Promise<void>;

  /**
   * Grant several roles at once. Users not listed keep their grants.
   */
  setAccesses(manufacturerId: Id, accesses: readonly ManufacturerAccessInput[]): Promise<void>;

  /**
   * @returns the user's role, or null without a grant
   */
  getAccess(manufacturerId: Id, userId: Id): Promise<ManufacturerAccessRole | null>;

  /**
   * Every grant on a Manufacturer with its user, ordered by email
   */
  listAccesses(manufacturerId: Id): Promise<ManufacturerUserAccess[]>;

  removeAccess(manufacturerId: Id, userId: Id): Promise<void>;

  removeAllAccesses(manufacturerId: Id): Promise<void>;
}
