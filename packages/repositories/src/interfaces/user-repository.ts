import type { Id, Page, PageRequest, User } from '@waypoint/protocol';

/**
 * Input for creating a new User
 */
export type CreateUserInput = {
  id?: Id;
  email: string;
  password: string;
  fullName?: string | null;
  isActive?: boolean;
  isSuperuser?: boolean;
};

/**
 * Partial update of a User. A new password is hashed before it is stored.
 */
export type UpdateUserInput = {
  email?: string | null;
  password?: string | null;
  fullName?: string | null;
  isActive?: boolean | null;
  isSuperuser?: boolean | null;
};

export type UserFilter = {
  isActive?: boolean;
};

/**
 * Repository interface for User operations.
 */
export interface UserRepository {
  create(input: CreateUserInput): Promise<User>;

  /**
   * @returns User or null if not found
   */
  get(id: Id): Promise<User | null>;

  getByEmail(email: string): Promise<User | null>;

  /**
   * Check a password against the stored hash
   * @returns the User, or null for an unknown email or a wrong password
   */
  authenticate(email: string, password: string): Promise<User | null>;

  /**
   * List Users ordered by email
   */
  list(filter?: UserFilter, page?: PageRequest): Promise<Page<User>>;

  update(id: Id, input: UpdateUserInput): Promise<void>;

  /**
   * Delete a User. Participations, favorites and access grants go with
   * it; transactions are detached.
   */
  delete(id: Id): Promise<void>;
}
