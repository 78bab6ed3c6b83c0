// Equipment manufacturer types

import type { Id } from './common.js';
import type { User } from './users.js';

/**
 * Access roles a user can hold on a manufacturer.
 *
 * - owner: admin, may delete the manufacturer and manage admins
 * - admin: editor, may manage editors
 * - editor: shared, may edit the manufacturer
 * - shared: may read the manufacturer while it is hidden
 */
export const MANUFACTURER_ACCESS_ROLES = ['owner', 'admin', 'editor', 'shared'] as const;

export type ManufacturerAccessRole = (typeof MANUFACTURER_ACCESS_ROLES)[number];

export type Manufacturer = {
  id: Id;
  name: string;
  shortName: string | null;
  description: string | null;
  website: string | null;

  /**
   * Hidden manufacturers are only visible to users holding an access role
   */
  hidden: boolean;
};

/**
 * A manufacturer as seen by a particular user
 */
export type ManufacturerWithRole = {
  manufacturer: Manufacturer;
  role: ManufacturerAccessRole | null;
};

/**
 * An access grant of one user on one manufacturer
 */
export type ManufacturerAccess = {
  manufacturerId: Id;
  userId: Id;
  role: ManufacturerAccessRole;
};

export type ManufacturerUserAccess = {
  role: ManufacturerAccessRole;
  user: User;
};
