// User types

import type { Id } from './common.js';

/**
 * A User of the tracker. The password hash never leaves the repository layer.
 */
export type User = {
  id: Id;
  email: string;
  fullName: string | null;
  isActive: boolean;
  isSuperuser: boolean;
};
