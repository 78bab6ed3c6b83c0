// Reference helpers

import type { EntityRef, Id } from './types/common.js';

/**
 * Resolve an EntityRef to the identifier it points at.
 */
export function refId(ref: EntityRef): Id {
  return typeof ref === 'string' ? ref : ref.id;
}
