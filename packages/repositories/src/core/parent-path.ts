// Ancestor chains of self-referencing entities

import type { Id, ParentPathEntry } from '@waypoint/protocol';

export type ParentNode = ParentPathEntry & {
  parentId: Id | null;
};

/**
 * Follow parent pointers from `parentId` upwards.
 *
 * Parent chains are not guaranteed to be acyclic. The walk stops at the
 * first node it has already seen (including `startId`), or at a dangling
 * pointer.
 *
 * @returns ancestors, nearest first
 */
export async function walkParentPath(
  startId: Id,
  parentId: Id | null,
  load: (id: Id) => Promise<ParentNode | null>
): Promise<ParentPathEntry[]> {
  const path: ParentPathEntry[] = [];
  const seen = new Set<Id>([startId]);

  let next = parentId;
  while (next !== null && !seen.has(next)) {
    seen.add(next);
    const node = await load(next);
    if (!node) break;
    path.push({ id: node.id, name: node.name });
    next = node.parentId;
  }

  return path;
}
