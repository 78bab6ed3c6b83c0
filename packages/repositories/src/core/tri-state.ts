// Three-valued field updates

/**
 * The state of one field in an update request.
 *
 * - unset: leave the stored value as it is
 * - clear: store null
 * - set: store the given value
 */
export type TriState<T> = { kind: 'unset' } | { kind: 'clear' } | { kind: 'set'; value: T };

export const unset: TriState<never> = { kind: 'unset' };
export const clear: TriState<never> = { kind: 'clear' };

export function set<T>(value: T): TriState<T> {
  return { kind: 'set', value };
}

/**
 * Read a raw request value into a TriState.
 *
 * `undefined` is unset and `null` is clear. `isClearing` marks further
 * values that mean clear for this field (the empty string for text).
 */
export function fromInput<T>(
  value: T | null | undefined,
  isClearing?: (value: T) => boolean
): TriState<T> {
  if (value === undefined) return unset;
  if (value === null) return clear;
  if (isClearing?.(value)) return clear;
  return set(value);
}
