// Membership predicates for optional filter dimensions
//
// An absent or empty collection never filters: it skips the dimension
// instead of matching nothing. Both builders return undefined in that case,
// which drizzle's and()/or() drop.

import { inArray, isNull, or, type Column, type GetColumnData, type SQL } from 'drizzle-orm';

type ColumnValue<TColumn extends Column> = GetColumnData<TColumn, 'raw'>;

/**
 * Build `column IN (values)`, or undefined when there is nothing to filter by.
 */
export function inArrayOrSkip<TColumn extends Column>(
  column: TColumn,
  values: Iterable<ColumnValue<TColumn>> | null | undefined
): SQL | undefined {
  if (!values) return undefined;

  const distinct = [...new Set(values)];
  if (distinct.length === 0) return undefined;

  return inArray(column, distinct);
}

/**
 * Build a membership predicate where `null` in `values` stands for
 * "the column is unset".
 *
 * - [a, b]       => column IN (a, b)
 * - [a, null]    => (column IN (a) OR column IS NULL)
 * - [null]       => column IS NULL
 * - [] / absent  => undefined (no filter)
 */
export function inArrayWithNull<TColumn extends Column>(
  column: TColumn,
  values: Iterable<ColumnValue<TColumn> | null> | null | undefined
): SQL | undefined {
  if (!values) return undefined;

  let includesNull = false;
  const concrete = new Set<ColumnValue<TColumn>>();
  for (const value of values) {
    if (value === null) {
      includesNull = true;
    } else {
      concrete.add(value);
    }
  }

  const matchesValue = concrete.size > 0 ? inArray(column, [...concrete]) : undefined;
  const matchesNull = includesNull ? isNull(column) : undefined;

  if (matchesValue && matchesNull) return or(matchesValue, matchesNull);
  return matchesValue ?? matchesNull;
}
