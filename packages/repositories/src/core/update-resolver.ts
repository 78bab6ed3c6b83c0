// Field-level resolution of create and update requests
//
// Every entity describes its scalar columns with the field builders below.
// resolveUpdate() turns one request value into the change-set entry for that
// column, resolveCreate() into the insert value:
//
//   request value      update            create
//   undefined          (no entry)        default / null
//   null, clearing     null              null
//   value              normalized value  normalized value
//
// Required fields reject null and clearing values, and on create also
// undefined unless they declare a default.

import { z } from 'zod';
import { refId, type EntityRef, type Id } from '@waypoint/protocol';
import { EmptyFieldError, ValidationError } from '../errors.js';
import { fromInput } from './tri-state.js';
import { toUtcDate, type DateTimeInput } from './datetime.js';

type FieldBase<TIn, TOut> = {
  readonly name: string;
  readonly isClearing?: (value: TIn) => boolean;
  readonly normalize: (value: TIn) => TOut;

  /**
   * Stored on create when the field is not provided
   */
  readonly defaultValue?: TOut;
};

export type RequiredField<TIn, TOut> = FieldBase<TIn, TOut> & {
  readonly required: true;
};

export type OptionalField<TIn, TOut> = FieldBase<TIn, TOut> & {
  readonly required: false;
};

export type Field<TIn, TOut> = RequiredField<TIn, TOut> | OptionalField<TIn, TOut>;

function validate<T>(name: string, schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`${name}: ${result.error.issues[0]?.message ?? 'invalid value'}`, {
      field: name,
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}

const isEmptyString = (value: string) => value === '';

type TextOptions = {
  minLength?: number;
  maxLength?: number;
  url?: boolean;
  email?: boolean;
};

function textSchema(options: TextOptions): z.ZodType<string> {
  let schema = z.string();
  if (options.url) schema = schema.url();
  if (options.email) schema = schema.email();
  if (options.minLength !== undefined) schema = schema.min(options.minLength);
  if (options.maxLength !== undefined) schema = schema.max(options.maxLength);
  return schema;
}

function text(name: string, options: TextOptions & { required: true }): RequiredField<string, string>;
function text(name: string, options?: TextOptions & { required?: false }): OptionalField<string, string>;
function text(
  name: string,
  options: TextOptions & { required?: boolean } = {}
): Field<string, string> {
  const schema = textSchema(options);
  const base = {
    name,
    isClearing: isEmptyString,
    normalize: (value: string) => validate(name, schema, value),
  };
  return options.required ? { ...base, required: true } : { ...base, required: false };
}

function datetime(name: string): OptionalField<DateTimeInput, Date> {
  return {
    name,
    required: false,
    normalize: (value) => {
      const date = toUtcDate(value);
      if (date === null) {
        throw new ValidationError(`${name}: invalid datetime`, { field: name });
      }
      return date;
    },
  };
}

function reference(name: string): OptionalField<EntityRef, Id> {
  return {
    name,
    required: false,
    isClearing: (value) => refId(value) === '',
    normalize: (value) => refId(value),
  };
}

function value<T>(
  name: string,
  schema: z.ZodType<T>,
  options: { required: true; defaultValue?: T }
): RequiredField<T, T>;
function value<T>(
  name: string,
  schema: z.ZodType<T>,
  options?: { required?: false; defaultValue?: T }
): OptionalField<T, T>;
function value<T>(
  name: string,
  schema: z.ZodType<T>,
  options: { required?: boolean; defaultValue?: T } = {}
): Field<T, T> {
  const normalize = (input: T) => validate(name, schema, input);
  const { defaultValue } = options;
  return options.required
    ? { name, required: true, normalize, defaultValue }
    : { name, required: false, normalize, defaultValue };
}

/**
 * Field builders for entity column definitions.
 *
 * - text: strings; the empty string clears the field
 * - datetime: Date or ISO string, stored as a UTC instant
 * - reference: an EntityRef, stored as the referenced identifier
 * - value: anything else (numbers, booleans, enum members), checked by a zod schema
 */
export const fields = { text, datetime, reference, value };

/**
 * Resolve one request value to its change-set entry.
 *
 * @returns undefined to leave the column untouched, null to clear it,
 *   or the normalized value to store
 * @throws EmptyFieldError when a required field is cleared
 * @throws ValidationError when the value fails the field's constraints
 */
export function resolveUpdate<TIn, TOut>(
  field: RequiredField<TIn, TOut>,
  input: TIn | null | undefined
): TOut | undefined;
export function resolveUpdate<TIn, TOut>(
  field: OptionalField<TIn, TOut>,
  input: TIn | null | undefined
): TOut | null | undefined;
export function resolveUpdate<TIn, TOut>(
  field: Field<TIn, TOut>,
  input: TIn | null | undefined
): TOut | null | undefined {
  const state = fromInput(input, field.isClearing);
  switch (state.kind) {
    case 'unset':
      return undefined;
    case 'clear':
      if (field.required) throw new EmptyFieldError(field.name);
      return null;
    case 'set':
      return field.normalize(state.value);
  }
}

/**
 * Resolve one request value to its insert value.
 *
 * @throws EmptyFieldError when a required field is cleared, or missing
 *   without a default
 * @throws ValidationError when the value fails the field's constraints
 */
export function resolveCreate<TIn, TOut>(
  field: RequiredField<TIn, TOut>,
  input: TIn | null | undefined
): TOut;
export function resolveCreate<TIn, TOut>(
  field: OptionalField<TIn, TOut>,
  input: TIn | null | undefined
): TOut | null;
export function resolveCreate<TIn, TOut>(
  field: Field<TIn, TOut>,
  input: TIn | null | undefined
): TOut | null {
  const state = fromInput(input, field.isClearing);
  if (state.kind === 'set') return field.normalize(state.value);
  if (state.kind === 'unset' && field.defaultValue !== undefined) return field.defaultValue;
  if (field.required) throw new EmptyFieldError(field.name);
  return null;
}

/**
 * A change-set is empty when every entry leaves its column untouched.
 */
export function isEmptyChangeSet(changes: Record<string, unknown>): boolean {
  return Object.values(changes).every((entry) => entry === undefined);
}
