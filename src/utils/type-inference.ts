import { TypeMismatchError } from '../errors';
import type { FieldDomain, MetaField, MetaScalar } from '../types';


/**
 * Check that every entry of an array is a finite-or-NaN number.
 */
export function isNumberArray(values: readonly unknown[]): values is readonly number[] {
  return values.every((value) => typeof value === 'number');
}

/**
 * Check that every entry of an array is a string.
 */
export function isStringArray(values: readonly unknown[]): values is readonly string[] {
  return values.every((value) => typeof value === 'string');
}

/**
 * Infer the value domain of a non-empty array.
 * Throws if the array mixes domains or holds anything but strings and numbers.
 * @internal
 */
export function inferDomain(values: readonly unknown[], context: string): FieldDomain {
  if (isNumberArray(values)) return 'numeric';
  if (isStringArray(values)) return 'categorical';

  const kinds = Array.from(new Set(values.map((value) => typeof value))).sort();
  throw new TypeMismatchError(
    `${context} must hold only numbers or only strings, got: ${kinds.join(', ')}`,
  );
}

/**
 * Normalize a query to a non-empty list and infer its domain.
 *
 * - A single string or number is treated as a one-element list
 * - Mixed string/number lists are rejected
 * - Anything that is not a string or number is rejected
 * @internal
 */
export function normalizeQuery(
  query: MetaScalar | readonly MetaScalar[],
): { domain: 'numeric'; values: readonly number[] } | { domain: 'categorical'; values: readonly string[] } {
  const values: readonly unknown[] = isScalarList(query) ? query : [query];

  if (values.length === 0) {
    throw new TypeMismatchError('Query must contain at least one value');
  }
  if (isNumberArray(values)) {
    return { domain: 'numeric', values };
  }
  if (isStringArray(values)) {
    return { domain: 'categorical', values };
  }

  const kinds = Array.from(new Set(values.map((value) => typeof value))).sort();
  throw new TypeMismatchError(`Unrecognised query value types: ${kinds.join(', ')}`);
}

/**
 * Domain of a field, or undefined for nested tables.
 */
export function fieldDomain(field: MetaField): FieldDomain | undefined {
  switch (field.kind) {
    case 'unset':
      return field.domain;
    case 'numeric':
      return 'numeric';
    case 'categorical':
      return 'categorical';
    default:
      return undefined;
  }
}

function isScalarList(query: MetaScalar | readonly MetaScalar[]): query is readonly MetaScalar[] {
  return Array.isArray(query);
}
