import { ShapeMismatchError } from '../errors';
import { isMandatoryField, MetaTable, numericField } from '../meta-table';
import type {
  Axis,
  AxisDescriptors,
  CheckedMeta,
  FieldDescriptor,
  FieldInfo,
  MetaField,
  VolumeManifest,
  VolumeMeta,
  VolumeOptions,
} from '../types';
import { fieldDomain } from './type-inference';

// Implementation
// ==============================

/**
 * Turn construction options into the pair of tables a volume owns.
 * Missing mandatory fields are added as unset placeholders; the caller's
 * tables are copied, never aliased.
 * @internal
 */
export function fromOptions(options: VolumeOptions = {}): VolumeMeta {
  return {
    samples: MetaTable.withMandatoryFields(options.metasamples),
    features: MetaTable.withMandatoryFields(options.metafeatures),
  };
}

/**
 * Check that a table is in register with its axis, fill in `order` and derive
 * the descriptors of every leaf field.
 *
 * - Every set field (including the leaves of nested tables) must have exactly
 *   `length` elements
 * - An unset `order` becomes `1..length`
 *
 * The input table is left untouched; the filled copy is returned with its
 * descriptors.
 *
 * @example
 * ```ts
 * const { table, descriptors } = checkMeta(MetaTable.withMandatoryFields({ chunks: [2, 1] }), 2, 'samples');
 * table.values('order'); // [1, 2]
 * descriptors.chunks.inverseIndex; // [1, 0]
 * ```
 */
export function checkMeta(input: MetaTable, length: number, axis: Axis): CheckedMeta {
  validateLengths(input, length, axis, '');

  const table = input.clone();
  const order = table.getField('order');
  if (!order || order.kind === 'unset') {
    table.setField('order', numericField(Array.from({ length }, (_unused, i) => i + 1)));
  }

  return { table, descriptors: buildDescriptors(table) };
}

/**
 * Derive unique values, inverse indices and counts for every top-level leaf field.
 * Nested tables are skipped.
 * @internal
 */
export function buildDescriptors(table: MetaTable): AxisDescriptors {
  const descriptors: AxisDescriptors = {};
  for (const [name, field] of table.entries()) {
    if (field.kind === 'table') continue;
    descriptors[name] = describeField(field);
  }
  return descriptors;
}

/**
 * Sorted distinct values of a leaf field and the position of every element in
 * that sorted list.
 *
 * Numbers sort ascending with NaN last (all NaNs count as one value); strings
 * sort by UTF-16 code unit.
 * @internal
 */
export function describeField(field: Exclude<MetaField, { kind: 'table' }>): FieldDescriptor {
  if (field.kind === 'unset') {
    return { uniqueValues: [], inverseIndex: [], count: 0 };
  }

  if (field.kind === 'numeric') {
    const uniqueValues = Array.from(new Set(field.values)).sort(compareNumbers);
    return {
      uniqueValues,
      inverseIndex: inverseOf(field.values, uniqueValues),
      count: uniqueValues.length,
    };
  }

  const uniqueValues = Array.from(new Set(field.values)).sort();
  return {
    uniqueValues,
    inverseIndex: inverseOf(field.values, uniqueValues),
    count: uniqueValues.length,
  };
}

/**
 * Build a manifest describing a volume's shape and field vocabulary.
 * @internal
 */
export function buildManifest(
  nsamples: number,
  nfeatures: number,
  meta: VolumeMeta,
  descriptors: Record<Axis, AxisDescriptors>,
): VolumeManifest {
  const describeAxis = (axis: Axis): FieldInfo[] =>
    meta[axis].entries().map(([name, field]) => ({
      name,
      kind: field.kind,
      domain: fieldDomain(field),
      mandatory: isMandatoryField(name),
      count: descriptors[axis][name]?.count ?? 0,
    }));

  return {
    nsamples,
    nfeatures,
    samples: describeAxis('samples'),
    features: describeAxis('features'),
  };
}

// Utilities
// ==============================

function validateLengths(table: MetaTable, length: number, axis: Axis, prefix: string): void {
  for (const [name, field] of table.entries()) {
    const path = `${prefix}${name}`;
    if (field.kind === 'table') {
      validateLengths(field.table, length, axis, `${path}.`);
    }
    else if (field.kind !== 'unset' && field.values.length !== length) {
      throw new ShapeMismatchError(path, field.values.length, length, axis);
    }
  }
}

function compareNumbers(first: number, second: number): number {
  if (Number.isNaN(first)) return Number.isNaN(second) ? 0 : 1;
  if (Number.isNaN(second)) return -1;
  return first - second;
}

function inverseOf<T extends string | number>(values: readonly T[], uniqueValues: readonly T[]): number[] {
  const positions = new Map<T, number>();
  uniqueValues.forEach((value, position) => positions.set(value, position));
  return values.map((value) => positions.get(value) ?? -1);
}
