import { IndexOutOfBoundsError } from '../errors';
import { categoricalField, MetaTable, numericField, unsetField } from '../meta-table';
import type { Axis, AxisIndex, MetaField } from '../types';
import * as arrayOperations from './array-operations';


/**
 * Turn an axis index into explicit zero-based positions.
 *
 * - `':'` => every position in order
 * - `boolean[]` => positions of the selected entries; must match the axis length
 * - `number[]` => used as given; every entry must be an integer in `[0, length)`
 */
export function resolveAxisIndex(index: AxisIndex, length: number, axis: Axis): number[] {
  if (index === ':') {
    return arrayOperations.identityPositions(length);
  }

  if (isMask(index)) {
    if (index.length !== length) {
      throw new IndexOutOfBoundsError(
        `Mask of length ${index.length} does not match ${axis} axis of length ${length}`,
      );
    }
    return arrayOperations.maskToPositions(index);
  }

  for (const position of index) {
    if (!Number.isInteger(position) || position < 0 || position >= length) {
      throw new IndexOutOfBoundsError(
        `Position ${position} is outside ${axis} axis of length ${length}`,
      );
    }
  }
  return [...index];
}

/**
 * Slice every field of a table to the given positions.
 *
 * Unset fields are carried through unchanged: a declared-but-unused field never
 * gains values from indexing. Nested tables are sliced recursively. The input
 * table is not modified.
 */
export function indexMetaTable(table: MetaTable, positions: readonly number[]): MetaTable {
  const result = new MetaTable();
  for (const [name, field] of table.entries()) {
    result.setField(name, indexField(field, positions));
  }
  return result;
}

function indexField(field: MetaField, positions: readonly number[]): MetaField {
  switch (field.kind) {
    case 'unset':
      return unsetField(field.domain);
    case 'numeric':
      return numericField(arrayOperations.takePositions(field.values, positions));
    case 'categorical':
      return categoricalField(arrayOperations.takePositions(field.values, positions));
    case 'table':
      return { kind: 'table', table: indexMetaTable(field.table, positions) };
  }
}

function isMask(index: readonly boolean[] | readonly number[]): index is readonly boolean[] {
  return index.length > 0 && typeof index[0] === 'boolean';
}
