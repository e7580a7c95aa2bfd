import { TypeMismatchError } from '../errors';
import { categoricalField, cloneField, MetaTable, numericField, unsetField } from '../meta-table';
import type { Axis, MetaField } from '../types';


/**
 * Combine two tables that describe consecutive stretches of the same axis.
 *
 * - Fields in both tables are concatenated (`base` values first); nested tables
 *   are merged recursively along the same axis
 * - Fields only in `incoming` are adopted under their own name
 * - Fields only in `base` keep their value
 *
 * No length checks happen here. A field present on one side only keeps the
 * length of that side, so the volume built from the result rejects it unless
 * the other side was empty.
 *
 * @example
 * ```ts
 * const merged = appendMetaTables(
 *   new MetaTable({ chunks: [1, 1] }),
 *   new MetaTable({ chunks: [2, 2], run: ['a', 'a'] }),
 *   'samples',
 * );
 * merged.values('chunks'); // [1, 1, 2, 2]
 * merged.values('run'); // ['a', 'a']
 * ```
 */
export function appendMetaTables(base: MetaTable, incoming: MetaTable, axis: Axis): MetaTable {
  const result = base.clone();

  for (const [name, incomingField] of incoming.entries()) {
    const baseField = base.getField(name);
    if (baseField === undefined) {
      result.setField(name, cloneField(incomingField));
      continue;
    }
    result.setField(name, appendFields(name, baseField, incomingField, axis));
  }

  return result;
}

function appendFields(name: string, base: MetaField, incoming: MetaField, axis: Axis): MetaField {
  if (base.kind === 'table' || incoming.kind === 'table') {
    if (base.kind === 'table' && incoming.kind === 'table') {
      return { kind: 'table', table: appendMetaTables(base.table, incoming.table, axis) };
    }
    throw new TypeMismatchError(
      `Cannot concatenate ${axis} field "${name}": a nested table and a value array`,
    );
  }

  const baseDomain = base.kind === 'unset' ? base.domain : base.kind;
  const incomingDomain = incoming.kind === 'unset' ? incoming.domain : incoming.kind;
  if (baseDomain !== incomingDomain) {
    throw new TypeMismatchError(
      `Cannot concatenate ${axis} field "${name}": ${baseDomain} and ${incomingDomain} values`,
    );
  }

  if (base.kind === 'unset' && incoming.kind === 'unset') {
    return unsetField(base.domain);
  }
  if (base.kind === 'unset') return cloneField(incoming);
  if (incoming.kind === 'unset') return cloneField(base);

  if (base.kind === 'numeric' && incoming.kind === 'numeric') {
    return numericField([...base.values, ...incoming.values]);
  }
  if (base.kind === 'categorical' && incoming.kind === 'categorical') {
    return categoricalField([...base.values, ...incoming.values]);
  }
  // Unreachable once the domains agree
  throw new TypeMismatchError(`Cannot concatenate ${axis} field "${name}"`);
}
