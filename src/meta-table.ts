import { InvalidArgumentError, TypeMismatchError } from './errors';
import type {
  CategoricalField,
  FieldDomain,
  MetaField,
  MetaFieldInput,
  MetaTableInput,
  NumericField,
  TableField,
  UnsetField,
} from './types';
import { inferDomain, isNumberArray, isStringArray } from './utils/type-inference';

// Mandatory Fields
// ==============================

/**
 * Fields every metadata table carries, with the domain they default to.
 */
export const MANDATORY_FIELDS = {
  labels: 'categorical',
  chunks: 'numeric',
  names: 'categorical',
  order: 'numeric',
} as const satisfies Record<string, FieldDomain>;

export type MandatoryField = keyof typeof MANDATORY_FIELDS;

export function isMandatoryField(name: string): name is MandatoryField {
  return Object.prototype.hasOwnProperty.call(MANDATORY_FIELDS, name);
}

// Field Constructors
// ==============================

export function unsetField(domain: FieldDomain = 'numeric'): UnsetField {
  return { kind: 'unset', domain };
}

export function numericField(values: readonly number[]): NumericField {
  return { kind: 'numeric', values: [...values] };
}

export function categoricalField(values: readonly string[]): CategoricalField {
  return { kind: 'categorical', values: [...values] };
}

export function tableField(table: MetaTable | MetaTableInput): TableField {
  return { kind: 'table', table: new MetaTable(table) };
}

export function cloneField(field: MetaField): MetaField {
  switch (field.kind) {
    case 'unset':
      return unsetField(field.domain);
    case 'numeric':
      return numericField(field.values);
    case 'categorical':
      return categoricalField(field.values);
    case 'table':
      return { kind: 'table', table: field.table.clone() };
  }
}

export function fieldsEqual(first: MetaField, second: MetaField): boolean {
  if (first.kind === 'unset' && second.kind === 'unset') {
    return first.domain === second.domain;
  }
  if (first.kind === 'table' && second.kind === 'table') {
    return first.table.equals(second.table);
  }
  if (first.kind === 'numeric' && second.kind === 'numeric') {
    return first.values.length === second.values.length &&
      first.values.every((value, i) => Object.is(value, second.values[i]));
  }
  if (first.kind === 'categorical' && second.kind === 'categorical') {
    return first.values.length === second.values.length &&
      first.values.every((value, i) => value === second.values[i]);
  }
  return false;
}

// Table
// ==============================

/**
 * Ordered collection of named metadata fields describing one axis of a volume.
 *
 * Each field is either set (an array aligned with the axis), unset (declared but
 * not used), or a nested table. The table itself does not know its axis length;
 * alignment is checked by the volume that owns it.
 *
 * @example
 * ```ts
 * const samples = MetaTable.withMandatoryFields({
 *   chunks: [1, 1, 2, 2],
 *   labels: ['A', 'B', 'A', 'B'],
 * });
 * samples.values('chunks'); // [1, 1, 2, 2]
 * samples.getField('names'); // { kind: 'unset', domain: 'categorical' }
 * ```
 */
export class MetaTable {
  private readonly fields: Map<string, MetaField>;

  constructor(input?: MetaTable | MetaTableInput) {
    this.fields = new Map();
    if (input instanceof MetaTable) {
      for (const [name, field] of input.fields) {
        this.fields.set(name, cloneField(field));
      }
    }
    else if (input) {
      for (const [name, value] of Object.entries(input)) {
        this.fields.set(name, toMetaField(value, name));
      }
    }
  }

  /**
   * Build a table that carries every mandatory field. Mandatory fields missing
   * from the input are added as unset placeholders of their default domain.
   */
  static withMandatoryFields(input?: MetaTable | MetaTableInput): MetaTable {
    const table = new MetaTable();
    for (const [name, domain] of Object.entries(MANDATORY_FIELDS)) {
      table.fields.set(name, unsetField(domain));
    }
    const provided = new MetaTable(input);
    for (const [name, field] of provided.fields) {
      table.fields.set(name, field);
    }
    return table;
  }

  fieldNames(): string[] {
    return Array.from(this.fields.keys());
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  /**
   * True when the field exists and holds values (a set leaf or a nested table).
   */
  isSet(name: string): boolean {
    const field = this.fields.get(name);
    return field !== undefined && field.kind !== 'unset';
  }

  getField(name: string): MetaField | undefined {
    return this.fields.get(name);
  }

  /**
   * Values of a set leaf field, or undefined for unset, nested or missing fields.
   */
  values(name: string): number[] | string[] | undefined {
    const field = this.fields.get(name);
    if (field?.kind === 'numeric' || field?.kind === 'categorical') {
      return field.values;
    }
    return undefined;
  }

  setField(name: string, input: MetaFieldInput): this {
    this.fields.set(name, toMetaField(input, name));
    return this;
  }

  deleteField(name: string): boolean {
    if (isMandatoryField(name)) {
      throw new InvalidArgumentError(`Mandatory field "${name}" cannot be removed`);
    }
    return this.fields.delete(name);
  }

  entries(): Array<[string, MetaField]> {
    return Array.from(this.fields.entries());
  }

  clone(): MetaTable {
    return new MetaTable(this);
  }

  /**
   * Structural equality: same field names (in any order) with equal contents.
   */
  equals(other: MetaTable): boolean {
    if (this.fields.size !== other.fields.size) return false;
    for (const [name, field] of this.fields) {
      const otherField = other.fields.get(name);
      if (!otherField || !fieldsEqual(field, otherField)) return false;
    }
    return true;
  }
}

// Input Coercion
// ==============================

/**
 * Convert caller input into a tagged field.
 * @internal
 */
export function toMetaField(input: MetaFieldInput, name: string): MetaField {
  if (isValueArray(input)) {
    if (input.length === 0) {
      return unsetField(isMandatoryField(name) ? MANDATORY_FIELDS[name] : 'numeric');
    }
    if (isNumberArray(input)) return numericField(input);
    if (isStringArray(input)) return categoricalField(input);
    // Throws with the offending value types
    inferDomain(input, `Field "${name}"`);
    throw new TypeMismatchError(`Field "${name}" has an unsupported value type`);
  }

  if (input instanceof MetaTable) {
    return { kind: 'table', table: input.clone() };
  }

  if (isMetaField(input)) {
    const field = cloneField(input);
    if (field.kind === 'numeric' && !isNumberArray(field.values)) {
      throw new TypeMismatchError(`Numeric field "${name}" holds non-numeric values`);
    }
    if (field.kind === 'categorical' && !isStringArray(field.values)) {
      throw new TypeMismatchError(`Categorical field "${name}" holds non-string values`);
    }
    return field;
  }

  return tableField(input);
}

function isValueArray(input: MetaFieldInput): input is readonly number[] | readonly string[] {
  return Array.isArray(input);
}

const FIELD_KINDS = new Set<string>(['unset', 'numeric', 'categorical', 'table']);

function isMetaField(input: MetaField | MetaTableInput): input is MetaField {
  return typeof input.kind === 'string' && FIELD_KINDS.has(input.kind);
}
