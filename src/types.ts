import type { MetaTable } from './meta-table';

/**
 * The two axes of a volume. `samples` are the rows of the data matrix,
 * `features` the columns.
 */
export type Axis = 'samples' | 'features';

/**
 * Value domain of a metadata field or query.
 */
export type FieldDomain = 'numeric' | 'categorical';

/**
 * Scalar values that can be stored in a metadata field or used in a query.
 */
export type MetaScalar = string | number;

// Metadata Fields
// ==============================

/**
 * A field that is declared on a table but carries no values for this instance.
 *
 * Unset fields are never sliced, never matched and never validated against the
 * axis length. The domain is kept so that concatenation and indexing preserve
 * the field's type.
 */
export interface UnsetField {
  kind: 'unset';
  domain: FieldDomain;
}

export interface NumericField {
  kind: 'numeric';
  values: number[];
}

export interface CategoricalField {
  kind: 'categorical';
  values: string[];
}

/**
 * A nested metadata table. Every leaf field inside it follows the same
 * alignment rules as the parent table's own fields.
 */
export interface TableField {
  kind: 'table';
  table: MetaTable;
}

export type SetField = NumericField | CategoricalField;

export type MetaField = UnsetField | SetField | TableField;

/**
 * What callers may pass for a single field when building a table.
 *
 * - `number[]` / `string[]` => a set field of that domain
 * - `[]` => an unset placeholder
 * - a plain object => a nested table
 */
export type MetaFieldInput =
  | readonly number[]
  | readonly string[]
  | MetaField
  | MetaTable
  | MetaTableInput;

export interface MetaTableInput {
  [field: string]: MetaFieldInput;
}

// Descriptors
// ==============================

/**
 * Derived summary of one metadata field.
 *
 * `inverseIndex[i]` is the (zero-based) position of element `i` in
 * `uniqueValues`, so `uniqueValues[inverseIndex[i]] === values[i]`.
 */
export interface FieldDescriptor {
  uniqueValues: number[] | string[];
  inverseIndex: number[];
  count: number;
}

export type AxisDescriptors = Record<string, FieldDescriptor>;

/**
 * A validated table with `order` filled in, and the descriptors built from it.
 */
export interface CheckedMeta {
  table: MetaTable;
  descriptors: AxisDescriptors;
}

// Queries and Indexing
// ==============================

/**
 * Named selection criteria for `findByMeta`, `selectByMeta` and `removeByMeta`.
 *
 * - Criteria on different fields are intersected (AND).
 * - An array value matches any of its entries (OR).
 * - `undefined` means the criterion was not supplied.
 *
 * @example
 * ```ts
 * volume.selectByMeta({ chunks: [1, 2], labels: 'face' });
 * ```
 */
export type Criteria = Record<string, MetaScalar | readonly MetaScalar[] | undefined>;

/**
 * Per-axis boolean masks produced by the query engine.
 */
export interface AxisMasks {
  samples: boolean[];
  features: boolean[];
}

/**
 * Index along one axis.
 * - `':'` selects every position
 * - `boolean[]` is a mask and must match the axis length
 * - `number[]` lists zero-based positions (repeats allowed)
 */
export type AxisIndex = ':' | readonly boolean[] | readonly number[];

// Construction
// ==============================

/**
 * Construction options for a volume.
 *
 * Both tables default to the mandatory fields (`labels`, `chunks`, `names`,
 * `order`), all unset. `order` is filled with `1..n` when left unset.
 */
export interface VolumeOptions {
  metasamples?: MetaTableInput | MetaTable;
  metafeatures?: MetaTableInput | MetaTable;
}

/**
 * The pair of metadata tables owned by a volume.
 */
export interface VolumeMeta {
  samples: MetaTable;
  features: MetaTable;
}

// Introspection
// ==============================

export type FieldKind = MetaField['kind'];

/**
 * Description of a single field of a volume's metadata.
 */
export interface FieldInfo {
  name: string;
  kind: FieldKind;
  /** Undefined for nested tables. */
  domain?: FieldDomain;
  mandatory: boolean;
  /** Number of distinct values; 0 for unset fields and nested tables. */
  count: number;
}

/**
 * Manifest describing a volume's shape and metadata vocabulary.
 */
export interface VolumeManifest {
  nsamples: number;
  nfeatures: number;
  samples: FieldInfo[];
  features: FieldInfo[];
}

/**
 * Distinct values and counts for a single field.
 */
export interface FieldSummary {
  field: string;
  values: Array<{ value: MetaScalar; count: number }>;
}
