export { BaseVolume, Volume, type DataInput } from './volume';
export {
  MaskedVolume,
  VOXEL_FIELD,
  type GridShape,
  type MaskedVolumeOptions,
} from './masked-volume';
export { DataMatrix } from './matrix';

// Metadata Tables
// ==============================
export {
  MANDATORY_FIELDS,
  MetaTable,
  categoricalField,
  numericField,
  tableField,
  unsetField,
  type MandatoryField,
} from './meta-table';

// Engine
// ==============================
export { checkMeta } from './utils/builders';
export { matchField, findByMeta } from './utils/matching';
export { indexMetaTable, resolveAxisIndex } from './utils/indexing';
export { appendMetaTables } from './utils/merging';

// Errors
// ==============================
export {
  FieldNotFoundError,
  IndexOutOfBoundsError,
  InvalidArgumentError,
  ShapeMismatchError,
  TypeMismatchError,
  UnsupportedOperationError,
  VolumeError,
} from './errors';

// Types
// ==============================
export type {
  Axis,
  AxisDescriptors,
  CheckedMeta,
  AxisIndex,
  AxisMasks,
  CategoricalField,
  Criteria,
  FieldDescriptor,
  FieldDomain,
  FieldInfo,
  FieldKind,
  FieldSummary,
  MetaField,
  MetaFieldInput,
  MetaScalar,
  MetaTableInput,
  NumericField,
  SetField,
  TableField,
  UnsetField,
  VolumeManifest,
  VolumeMeta,
  VolumeOptions,
} from './types';

// Schema Helpers
// ==============================
export {
  buildCriteriaSchema,
  type CriteriaSchemaOptions,
  type JsonSchema,
} from './schema';
