import type { FieldInfo, VolumeManifest } from './types';

// Types
// ==============================

/**
 * JSON Schema type (minimal representation).
 */
export type JsonSchema = { [key: string]: unknown };

export interface CriteriaSchemaOptions {
  /**
   * Include unset fields. They cannot be queried until they hold values, so
   * they are left out by default.
   */
  includeUnset?: boolean;
}

// Implementation
// ==============================

/**
 * Build a JSON schema describing the criteria accepted by `selectByMeta`,
 * `removeByMeta` and `findByMeta` for a given volume manifest.
 *
 * Each queryable field becomes a property that takes a single value or an array
 * of values of the field's domain (strings for categorical fields, numbers for
 * numeric ones). A field present on both axes appears once; nested tables are
 * not queryable.
 *
 * @param manifest - The manifest returned by `volume.describe()`
 * @param options - Options for schema generation
 * @returns A JSON schema object describing the criteria structure
 */
export function buildCriteriaSchema(
  manifest: VolumeManifest,
  options: CriteriaSchemaOptions = {},
): JsonSchema {
  const properties: Record<string, unknown> = {};

  const addField = (field: FieldInfo): void => {
    if (field.kind === 'table') return;
    if (field.kind === 'unset' && !options.includeUnset) return;
    if (properties[field.name]) return;

    const baseType = field.domain === 'numeric' ? 'number' : 'string';
    properties[field.name] = {
      description: `Select where "${field.name}" equals any of the given values`,
      anyOf: [
        { type: baseType },
        { type: 'array', items: { type: baseType }, minItems: 1 },
      ],
    };
  };

  for (const field of [...manifest.samples, ...manifest.features]) addField(field);

  return {
    type: 'object',
    properties,
    additionalProperties: false,
  };
}
