import { FieldNotFoundError, TypeMismatchError } from '../errors';
import type { MetaTable } from '../meta-table';
import type { AxisMasks, Criteria, MetaField, MetaScalar } from '../types';
import * as arrayOperations from './array-operations';
import { normalizeQuery } from './type-inference';


/**
 * Mark every element of a field that equals any of the query values.
 *
 * - A single value => exact match
 * - An array => OR across its entries
 * - Numeric fields take numeric queries and categorical fields take string
 *   queries; anything else throws `TypeMismatchError`
 *
 * @example
 * ```ts
 * matchField(numericField([1, 2, 3, 2]), [2, 3]);
 * // [false, true, true, true]
 * ```
 */
export function matchField(field: MetaField, query: MetaScalar | readonly MetaScalar[]): boolean[] {
  if (field.kind === 'unset' || field.kind === 'table') {
    throw new TypeMismatchError(`Cannot match values against a field of kind "${field.kind}"`);
  }

  const normalized = normalizeQuery(query);

  if (field.kind === 'numeric') {
    if (normalized.domain !== 'numeric') {
      throw new TypeMismatchError('array must be numeric to match a numeric query');
    }
    const wanted = normalized.values;
    return field.values.map((value) => wanted.some((candidate) => candidate === value));
  }

  if (normalized.domain !== 'categorical') {
    throw new TypeMismatchError('array must hold strings to match a string query');
  }
  const wanted = new Set(normalized.values);
  return field.values.map((value) => wanted.has(value));
}

/**
 * Resolve named criteria into one mask per axis.
 *
 * Each supplied criterion must name a set field of at least one table. Where the
 * field exists on an axis its matches are intersected into that axis's mask, so
 * criteria combine with AND while multiple values of one criterion combine with
 * OR. Axes a criterion does not touch stay all-true.
 */
export function findByMeta(
  samples: MetaTable,
  features: MetaTable,
  nsamples: number,
  nfeatures: number,
  criteria: Criteria,
): AxisMasks {
  const masks: AxisMasks = {
    samples: arrayOperations.allTrue(nsamples),
    features: arrayOperations.allTrue(nfeatures),
  };

  for (const [name, query] of Object.entries(criteria)) {
    // Not supplied
    if (query === undefined) continue;

    const inSamples = samples.isSet(name);
    const inFeatures = features.isSet(name);
    if (!inSamples && !inFeatures) {
      throw new FieldNotFoundError(name);
    }

    const sampleField = inSamples ? samples.getField(name) : undefined;
    if (sampleField) {
      arrayOperations.intersectMaskInto(masks.samples, matchField(sampleField, query));
    }

    const featureField = inFeatures ? features.getField(name) : undefined;
    if (featureField) {
      arrayOperations.intersectMaskInto(masks.features, matchField(featureField, query));
    }
  }

  return masks;
}

/**
 * Complement the masks of a removal: an axis whose mask was constrained is
 * inverted, an axis left all-true stays all-true.
 */
export function complementMasks(masks: AxisMasks): AxisMasks {
  return {
    samples: arrayOperations.isAllTrue(masks.samples)
      ? masks.samples
      : arrayOperations.invertMask(masks.samples),
    features: arrayOperations.isAllTrue(masks.features)
      ? masks.features
      : arrayOperations.invertMask(masks.features),
  };
}
