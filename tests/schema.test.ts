import { describe, it, expect } from 'vitest';
import { Volume, buildCriteriaSchema } from '../src';
import type { VolumeManifest } from '../src';
import { SCENARIO_FEATURES, SCENARIO_ROWS, SCENARIO_SAMPLES } from './test-config';

describe('buildCriteriaSchema', () => {
  const testManifest: VolumeManifest = new Volume(SCENARIO_ROWS, {
    metasamples: { ...SCENARIO_SAMPLES, onsets: { time: [0, 1, 2, 3] } },
    metafeatures: SCENARIO_FEATURES,
  }).describe();

  it('should generate an object schema without extra properties', () => {
    const schema = buildCriteriaSchema(testManifest);

    expect(schema.type).toBe('object');
    expect(schema.additionalProperties).toBe(false);
  });

  it('should list set fields of both axes once, samples first', () => {
    const schema = buildCriteriaSchema(testManifest);

    expect(Object.keys(Object(schema.properties))).toEqual(['labels', 'chunks', 'order', 'names']);
  });

  it('should type categorical fields as strings', () => {
    const schema = buildCriteriaSchema(testManifest);

    expect(schema.properties).toHaveProperty('labels', {
      description: 'Select where "labels" equals any of the given values',
      anyOf: [
        { type: 'string' },
        { type: 'array', items: { type: 'string' }, minItems: 1 },
      ],
    });
  });

  it('should type numeric fields as numbers', () => {
    const schema = buildCriteriaSchema(testManifest);

    expect(schema.properties).toHaveProperty('chunks.anyOf', [
      { type: 'number' },
      { type: 'array', items: { type: 'number' }, minItems: 1 },
    ]);
  });

  it('should leave out nested tables', () => {
    const schema = buildCriteriaSchema(testManifest);

    expect(schema.properties).not.toHaveProperty('onsets');
  });

  it('should include unset fields on request', () => {
    const schema = buildCriteriaSchema(testManifest, { includeUnset: true });

    expect(Object.keys(Object(schema.properties))).toEqual(['labels', 'chunks', 'names', 'order']);
  });

  it('should keep only the filled order field for an empty volume', () => {
    const schema = buildCriteriaSchema(new Volume([]).describe());

    expect(schema.properties).toEqual({ order: expect.any(Object) });
  });
});
