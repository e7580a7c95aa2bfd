import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Volume, type Criteria, type MetaScalar } from '../src';
import { caseWithCriteriaArb, volumeCaseArb, type VolumeCase } from './property-generators';

// Naive Baseline Implementation
// ==============================

function buildVolume(testCase: VolumeCase): Volume {
  return new Volume(testCase.rows, {
    metasamples: { chunks: testCase.chunks, labels: testCase.labels },
    metafeatures: { region: testCase.regions },
  });
}

function isList(query: MetaScalar | readonly MetaScalar[]): query is readonly MetaScalar[] {
  return Array.isArray(query);
}

function accepts(query: MetaScalar | readonly MetaScalar[] | undefined, value: MetaScalar): boolean {
  if (query === undefined) return true;
  const wanted: readonly MetaScalar[] = isList(query) ? query : [query];
  return wanted.includes(value);
}

/**
 * Masks computed element by element, one criterion at a time.
 */
function naiveMasks(testCase: VolumeCase, criteria: Criteria): { samples: boolean[]; features: boolean[] } {
  return {
    samples: testCase.chunks.map((chunk, i) =>
      accepts(criteria.chunks, chunk) && accepts(criteria.labels, testCase.labels[i]),
    ),
    features: testCase.regions.map((region) => accepts(criteria.region, region)),
  };
}

function samplesOnly(criteria: Criteria): Criteria {
  const { region: _region, ...rest } = criteria;
  return rest;
}

// Properties
// ==============================

describe('Volume - Properties', () => {
  it('findByMeta agrees with an element-wise filter', () => {
    fc.assert(
      fc.property(caseWithCriteriaArb, ([testCase, criteria]) => {
        expect(buildVolume(testCase).findByMeta(criteria)).toEqual(naiveMasks(testCase, criteria));
      }),
      { numRuns: 200 },
    );
  });


  it('indexing with every position reproduces the volume', () => {
    fc.assert(
      fc.property(volumeCaseArb, (testCase) => {
        const volume = buildVolume(testCase);
        const copy = volume.get(':', ':');

        expect(copy.data.toRows()).toEqual(testCase.rows);
        expect(copy.samples.equals(volume.samples)).toBe(true);
        expect(copy.features.equals(volume.features)).toBe(true);
      }),
    );
  });


  it('selected rows keep their data and order values', () => {
    fc.assert(
      fc.property(caseWithCriteriaArb, ([testCase, criteria]) => {
        const selected = buildVolume(testCase).selectByMeta(criteria);
        const sampleOrder: MetaScalar[] = [...(selected.getField('samples', 'order') ?? [])];
        const featureOrder: MetaScalar[] = [...(selected.getField('features', 'order') ?? [])];

        expect(sampleOrder).toHaveLength(selected.nsamples);
        expect(featureOrder).toHaveLength(selected.nfeatures);
        sampleOrder.forEach((sample, k) => {
          const expected = featureOrder.map((feature) => testCase.rows[Number(sample) - 1][Number(feature) - 1]);
          expect(selected.data.row(k)).toEqual(expected);
        });
      }),
    );
  });


  it('select and remove partition the samples when some sample is left out', () => {
    fc.assert(
      fc.property(caseWithCriteriaArb, ([testCase, criteria]) => {
        const sampleCriteria = samplesOnly(criteria);
        const volume = buildVolume(testCase);
        // An unconstrained or fully matched axis is kept whole by removal
        fc.pre(volume.findByMeta(sampleCriteria).samples.some((selected) => !selected));

        const selected = volume.selectByMeta(sampleCriteria);
        const removed = volume.removeByMeta(sampleCriteria);

        const orders = [
          ...(selected.getField('samples', 'order') ?? []),
          ...(removed.getField('samples', 'order') ?? []),
        ].map(Number).sort((first, second) => first - second);

        expect(orders).toEqual(testCase.rows.map((_row, i) => i + 1));
        expect(selected.features.equals(volume.features)).toBe(true);
        expect(removed.features.equals(volume.features)).toBe(true);
      }),
    );
  });


  it('derived metadata stays as long as the derived axes', () => {
    fc.assert(
      fc.property(caseWithCriteriaArb, ([testCase, criteria]) => {
        const removed = buildVolume(testCase).removeByMeta(criteria);

        expect(removed.getField('samples', 'chunks')).toHaveLength(removed.nsamples);
        expect(removed.getField('samples', 'labels')).toHaveLength(removed.nsamples);
        expect(removed.getField('features', 'region')).toHaveLength(removed.nfeatures);
      }),
    );
  });
});
