import { describe, it, expect } from 'vitest';
import {
  FieldNotFoundError,
  MetaTable,
  TypeMismatchError,
  categoricalField,
  findByMeta,
  matchField,
  numericField,
  tableField,
  unsetField,
} from '../src';
import { complementMasks } from '../src/utils/matching';


describe('matchField', () => {
  it('matches any of several numeric values', () => {
    expect(matchField(numericField([1, 2, 3, 2]), [2, 3])).toEqual([false, true, true, true]);
  });


  it('matches a single categorical value', () => {
    expect(matchField(categoricalField(['face', 'house', 'face']), 'face')).toEqual([true, false, true]);
  });


  it('compares strings exactly', () => {
    expect(matchField(categoricalField(['Face', 'face', 'face ']), 'face')).toEqual([false, true, false]);
  });


  it('never matches NaN', () => {
    expect(matchField(numericField([Number.NaN, 1]), Number.NaN)).toEqual([false, false]);
  });


  it('returns an empty mask for an empty field', () => {
    expect(matchField(numericField([]), 1)).toEqual([]);
  });


  it('rejects a string query on a numeric field', () => {
    expect(() => matchField(numericField([1, 2]), '1')).toThrow(
      'array must be numeric to match a numeric query',
    );
  });


  it('rejects a numeric query on a categorical field', () => {
    expect(() => matchField(categoricalField(['a']), [1])).toThrow(
      'array must hold strings to match a string query',
    );
  });


  it('rejects mixed and empty queries', () => {
    expect(() => matchField(numericField([1]), [1, 'a'])).toThrow(TypeMismatchError);
    expect(() => matchField(numericField([1]), [])).toThrow('Query must contain at least one value');
  });


  it('refuses unset fields and nested tables', () => {
    expect(() => matchField(unsetField(), 1)).toThrow(TypeMismatchError);
    expect(() => matchField(tableField({ time: [1] }), 1)).toThrow(
      'Cannot match values against a field of kind "table"',
    );
  });
});


describe('findByMeta', () => {
  const samples = MetaTable.withMandatoryFields({
    chunks: [1, 1, 2, 2],
    labels: ['A', 'B', 'A', 'B'],
  });
  const features = MetaTable.withMandatoryFields({
    names: ['x', 'y', 'z'],
  });

  it('leaves both axes all-true without criteria', () => {
    expect(findByMeta(samples, features, 4, 3, {})).toEqual({
      samples: [true, true, true, true],
      features: [true, true, true],
    });
  });


  it('intersects criteria that share an axis', () => {
    const masks = findByMeta(samples, features, 4, 3, { chunks: 2, labels: ['A'] });

    expect(masks.samples).toEqual([false, false, true, false]);
    expect(masks.features).toEqual([true, true, true]);
  });


  it('constrains each axis with the fields it holds', () => {
    const masks = findByMeta(samples, features, 4, 3, { labels: 'B', names: ['x', 'z'] });

    expect(masks.samples).toEqual([false, true, false, true]);
    expect(masks.features).toEqual([true, false, true]);
  });


  it('skips criteria given as undefined', () => {
    const masks = findByMeta(samples, features, 4, 3, { labels: undefined, missing: undefined });

    expect(masks.samples).toEqual([true, true, true, true]);
  });


  it('fails on a field neither table holds', () => {
    expect(() => findByMeta(samples, features, 4, 3, { run: 1 })).toThrow(
      new FieldNotFoundError('run'),
    );
    expect(() => findByMeta(samples, features, 4, 3, { run: 1 })).toThrow(
      'Meta data does not exist: "run"',
    );
  });


  it('accepts a field set on one axis and rejects one unset on both', () => {
    expect(() => findByMeta(samples, features, 4, 3, { names: 'x' })).not.toThrow();
    expect(() => findByMeta(samples, features, 4, 3, { order: 1 })).toThrow(FieldNotFoundError);

    const bare = MetaTable.withMandatoryFields();
    expect(() => findByMeta(bare, bare, 0, 0, { labels: 'A' })).toThrow(FieldNotFoundError);
  });
});


describe('complementMasks', () => {
  it('inverts constrained axes and keeps unconstrained ones', () => {
    expect(complementMasks({
      samples: [true, false, true],
      features: [true, true],
    })).toEqual({
      samples: [false, true, false],
      features: [true, true],
    });
  });


  it('inverts a mask that selects nothing', () => {
    expect(complementMasks({ samples: [false, false], features: [] })).toEqual({
      samples: [true, true],
      features: [],
    });
  });
});
