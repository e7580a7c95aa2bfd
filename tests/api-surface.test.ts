import { describe, it, expect } from 'vitest';
import * as Metavol from '../src';

describe('Public API Surface', () => {
  it('exports exactly the expected runtime API', () => {
    const actual = Object.keys(Metavol).sort();
    const expected = [
      'BaseVolume',
      'DataMatrix',
      'FieldNotFoundError',
      'IndexOutOfBoundsError',
      'InvalidArgumentError',
      'MANDATORY_FIELDS',
      'MaskedVolume',
      'MetaTable',
      'ShapeMismatchError',
      'TypeMismatchError',
      'UnsupportedOperationError',
      'VOXEL_FIELD',
      'Volume',
      'VolumeError',
      'appendMetaTables',
      'buildCriteriaSchema',
      'categoricalField',
      'checkMeta',
      'findByMeta',
      'indexMetaTable',
      'matchField',
      'numericField',
      'resolveAxisIndex',
      'tableField',
      'unsetField',
    ].sort();

    expect(actual).toEqual(expected);
  });

  it('exports the volume variants as classes', () => {
    expect(typeof Metavol.Volume).toBe('function');
    expect(Object.getPrototypeOf(Metavol.Volume)).toBe(Metavol.BaseVolume);
    expect(Object.getPrototypeOf(Metavol.MaskedVolume)).toBe(Metavol.BaseVolume);
  });

  it('exports the mandatory field names in table order', () => {
    expect(Object.keys(Metavol.MANDATORY_FIELDS)).toEqual(['labels', 'chunks', 'names', 'order']);
  });

  it('exports every error as a subclass of VolumeError', () => {
    for (const ErrorClass of [
      Metavol.FieldNotFoundError,
      Metavol.IndexOutOfBoundsError,
      Metavol.InvalidArgumentError,
      Metavol.ShapeMismatchError,
      Metavol.TypeMismatchError,
      Metavol.UnsupportedOperationError,
    ]) {
      expect(Object.getPrototypeOf(ErrorClass)).toBe(Metavol.VolumeError);
    }
  });
});
