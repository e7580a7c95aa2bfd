import { describe, it, expect } from 'vitest';
import { FieldNotFoundError, ShapeMismatchError, VolumeError } from '../src';


describe('Errors', () => {
  it('share a base class and carry a code', () => {
    const error = new ShapeMismatchError('chunks', 3, 4, 'samples');

    expect(error).toBeInstanceOf(VolumeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('SHAPE_MISMATCH');
    expect(error.name).toBe('ShapeMismatchError');
  });


  it('name the missing field', () => {
    const error = new FieldNotFoundError('rt');

    expect(error).toBeInstanceOf(VolumeError);
    expect(error.code).toBe('FIELD_NOT_FOUND');
    expect(error.field).toBe('rt');
    expect(error.message).toBe('Meta data does not exist: "rt"');
  });
});
