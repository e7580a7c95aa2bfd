import type { Axis } from './types';

/**
 * Base class for every error thrown by metavol.
 *
 * Errors are never caught internally; they surface to the caller as soon as
 * the offending operation detects them.
 */
export class VolumeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'VolumeError';
    this.code = code;
  }
}

/**
 * A metadata field's length disagrees with the length of its axis.
 *
 * @example
 * ```ts
 * new Volume(fourRows, { metasamples: { chunks: [1, 1, 2] } });
 * // ShapeMismatchError: Field "chunks" has length 3 but samples axis has length 4
 * ```
 */
export class ShapeMismatchError extends VolumeError {
  readonly field: string;
  readonly actual: number;
  readonly expected: number;
  readonly axis: Axis;

  constructor(field: string, actual: number, expected: number, axis: Axis) {
    super(
      'SHAPE_MISMATCH',
      `Field "${field}" has length ${actual} but ${axis} axis has length ${expected}`,
    );
    this.name = 'ShapeMismatchError';
    this.field = field;
    this.actual = actual;
    this.expected = expected;
    this.axis = axis;
  }
}

/**
 * A query names a field that neither metadata table holds.
 */
export class FieldNotFoundError extends VolumeError {
  readonly field: string;

  constructor(field: string) {
    super('FIELD_NOT_FOUND', `Meta data does not exist: "${field}"`);
    this.name = 'FieldNotFoundError';
    this.field = field;
  }
}

/**
 * Values of incompatible domains were combined, e.g. a categorical field
 * queried with a number.
 */
export class TypeMismatchError extends VolumeError {
  constructor(message: string) {
    super('TYPE_MISMATCH', message);
    this.name = 'TypeMismatchError';
  }
}

/**
 * The operation is not supported by design, e.g. concatenation along the
 * feature axis.
 */
export class UnsupportedOperationError extends VolumeError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message);
    this.name = 'UnsupportedOperationError';
  }
}

export class IndexOutOfBoundsError extends VolumeError {
  constructor(message: string) {
    super('INDEX_OUT_OF_BOUNDS', message);
    this.name = 'IndexOutOfBoundsError';
  }
}

export class InvalidArgumentError extends VolumeError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}
