import { InvalidArgumentError } from '../errors';

/**
 * Standardize a series: subtract the mean and divide by the sample standard
 * deviation (n - 1). A series with zero deviation is only centred.
 */
export function zscoreSeries(series: readonly number[]): number[] {
  const n = series.length;
  if (n === 0) return [];

  const mean = series.reduce((sum, value) => sum + value, 0) / n;
  const sumSquares = series.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  const deviation = n > 1 ? Math.sqrt(sumSquares / (n - 1)) : 0;
  const scale = deviation === 0 ? 1 : deviation;

  return series.map((value) => (value - mean) / scale);
}

/**
 * Running median with a window of `windowSize` samples.
 *
 * The window for sample `i` covers `[i - floor(n/2), i - floor(n/2) + n - 1]`
 * and is truncated at both ends of the series. The median of an even count is
 * the mean of the two middle values.
 */
export function medianFilterSeries(series: readonly number[], windowSize: number): number[] {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new InvalidArgumentError(`Median filter size must be a positive integer, got ${windowSize}`);
  }

  const half = Math.floor(windowSize / 2);
  return series.map((_value, i) => {
    const start = Math.max(0, i - half);
    const end = Math.min(series.length, i - half + windowSize);
    return median(series.slice(start, end));
  });
}

/**
 * Savitzky-Golay smoothing of a series with a polynomial of degree `order`
 * fitted over `frameLength` samples.
 *
 * Interior samples take the fitted value at the centre of their frame. The
 * first and last `(frameLength - 1) / 2` samples take the value of the
 * polynomial fitted to the first and last full frame.
 */
export function savitzkyGolaySeries(
  series: readonly number[],
  order: number,
  frameLength: number,
): number[] {
  validateSavitzkyGolay(order, frameLength);
  const n = series.length;
  if (n < frameLength) {
    throw new InvalidArgumentError(
      `Series of length ${n} is shorter than the frame length ${frameLength}`,
    );
  }

  const projection = savitzkyGolayProjection(order, frameLength);
  const half = (frameLength - 1) / 2;
  const applyRow = (row: readonly number[], offset: number): number =>
    row.reduce((sum, weight, j) => sum + weight * series[offset + j], 0);

  return series.map((_value, i) => {
    if (i < half) {
      return applyRow(projection[i], 0);
    }
    if (i >= n - half) {
      return applyRow(projection[i - (n - frameLength)], n - frameLength);
    }
    return applyRow(projection[half], i - half);
  });
}

export function validateSavitzkyGolay(order: number, frameLength: number): void {
  if (!Number.isInteger(frameLength) || frameLength < 1 || frameLength % 2 === 0) {
    throw new InvalidArgumentError(`Frame length must be a positive odd integer, got ${frameLength}`);
  }
  if (!Number.isInteger(order) || order < 0 || order >= frameLength) {
    throw new InvalidArgumentError(
      `Polynomial order must be an integer in [0, ${frameLength - 1}], got ${order}`,
    );
  }
}

// Utilities
// ==============================

function median(values: number[]): number {
  const sorted = [...values].sort((first, second) => first - second);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[middle - 1] + sorted[middle]) / 2
    : sorted[middle];
}

/**
 * Hat matrix `V (V'V)^-1 V'` of a polynomial fit over a centred frame.
 * Row `r` gives the weights that produce the fitted value at frame position `r`.
 * @internal
 */
export function savitzkyGolayProjection(order: number, frameLength: number): number[][] {
  const half = (frameLength - 1) / 2;
  const vandermonde = Array.from({ length: frameLength }, (_unused, r) =>
    Array.from({ length: order + 1 }, (_unusedPower, power) => (r - half) ** power),
  );

  // Normal matrix V'V
  const normal = Array.from({ length: order + 1 }, (_unused, a) =>
    Array.from({ length: order + 1 }, (_unusedB, b) =>
      vandermonde.reduce((sum, row) => sum + row[a] * row[b], 0),
    ),
  );

  // Solve (V'V) X = V' for X, then projection = V X
  const transposed = Array.from({ length: order + 1 }, (_unused, a) =>
    vandermonde.map((row) => row[a]),
  );
  const solved = solveLinearSystem(normal, transposed);

  return vandermonde.map((row) =>
    Array.from({ length: frameLength }, (_unused, column) =>
      row.reduce((sum, value, a) => sum + value * solved[a][column], 0),
    ),
  );
}

/**
 * Gauss-Jordan elimination with partial pivoting: solves `A X = B` for a square,
 * non-singular `A`.
 * @internal
 */
export function solveLinearSystem(matrix: number[][], rhs: number[][]): number[][] {
  const size = matrix.length;
  const a = matrix.map((row) => [...row]);
  const b = rhs.map((row) => [...row]);

  for (let pivot = 0; pivot < size; pivot++) {
    let best = pivot;
    for (let row = pivot + 1; row < size; row++) {
      if (Math.abs(a[row][pivot]) > Math.abs(a[best][pivot])) best = row;
    }
    if (a[best][pivot] === 0) {
      throw new InvalidArgumentError('Cannot solve a singular system');
    }
    [a[pivot], a[best]] = [a[best], a[pivot]];
    [b[pivot], b[best]] = [b[best], b[pivot]];

    const scale = a[pivot][pivot];
    a[pivot] = a[pivot].map((value) => value / scale);
    b[pivot] = b[pivot].map((value) => value / scale);

    for (let row = 0; row < size; row++) {
      if (row === pivot) continue;
      const factor = a[row][pivot];
      if (factor === 0) continue;
      a[row] = a[row].map((value, col) => value - factor * a[pivot][col]);
      b[row] = b[row].map((value, col) => value - factor * b[pivot][col]);
    }
  }

  return b;
}
