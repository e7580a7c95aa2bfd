import { IndexOutOfBoundsError, InvalidArgumentError, ShapeMismatchError } from './errors';

/**
 * Dense row-major matrix of numbers (samples by features).
 *
 * The shape is stored explicitly so a matrix with zero rows still knows how
 * many columns it has.
 */
export class DataMatrix {
  readonly rows: number;
  readonly cols: number;
  readonly values: Float64Array;

  constructor(rows: number, cols: number, values?: Float64Array) {
    if (!Number.isInteger(rows) || rows < 0 || !Number.isInteger(cols) || cols < 0) {
      throw new InvalidArgumentError(`Invalid matrix shape ${rows}x${cols}`);
    }
    const storage = values ?? new Float64Array(rows * cols);
    if (storage.length !== rows * cols) {
      throw new InvalidArgumentError(
        `Matrix storage has ${storage.length} values but shape ${rows}x${cols} needs ${rows * cols}`,
      );
    }
    this.rows = rows;
    this.cols = cols;
    this.values = storage;
  }

  static zeros(rows: number, cols: number): DataMatrix {
    return new DataMatrix(rows, cols);
  }

  /**
   * Build a matrix from an array of rows. All rows must have the same length.
   * `cols` is only needed to give an empty input a column count.
   */
  static fromRows(rows: readonly (readonly number[])[], cols?: number): DataMatrix {
    const width = rows.length > 0 ? rows[0].length : cols ?? 0;
    const matrix = new DataMatrix(rows.length, width);
    rows.forEach((row, rowIndex) => {
      if (row.length !== width) {
        throw new InvalidArgumentError(
          `input data must be nsamples by nfeatures: row ${rowIndex} has ${row.length} values, expected ${width}`,
        );
      }
      matrix.values.set(row, rowIndex * width);
    });
    return matrix;
  }

  /**
   * Stack matrices along the row axis. Every matrix must have the same number
   * of columns.
   */
  static vstack(matrices: readonly DataMatrix[]): DataMatrix {
    if (matrices.length === 0) {
      return new DataMatrix(0, 0);
    }
    const cols = matrices[0].cols;
    let totalRows = 0;
    for (const matrix of matrices) {
      if (matrix.cols !== cols) {
        throw new ShapeMismatchError('data', matrix.cols, cols, 'features');
      }
      totalRows += matrix.rows;
    }

    const stacked = new DataMatrix(totalRows, cols);
    let offset = 0;
    for (const matrix of matrices) {
      stacked.values.set(matrix.values, offset);
      offset += matrix.values.length;
    }
    return stacked;
  }

  get(row: number, col: number): number {
    this.checkBounds(row, col);
    return this.values[row * this.cols + col];
  }

  set(row: number, col: number, value: number): void {
    this.checkBounds(row, col);
    this.values[row * this.cols + col] = value;
  }

  row(row: number): number[] {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new IndexOutOfBoundsError(`Row ${row} is outside a matrix with ${this.rows} rows`);
    }
    return Array.from(this.values.subarray(row * this.cols, (row + 1) * this.cols));
  }

  /**
   * Read one column restricted to the given rows (all rows if omitted).
   */
  column(col: number, rowPositions?: readonly number[]): number[] {
    if (!Number.isInteger(col) || col < 0 || col >= this.cols) {
      throw new IndexOutOfBoundsError(`Column ${col} is outside a matrix with ${this.cols} columns`);
    }
    const positions = rowPositions ?? Array.from({ length: this.rows }, (_unused, i) => i);
    return positions.map((row) => this.values[row * this.cols + col]);
  }

  /**
   * Write one column at the given rows. `column[k]` goes to `rowPositions[k]`.
   */
  setColumn(col: number, rowPositions: readonly number[], column: readonly number[]): void {
    if (column.length !== rowPositions.length) {
      throw new InvalidArgumentError(
        `Column has ${column.length} values but ${rowPositions.length} rows were given`,
      );
    }
    rowPositions.forEach((row, k) => {
      this.set(row, col, column[k]);
    });
  }

  /**
   * Copy out the sub-matrix at the given row and column positions.
   * Positions must already be validated against the shape.
   */
  select(rowPositions: readonly number[], colPositions: readonly number[]): DataMatrix {
    const result = new DataMatrix(rowPositions.length, colPositions.length);
    let write = 0;
    for (const row of rowPositions) {
      const base = row * this.cols;
      for (const col of colPositions) {
        result.values[write++] = this.values[base + col];
      }
    }
    return result;
  }

  clone(): DataMatrix {
    return new DataMatrix(this.rows, this.cols, this.values.slice());
  }

  toRows(): number[][] {
    return Array.from({ length: this.rows }, (_unused, row) => this.row(row));
  }

  private checkBounds(row: number, col: number): void {
    if (
      !Number.isInteger(row) || !Number.isInteger(col) ||
      row < 0 || row >= this.rows || col < 0 || col >= this.cols
    ) {
      throw new IndexOutOfBoundsError(
        `Position (${row}, ${col}) is outside a ${this.rows}x${this.cols} matrix`,
      );
    }
  }
}
