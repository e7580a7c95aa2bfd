import {
  InvalidArgumentError,
  ShapeMismatchError,
  UnsupportedOperationError,
} from './errors';
import { DataMatrix } from './matrix';
import type { MetaTable } from './meta-table';
import type {
  Axis,
  AxisDescriptors,
  AxisIndex,
  AxisMasks,
  Criteria,
  FieldSummary,
  MetaFieldInput,
  MetaScalar,
  VolumeManifest,
  VolumeMeta,
  VolumeOptions,
} from './types';
import * as arrayOperations from './utils/array-operations';
import { buildManifest, checkMeta, fromOptions } from './utils/builders';
import { medianFilterSeries, savitzkyGolaySeries, validateSavitzkyGolay, zscoreSeries } from './utils/filters';
import { indexMetaTable, resolveAxisIndex } from './utils/indexing';
import { complementMasks, findByMeta } from './utils/matching';
import { appendMetaTables } from './utils/merging';


export type DataInput = DataMatrix | readonly (readonly number[])[];

/**
 * Data matrix (samples by features) with a metadata table for each axis that
 * stays in register with the data through indexing, selection and
 * concatenation.
 *
 * Concrete variants supply two factory methods: `derive` builds a variant from
 * sliced data and tables, `combine` builds one from several operands stacked
 * along the sample axis. Every operation returns a new, independently owned
 * instance; only the chunk-wise filters (`zscore`, `medianFilter`,
 * `sgDetrend`) modify the data in place.
 */
export abstract class BaseVolume<V extends BaseVolume<V>> {
  protected readonly matrix: DataMatrix;
  protected readonly meta: VolumeMeta;
  private desc: Record<Axis, AxisDescriptors>;

  constructor(data: DataInput, options: VolumeOptions = {}) {
    this.matrix = data instanceof DataMatrix ? data.clone() : DataMatrix.fromRows(data);
    const meta = fromOptions(options);
    const samples = checkMeta(meta.samples, this.matrix.rows, 'samples');
    const features = checkMeta(meta.features, this.matrix.cols, 'features');
    this.meta = { samples: samples.table, features: features.table };
    this.desc = { samples: samples.descriptors, features: features.descriptors };
  }

  // Factory Hooks
  // ==============================

  /**
   * The instance as its concrete variant type.
   */
  protected abstract self(): V;

  /**
   * Build a new instance of the concrete variant from sliced parts.
   */
  protected abstract derive(data: DataMatrix, meta: VolumeMeta): V;

  /**
   * Build a new instance of the concrete variant by stacking the operands
   * along the sample axis. Implementations usually start from `stackSamples`.
   */
  protected abstract combine(operands: readonly V[]): V;

  // Shape and Metadata Access
  // ==============================

  get nsamples(): number {
    return this.matrix.rows;
  }

  get nfeatures(): number {
    return this.matrix.cols;
  }

  /**
   * The data matrix owned by this volume. Writing to it changes the volume.
   */
  get data(): DataMatrix {
    return this.matrix;
  }

  /**
   * A copy of the samples metadata table.
   */
  get samples(): MetaTable {
    return this.meta.samples.clone();
  }

  /**
   * A copy of the features metadata table.
   */
  get features(): MetaTable {
    return this.meta.features.clone();
  }

  /**
   * A copy of the values of a leaf field, or undefined when the field is
   * missing, unset or a nested table.
   */
  getField(axis: Axis, name: string): number[] | string[] | undefined {
    return this.meta[axis].values(name)?.slice();
  }

  /**
   * Add or replace a metadata field, then re-validate the table and rebuild
   * its descriptors. On failure the table is left as it was.
   */
  setField(axis: Axis, name: string, input: MetaFieldInput): this {
    const candidate = this.meta[axis].clone().setField(name, input);
    const length = axis === 'samples' ? this.nsamples : this.nfeatures;
    const { table, descriptors } = checkMeta(candidate, length, axis);

    this.meta[axis] = table;
    this.desc = { ...this.desc, [axis]: descriptors };
    return this;
  }

  /**
   * A copy of the unique values, inverse indices and counts of every leaf
   * field on an axis.
   */
  descriptors(axis: Axis): AxisDescriptors {
    const copy: AxisDescriptors = {};
    for (const [name, descriptor] of Object.entries(this.desc[axis])) {
      copy[name] = {
        uniqueValues: descriptor.uniqueValues.slice(),
        inverseIndex: [...descriptor.inverseIndex],
        count: descriptor.count,
      };
    }
    return copy;
  }

  // Selection
  // ==============================

  /**
   * Boolean masks for samples and features matching every criterion.
   *
   * @example
   * ```ts
   * const { samples } = volume.findByMeta({ chunks: 1 });
   * ```
   */
  findByMeta(criteria: Criteria): AxisMasks {
    return findByMeta(this.meta.samples, this.meta.features, this.nsamples, this.nfeatures, criteria);
  }

  /**
   * A new volume with only the samples and features that match every criterion.
   * Multiple values for one criterion match any of them.
   *
   * @example
   * ```ts
   * const faces = volume.selectByMeta({ labels: ['face', 'house'], chunks: 2 });
   * ```
   */
  selectByMeta(criteria: Criteria): V {
    const masks = this.findByMeta(criteria);
    return this.get(masks.samples, masks.features);
  }

  /**
   * A new volume without the samples and features that match the criteria.
   * An axis the criteria do not constrain is kept whole.
   */
  removeByMeta(criteria: Criteria): V {
    const masks = complementMasks(this.findByMeta(criteria));
    return this.get(masks.samples, masks.features);
  }

  /**
   * Index the volume. A missing column index keeps every feature and leaves
   * the features table untouched.
   *
   * @example
   * ```ts
   * volume.get([0, 2]); // first and third sample, all features
   * volume.get(':', [true, false, true]); // all samples, two features
   * ```
   */
  get(rows: AxisIndex, cols?: AxisIndex): V {
    const rowPositions = resolveAxisIndex(rows, this.nsamples, 'samples');
    const colPositions = resolveAxisIndex(cols ?? ':', this.nfeatures, 'features');

    return this.derive(this.matrix.select(rowPositions, colPositions), {
      samples: indexMetaTable(this.meta.samples, rowPositions),
      features: cols === undefined
        ? this.meta.features.clone()
        : indexMetaTable(this.meta.features, colPositions),
    });
  }

  // Concatenation
  // ==============================

  /**
   * Stack this volume and `others` along the sample axis. The concrete
   * variant's own `combine` receives every operand.
   */
  concatSamples(others: readonly V[]): V {
    return this.combine([this.self(), ...others]);
  }

  /**
   * Concatenate along an axis. Only the sample axis is supported.
   */
  concat(axis: Axis, others: readonly V[]): V {
    if (axis !== 'samples') {
      return this.concatFeatures(others);
    }
    return this.concatSamples(others);
  }

  /**
   * Always throws: two volumes' feature axes are not known to describe the
   * same quantities, so they are never merged automatically.
   */
  concatFeatures(_others: readonly V[]): never {
    throw new UnsupportedOperationError('concatenation in feature dimension is not supported');
  }

  /**
   * Stack operands along the sample axis.
   *
   * - Data rows are stacked in operand order
   * - Samples tables are merged field by field
   * - Every operand must carry the same features table as the first
   */
  protected static stackSamples<T extends BaseVolume<T>>(
    operands: readonly BaseVolume<T>[],
  ): { data: DataMatrix; meta: VolumeMeta } {
    if (operands.length === 0) {
      throw new InvalidArgumentError('Concatenation needs at least one volume');
    }

    const [first, ...rest] = operands;
    let samples = first.meta.samples.clone();
    for (const operand of rest) {
      if (operand.nfeatures !== first.nfeatures) {
        throw new ShapeMismatchError('data', operand.nfeatures, first.nfeatures, 'features');
      }
      if (!operand.meta.features.equals(first.meta.features)) {
        throw new UnsupportedOperationError(
          'Cannot concatenate volumes whose features metadata differ',
        );
      }
      samples = appendMetaTables(samples, operand.meta.samples, 'samples');
    }

    return {
      data: DataMatrix.vstack(operands.map((operand) => operand.matrix)),
      meta: { samples, features: first.meta.features.clone() },
    };
  }

  // Chunk-wise Filters
  // ==============================

  /**
   * Z-score every feature over time, separately within each chunk.
   */
  zscore(): this {
    return this.applyPerChunk((series) => zscoreSeries(series));
  }

  /**
   * Median-filter every feature over time with window `windowSize`,
   * separately within each chunk.
   */
  medianFilter(windowSize: number): this {
    return this.applyPerChunk((series) => medianFilterSeries(series, windowSize));
  }

  /**
   * Remove slow drifts by subtracting a Savitzky-Golay smoothed copy of every
   * feature, separately within each chunk.
   *
   * Chunks are processed one after another; if one is shorter than the frame
   * the error is thrown with earlier chunks already detrended.
   */
  sgDetrend(order: number, frameLength: number): this {
    validateSavitzkyGolay(order, frameLength);
    return this.applyPerChunk((series) => {
      const smooth = savitzkyGolaySeries(series, order, frameLength);
      return series.map((value, i) => value - smooth[i]);
    });
  }

  // Introspection
  // ==============================

  describe(): VolumeManifest {
    return buildManifest(this.nsamples, this.nfeatures, this.meta, this.desc);
  }

  /**
   * Distinct values of a leaf field with the number of elements holding each,
   * sorted by value. Missing, unset and nested fields give no values.
   */
  getFieldSummary(axis: Axis, field: string): FieldSummary {
    const descriptor = this.desc[axis][field];
    if (!descriptor) {
      return { field, values: [] };
    }

    const counts = new Array<number>(descriptor.count).fill(0);
    for (const position of descriptor.inverseIndex) {
      counts[position]++;
    }
    const uniqueValues: MetaScalar[] = [...descriptor.uniqueValues];
    return {
      field,
      values: uniqueValues.map((value, position) => ({ value, count: counts[position] })),
    };
  }

  // Utilities
  // ==============================

  /**
   * Sample positions of each chunk, in ascending chunk order. Without chunks
   * the whole sample axis is one group.
   */
  protected chunkGroups(): number[][] {
    const descriptor = this.desc.samples.chunks;
    if (!descriptor || descriptor.count === 0) {
      if (this.nsamples > 0) {
        // eslint-disable-next-line no-console
        console.warn('Samples have no chunks; filtering all samples as a single chunk.');
      }
      return this.nsamples > 0 ? [arrayOperations.identityPositions(this.nsamples)] : [];
    }

    const groups: number[][] = Array.from({ length: descriptor.count }, () => []);
    descriptor.inverseIndex.forEach((group, position) => {
      groups[group].push(position);
    });
    return groups;
  }

  private applyPerChunk(transform: (series: number[]) => number[]): this {
    for (const rows of this.chunkGroups()) {
      for (let col = 0; col < this.nfeatures; col++) {
        this.matrix.setColumn(col, rows, transform(this.matrix.column(col, rows)));
      }
    }
    return this;
  }
}

/**
 * The plain volume variant.
 *
 * @example
 * ```ts
 * const volume = new Volume(
 *   [[1, 2, 3], [4, 5, 6], [7, 8, 9], [10, 11, 12]],
 *   { metasamples: { chunks: [1, 1, 2, 2], labels: ['A', 'B', 'A', 'B'] } },
 * );
 * volume.selectByMeta({ labels: 'A' }).nsamples; // 2
 * ```
 */
export class Volume extends BaseVolume<Volume> {
  protected self(): Volume {
    return this;
  }

  protected derive(data: DataMatrix, meta: VolumeMeta): Volume {
    return new Volume(data, { metasamples: meta.samples, metafeatures: meta.features });
  }

  protected combine(operands: readonly Volume[]): Volume {
    const { data, meta } = BaseVolume.stackSamples(operands);
    return new Volume(data, { metasamples: meta.samples, metafeatures: meta.features });
  }
}
