import { IndexOutOfBoundsError, InvalidArgumentError, ShapeMismatchError, UnsupportedOperationError } from './errors';
import type { DataMatrix } from './matrix';
import { MetaTable, numericField } from './meta-table';
import type { VolumeMeta, VolumeOptions } from './types';
import { BaseVolume, type DataInput } from './volume';

// Types
// ==============================

/**
 * Size of the voxel grid along x, y and z.
 */
export type GridShape = readonly [number, number, number];

export interface MaskedVolumeOptions extends VolumeOptions {
  shape: GridShape;
  /**
   * In-mask flags for every voxel of the grid (column-major, x fastest).
   * Features are the in-mask voxels in ascending linear order.
   */
  mask?: readonly boolean[];
  /**
   * Zero-based linear grid index of each feature. Takes precedence over `mask`
   * and over a `voxel` field in `metafeatures`.
   */
  voxels?: readonly number[];
}

/**
 * Name of the features field holding each feature's linear voxel index.
 */
export const VOXEL_FIELD = 'voxel';

// Implementation
// ==============================

/**
 * Volume whose features are voxels of a 3-D grid.
 *
 * The grid position of every feature lives in the `voxel` features field, so it
 * follows the features through indexing like any other metadata. Slicing
 * features yields a volume with a smaller mask; stacking requires every
 * operand to share the same grid and voxels.
 *
 * @example
 * ```ts
 * const volume = new MaskedVolume(rows, {
 *   shape: [2, 2, 1],
 *   mask: [true, false, true, true],
 * });
 * volume.voxels; // [0, 2, 3]
 * volume.voxelCoordinates(); // [[0, 0, 0], [0, 1, 0], [1, 1, 0]]
 * ```
 */
export class MaskedVolume extends BaseVolume<MaskedVolume> {
  readonly shape: GridShape;

  constructor(data: DataInput, options: MaskedVolumeOptions) {
    super(data, MaskedVolume.withVoxels(options));
    this.shape = [...options.shape];
  }

  protected self(): MaskedVolume {
    return this;
  }

  protected derive(data: DataMatrix, meta: VolumeMeta): MaskedVolume {
    return new MaskedVolume(data, {
      shape: this.shape,
      metasamples: meta.samples,
      metafeatures: meta.features,
    });
  }

  protected combine(operands: readonly MaskedVolume[]): MaskedVolume {
    for (const operand of operands) {
      if (!operand.shape.every((size, axis) => size === this.shape[axis])) {
        throw new UnsupportedOperationError(
          `Cannot concatenate volumes on grids ${this.shape.join('x')} and ${operand.shape.join('x')}`,
        );
      }
    }

    const { data, meta } = BaseVolume.stackSamples(operands);
    return new MaskedVolume(data, {
      shape: this.shape,
      metasamples: meta.samples,
      metafeatures: meta.features,
    });
  }

  get gridSize(): number {
    return gridSize(this.shape);
  }

  /**
   * Linear grid index of every feature.
   */
  get voxels(): number[] {
    const voxels = this.meta.features.getField(VOXEL_FIELD);
    return voxels?.kind === 'numeric' ? [...voxels.values] : [];
  }

  /**
   * In-mask flags for the whole grid.
   */
  get mask(): boolean[] {
    const mask = new Array<boolean>(this.gridSize).fill(false);
    for (const voxel of this.voxels) {
      mask[voxel] = true;
    }
    return mask;
  }

  /**
   * Zero-based `[x, y, z]` grid coordinates of every feature.
   */
  voxelCoordinates(): Array<[number, number, number]> {
    const [sizeX, sizeY] = this.shape;
    return this.voxels.map((voxel) => [
      voxel % sizeX,
      Math.floor(voxel / sizeX) % sizeY,
      Math.floor(voxel / (sizeX * sizeY)),
    ]);
  }

  /**
   * One sample spread back over the full grid; voxels outside the mask are NaN.
   */
  unmask(sample: number): number[] {
    const values = this.matrix.row(sample);
    const grid = new Array<number>(this.gridSize).fill(Number.NaN);
    this.voxels.forEach((voxel, feature) => {
      grid[voxel] = values[feature];
    });
    return grid;
  }

  /**
   * Resolve the voxel indices from the options and put them on the features table.
   */
  private static withVoxels(options: MaskedVolumeOptions): VolumeOptions {
    const size = gridSize(options.shape);
    const features = MetaTable.withMandatoryFields(options.metafeatures);

    let voxels: readonly number[] | undefined = options.voxels;
    if (voxels === undefined && options.mask !== undefined) {
      if (options.mask.length !== size) {
        throw new ShapeMismatchError('mask', options.mask.length, size, 'features');
      }
      voxels = options.mask.flatMap((inMask, voxel) => (inMask ? [voxel] : []));
    }
    if (voxels === undefined) {
      const existing = features.getField(VOXEL_FIELD);
      if (existing?.kind !== 'numeric') {
        throw new InvalidArgumentError('MaskedVolume needs a mask, voxel indices or a numeric "voxel" field');
      }
      voxels = existing.values;
    }

    const seen = new Set<number>();
    for (const voxel of voxels) {
      if (!Number.isInteger(voxel) || voxel < 0 || voxel >= size) {
        throw new IndexOutOfBoundsError(`Voxel ${voxel} is outside a grid of ${size} voxels`);
      }
      if (seen.has(voxel)) {
        throw new InvalidArgumentError(`Voxel ${voxel} appears more than once`);
      }
      seen.add(voxel);
    }

    features.setField(VOXEL_FIELD, numericField(voxels));
    return { metasamples: options.metasamples, metafeatures: features };
  }
}

function gridSize(shape: GridShape): number {
  for (const size of shape) {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidArgumentError(`Grid shape must hold positive integers, got ${shape.join('x')}`);
    }
  }
  return shape[0] * shape[1] * shape[2];
}
