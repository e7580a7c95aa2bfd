/**
 * A mask of the given length with every position selected.
 */
export function allTrue(length: number): boolean[] {
  return new Array<boolean>(length).fill(true);
}

/**
 * True when every entry of the mask is set. An empty mask counts as all-true.
 */
export function isAllTrue(mask: readonly boolean[]): boolean {
  return mask.every(Boolean);
}

export function invertMask(mask: readonly boolean[]): boolean[] {
  return mask.map((selected) => !selected);
}

/**
 * AND `mask` into `target` in place. Both must have the same length.
 */
export function intersectMaskInto(target: boolean[], mask: readonly boolean[]): void {
  for (let i = 0; i < target.length; i++) {
    target[i] = target[i] && mask[i];
  }
}

/**
 * Positions (zero-based, ascending) of the selected entries of a mask.
 */
export function maskToPositions(mask: readonly boolean[]): number[] {
  const positions: number[] = [];
  mask.forEach((selected, position) => {
    if (selected) positions.push(position);
  });
  return positions;
}

export function identityPositions(length: number): number[] {
  return Array.from({ length }, (_unused, i) => i);
}

/**
 * Pick the entries of `values` at the given positions into a new array.
 */
export function takePositions<T>(values: readonly T[], positions: readonly number[]): T[] {
  return positions.map((position) => values[position]);
}
