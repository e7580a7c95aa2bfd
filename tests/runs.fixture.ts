import { Volume } from '../src';

// Data pools
// ==============================

export const CONDITIONS = ['face', 'house', 'chair'] as const;

export const HEMISPHERES = ['left', 'right'] as const;

export interface RunDesign {
  runs: number;
  trialsPerRun: number;
  features: number;
}

// Generator
// ==============================

/**
 * Deterministic experiment: `runs` chunks of `trialsPerRun` samples each,
 * labels cycling through CONDITIONS, features alternating hemispheres.
 *
 * The value at (sample, feature) is `run * 100 + trial * 10 + feature`, with
 * run and trial counted from 1 and feature from 0, so any row can be traced
 * back to its origin.
 */
export function generateRunVolume(design: RunDesign): Volume {
  const rows: number[][] = [];
  const chunks: number[] = [];
  const labels: string[] = [];
  const names: string[] = [];

  for (let run = 1; run <= design.runs; run++) {
    for (let trial = 1; trial <= design.trialsPerRun; trial++) {
      rows.push(Array.from({ length: design.features }, (_unused, feature) => run * 100 + trial * 10 + feature));
      chunks.push(run);
      labels.push(CONDITIONS[(trial - 1) % CONDITIONS.length]);
      names.push(`run${run}-trial${trial}`);
    }
  }

  return new Volume(rows, {
    metasamples: { chunks, labels, names },
    metafeatures: {
      names: Array.from({ length: design.features }, (_unused, feature) => `roi-${feature}`),
      hemisphere: Array.from({ length: design.features }, (_unused, feature) => HEMISPHERES[feature % 2]),
    },
  });
}

/**
 * Run a function and return what it threw, or undefined.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  }
  catch (error) {
    return error;
  }
  return undefined;
}
