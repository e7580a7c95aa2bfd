import { Volume, buildCriteriaSchema } from '../../src';

// Two runs of a small experiment: 6 trials, 4 regions of interest
const rows = Array.from({ length: 6 }, (_unused, trial) =>
  Array.from({ length: 4 }, (_unusedRoi, roi) => trial * 10 + roi),
);

function main() {
  const volume = new Volume(rows, {
    metasamples: {
      chunks: [1, 1, 1, 2, 2, 2],
      labels: ['face', 'house', 'rest', 'face', 'house', 'rest'],
    },
    metafeatures: {
      names: ['v1', 'v2', 'ffa', 'ppa'],
    },
  });

  console.log('=== Example 1: Select by label ===');
  const faces = volume.selectByMeta({ labels: 'face' });
  console.log(`Kept ${faces.nsamples} of ${volume.nsamples} samples`);
  console.log('Original positions:', faces.getField('samples', 'order'));
  console.log();

  console.log('=== Example 2: Combine criteria across axes ===');
  const stimuli = volume.selectByMeta({ labels: ['face', 'house'], names: ['ffa', 'ppa'] });
  console.log('Data:', stimuli.data.toRows());
  console.log();

  console.log('=== Example 3: Remove rest trials, then z-score per run ===');
  const trials = volume.removeByMeta({ labels: 'rest' }).zscore();
  console.log('Chunks:', trials.getField('samples', 'chunks'));
  console.log('First row:', trials.data.row(0));
  console.log();

  console.log('=== Example 4: Stack runs back together ===');
  const restacked = volume
    .selectByMeta({ chunks: 1 })
    .concatSamples([volume.selectByMeta({ chunks: 2 })]);
  console.log('Order:', restacked.getField('samples', 'order'));
  console.log();

  console.log('=== Example 5: Describe the criteria a volume accepts ===');
  console.log(JSON.stringify(buildCriteriaSchema(volume.describe()), null, 2));
}

main();
