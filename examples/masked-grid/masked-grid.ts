import { MaskedVolume } from '../../src';

function main() {
  // A 3x2x1 grid with four voxels inside the mask
  const volume = new MaskedVolume(
    [
      [0.1, 0.4, 0.9, 0.3],
      [0.2, 0.5, 1.1, 0.2],
      [0.3, 0.7, 1.4, 0.1],
    ],
    {
      shape: [3, 2, 1],
      mask: [true, false, true, true, false, true],
      metasamples: { chunks: [1, 1, 1], labels: ['rest', 'task', 'task'] },
    },
  );

  console.log('Voxels:', volume.voxels);
  console.log('Coordinates:', volume.voxelCoordinates());

  const task = volume.selectByMeta({ labels: 'task' });
  console.log(`Task samples: ${task.nsamples}`);
  console.log('First task sample on the grid:', task.unmask(0));

  const left = volume.get(':', [0, 1]);
  console.log('Mask after keeping two voxels:', left.mask);
}

main();
