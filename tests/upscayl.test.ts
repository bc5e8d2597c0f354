import assert from 'node:assert/strict';
import test from 'node:test';

import { buildUpscaylArgs, type UpscaylRequest } from '../src/cli/utils/upscayl.js';

const request: UpscaylRequest = {
  input: '/scratch/frames/frame_00000007.png',
  output: '/scratch/upscaled/frame_00000007.png',
  model: 'upscayl-standard-4x',
  scale: 4,
  modelPath: null,
  gpuId: null,
  tileSize: null,
  tta: false,
};

test('buildUpscaylArgs writes one PNG per frame', () => {
  assert.deepEqual(buildUpscaylArgs(request), [
    'run',
    '-i',
    '/scratch/frames/frame_00000007.png',
    '-o',
    '/scratch/upscaled/frame_00000007.png',
    '-n',
    'upscayl-standard-4x',
    '-s',
    '4',
    '-f',
    'png',
  ]);
});

test('buildUpscaylArgs passes the optional tuning flags', () => {
  const args = buildUpscaylArgs({
    ...request,
    scale: 2,
    modelPath: '/models',
    gpuId: 1,
    tileSize: 0,
    tta: true,
  });
  assert.deepEqual(args.slice(8), ['2', '-f', 'png', '-m', '/models', '-g', '1', '-t', '0', '-x']);
});
