import assert from 'node:assert/strict';
import test from 'node:test';

import { FrameTaskTable } from '../src/pipeline/frameTasks.js';
import type { FrameFailure } from '../src/pipeline/types.js';

const frames = ['/s/frames/frame_00000000.png', '/s/frames/frame_00000001.png'];

const failure: FrameFailure = {
  index: 1,
  reason: 'exit-non-zero',
  message: 'Command "upscayl" failed with exit code 1',
  diagnostics: 'invalid model',
};

test('fromFrames maps each frame to an output with the same name', () => {
  const table = FrameTaskTable.fromFrames(frames, '/s/upscaled');
  assert.equal(table.size, 2);
  assert.deepEqual(table.get(1), {
    index: 1,
    inputPath: '/s/frames/frame_00000001.png',
    outputPath: '/s/upscaled/frame_00000001.png',
    state: 'pending',
  });
  assert.deepEqual(table.countByState(), { pending: 2, running: 0, done: 0, failed: 0 });
  assert.equal(table.allDone(), false);
});

test('tasks move pending → running → done or failed', () => {
  const table = FrameTaskTable.fromFrames(frames, '/s/upscaled');
  table.markRunning(0);
  table.markDone(0);
  table.markRunning(1);
  table.markFailed(1, failure);
  assert.deepEqual(table.countByState(), { pending: 0, running: 0, done: 1, failed: 1 });
  assert.deepEqual(table.failures(), [failure]);
  assert.equal(table.get(1).failure, failure);
  assert.equal(table.allDone(), false);
});

test('allDone needs every task done', () => {
  const table = FrameTaskTable.fromFrames(frames, '/s/upscaled');
  for (const task of table.list()) {
    table.markRunning(task.index);
    table.markDone(task.index);
  }
  assert.equal(table.allDone(), true);
  assert.equal(FrameTaskTable.fromFrames([], '/s/upscaled').allDone(), false);
});

test('illegal transitions and unknown indices throw', () => {
  const table = FrameTaskTable.fromFrames(frames, '/s/upscaled');
  assert.throws(() => table.markDone(0), {
    message: 'Illegal frame task transition #0: pending → done',
  });
  table.markRunning(0);
  assert.throws(() => table.markRunning(0), {
    message: 'Illegal frame task transition #0: running → running',
  });
  table.markDone(0);
  assert.throws(() => table.markFailed(0, { ...failure, index: 0 }), {
    message: 'Illegal frame task transition #0: done → failed',
  });
  assert.throws(() => table.get(2), RangeError);
});

test('returned tasks are copies', () => {
  const table = FrameTaskTable.fromFrames(frames, '/s/upscaled');
  const before = table.get(0);
  table.markRunning(0);
  assert.equal(before.state, 'pending');
  assert.equal(table.get(0).state, 'running');
});
