import assert from 'node:assert/strict';
import test from 'node:test';

import fc from 'fast-check';

import {
  CommandAbortedError,
  CommandExitError,
  CommandTimeoutError,
  SpawnFailureError,
} from '../src/cli/utils/exec.js';
import { formatFrameName } from '../src/cli/utils/videoUtils.js';
import { FrameTaskTable } from '../src/pipeline/frameTasks.js';
import { FrameOutputMissingError } from '../src/pipeline/frameUpscaler.js';
import type { FrameSample, ProgressSnapshot } from '../src/pipeline/progress.js';
import type { FrameTask } from '../src/pipeline/types.js';
import {
  classifyFrameFailure,
  clampWorkerCount,
  runUpscalePool,
} from '../src/pipeline/workerPool.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const noOutput = { stdout: Buffer.alloc(0), stderr: Buffer.from('invalid model\n'), durationMs: 3 };

const createTable = (count: number) =>
  FrameTaskTable.fromFrames(
    Array.from({ length: count }, (_, index) => `/s/frames/${formatFrameName(index)}`),
    '/s/upscaled',
  );

/** Records concurrency and the outputs "written" per task. */
const createRecorder = (delayMs: (index: number) => number = () => 1) => {
  const outputs = new Map<string, string>();
  const started: number[] = [];
  let inFlight = 0;
  let maxInFlight = 0;
  const upscaleFrame = async (task: FrameTask) => {
    started.push(task.index);
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    try {
      await sleep(delayMs(task.index));
      outputs.set(task.outputPath, `up(${task.inputPath})`);
    } finally {
      inFlight -= 1;
    }
  };
  return {
    upscaleFrame,
    outputs,
    started,
    get maxInFlight() {
      return maxInFlight;
    },
  };
};

test('clampWorkerCount keeps the pool between one and the task count', () => {
  assert.equal(clampWorkerCount(0), 1);
  assert.equal(clampWorkerCount(-2), 1);
  assert.equal(clampWorkerCount(Number.NaN), 1);
  assert.equal(clampWorkerCount(2.7), 2);
  assert.equal(clampWorkerCount(8, 3), 3);
  assert.equal(clampWorkerCount(4, 0), 1);
});

test('runUpscalePool never exceeds the worker bound', async () => {
  const tasks = createTable(10);
  const recorder = createRecorder((index) => 2 + (index % 3) * 3);
  const report = await runUpscalePool(tasks, recorder.upscaleFrame, { workers: 3 });

  assert.equal(recorder.maxInFlight, 3);
  assert.equal(report.workers, 3);
  assert.equal(report.done, 10);
  assert.equal(report.pending, 0);
  assert.deepEqual(report.failures, []);
  assert.equal(report.cancelled, false);
  assert.equal(report.progress.settled, 10);
  assert.equal(tasks.allDone(), true);
  assert.deepEqual(recorder.started, [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
});

test('runUpscalePool stops dispatching after the first failure', async () => {
  const tasks = createTable(5);
  const report = await runUpscalePool(
    tasks,
    async (task) => {
      if (task.index === 2) {
        throw new CommandExitError('upscayl', ['run'], 1, null, noOutput);
      }
    },
    { workers: 1 },
  );

  assert.equal(report.done, 2);
  assert.equal(report.pending, 2);
  assert.deepEqual(report.failures, [
    {
      index: 2,
      reason: 'exit-non-zero',
      message: 'Command "upscayl" failed with exit code 1',
      diagnostics: 'invalid model',
    },
  ]);
  assert.deepEqual(tasks.countByState(), { pending: 2, running: 0, done: 2, failed: 1 });
});

test('frames already in flight finish after a failure', async () => {
  const tasks = createTable(5);
  const report = await runUpscalePool(
    tasks,
    async (task) => {
      if (task.index === 0) {
        await sleep(5);
        throw new Error('decoder crashed');
      }
      await sleep(30);
    },
    { workers: 2 },
  );

  assert.equal(report.done, 1);
  assert.equal(report.pending, 3);
  assert.equal(tasks.get(1).state, 'done');
  assert.deepEqual(report.failures, [
    { index: 0, reason: 'unknown', message: 'decoder crashed', diagnostics: '' },
  ]);
});

test('aborting stops dispatch and reports cancellation', async () => {
  const controller = new AbortController();
  const tasks = createTable(5);
  const report = await runUpscalePool(
    tasks,
    async (task, signal) => {
      assert.equal(signal, controller.signal);
      if (task.index === 1) {
        controller.abort();
        throw new CommandAbortedError('upscayl', ['run']);
      }
    },
    { workers: 1, signal: controller.signal },
  );

  assert.equal(report.cancelled, true);
  assert.equal(report.done, 1);
  assert.equal(report.pending, 3);
  assert.deepEqual(
    report.failures.map((failure) => failure.reason),
    ['cancelled'],
  );
});

test('onFrameSettled sees every frame with a growing snapshot', async () => {
  const settled: [FrameSample, ProgressSnapshot][] = [];
  await runUpscalePool(createTable(3), async () => {}, {
    workers: 1,
    onFrameSettled: (sample, snapshot) => settled.push([sample, snapshot]),
  });

  assert.deepEqual(
    settled.map(([sample, snapshot]) => [sample.frameIndex, sample.outcome, snapshot.settled]),
    [
      [0, 'done', 1],
      [1, 'done', 2],
      [2, 'done', 3],
    ],
  );
});

test('classifyFrameFailure maps errors to failure reasons', () => {
  assert.equal(
    classifyFrameFailure(0, new CommandTimeoutError('upscayl', [], 50, noOutput)).reason,
    'timeout',
  );
  assert.equal(
    classifyFrameFailure(0, new SpawnFailureError('upscayl', [], new Error('spawn upscayl ENOENT')))
      .reason,
    'spawn-failure',
  );
  assert.deepEqual(classifyFrameFailure(4, new FrameOutputMissingError('/s/upscaled/x.png')), {
    index: 4,
    reason: 'missing-output',
    message: 'Upscaler exited cleanly but produced no image at /s/upscaled/x.png',
    diagnostics: '',
  });
  assert.equal(classifyFrameFailure(0, 'odd').message, 'odd');
});

test('the upscaled frame set does not depend on the worker count', async () => {
  await fc.assert(
    fc.asyncProperty(
      fc.integer({ min: 1, max: 12 }),
      fc.integer({ min: 1, max: 6 }),
      fc.array(fc.integer({ min: 0, max: 4 }), { minLength: 12, maxLength: 12 }),
      async (count, workers, delays) => {
        const serial = createRecorder((index) => delays[index] ?? 0);
        const parallel = createRecorder((index) => delays[index] ?? 0);
        await runUpscalePool(createTable(count), serial.upscaleFrame, { workers: 1 });
        const tasks = createTable(count);
        const report = await runUpscalePool(tasks, parallel.upscaleFrame, { workers });

        assert.equal(report.done, count);
        assert.ok(parallel.maxInFlight <= Math.min(workers, count));
        const byIndex = (outputs: Map<string, string>) =>
          tasks.list().map((task) => outputs.get(task.outputPath));
        assert.deepEqual(byIndex(parallel.outputs), byIndex(serial.outputs));
        assert.deepEqual(
          byIndex(parallel.outputs),
          tasks.list().map((task) => `up(${task.inputPath})`),
        );
      },
    ),
    { numRuns: 25 },
  );
});
