import { CommandError } from '../cli/utils/exec.js';
import { describeError } from './errors.js';
import { FrameOutputMissingError } from './frameUpscaler.js';
import type { FrameTaskTable } from './frameTasks.js';
import {
  UpscaleProgress,
  type FrameOutcome,
  type FrameSample,
  type ProgressSnapshot,
} from './progress.js';
import type { FrameFailure, FrameTask } from './types.js';

export type UpscaleFrameFn = (task: FrameTask, signal?: AbortSignal) => Promise<void>;

export type WorkerPoolOptions = {
  readonly workers: number;
  readonly signal?: AbortSignal;
  readonly onFrameSettled?: (sample: FrameSample, snapshot: ProgressSnapshot) => void;
  readonly historySize?: number;
};

export type UpscaleReport = {
  readonly workers: number;
  readonly done: number;
  /** Tasks never dispatched because the pool halted. */
  readonly pending: number;
  readonly failures: readonly FrameFailure[];
  readonly cancelled: boolean;
  readonly progress: ProgressSnapshot;
};

/** Non-positive or non-finite counts become 1; never more workers than tasks. */
export const clampWorkerCount = (requested: number, taskCount = Number.POSITIVE_INFINITY) => {
  const base = Number.isFinite(requested) && requested >= 1 ? Math.floor(requested) : 1;
  return Math.max(1, Math.min(base, taskCount));
};

export const classifyFrameFailure = (index: number, error: unknown): FrameFailure => {
  if (error instanceof CommandError) {
    return {
      index,
      reason: error.kind === 'aborted' ? 'cancelled' : error.kind,
      message: error.message,
      diagnostics: error.diagnostics,
    };
  }
  if (error instanceof FrameOutputMissingError) {
    return { index, reason: 'missing-output', message: error.message, diagnostics: '' };
  }
  return { index, reason: 'unknown', message: describeError(error), diagnostics: '' };
};

/**
 * Upscales every task with at most `workers` frames in flight. Tasks are handed out in index
 * order; the first failure or an abort stops further dispatch while in-flight frames finish.
 */
export const runUpscalePool = async (
  tasks: FrameTaskTable,
  upscaleFrame: UpscaleFrameFn,
  options: WorkerPoolOptions,
): Promise<UpscaleReport> => {
  const workers = clampWorkerCount(options.workers, tasks.size);
  const progress = new UpscaleProgress(tasks.size, { historySize: options.historySize });
  let cursor = 0;
  let halted = false;

  const nextTask = (): FrameTask | null => {
    if (halted || options.signal?.aborted || cursor >= tasks.size) {
      return null;
    }
    const task = tasks.get(cursor);
    cursor += 1;
    return task;
  };

  const runWorker = async () => {
    for (let task = nextTask(); task; task = nextTask()) {
      tasks.markRunning(task.index);
      progress.begin(task.index);
      let outcome: FrameOutcome;
      try {
        await upscaleFrame(task, options.signal);
        tasks.markDone(task.index);
        outcome = 'done';
      } catch (error) {
        tasks.markFailed(task.index, classifyFrameFailure(task.index, error));
        halted = true;
        outcome = 'failed';
      }
      const sample = progress.end(task.index, outcome);
      options.onFrameSettled?.(sample, progress.snapshot());
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));

  const counts = tasks.countByState();
  return {
    workers,
    done: counts.done,
    pending: counts.pending,
    failures: tasks.failures(),
    cancelled: options.signal?.aborted ?? false,
    progress: progress.snapshot(),
  };
};
