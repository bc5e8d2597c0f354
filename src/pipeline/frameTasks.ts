import { basename, join } from 'node:path';

import type { FrameFailure, FrameTask, FrameTaskState } from './types.js';

type TaskRecord = {
  readonly index: number;
  readonly inputPath: string;
  readonly outputPath: string;
  state: FrameTaskState;
  failure?: FrameFailure;
};

const ALLOWED_TRANSITIONS: Record<FrameTaskState, readonly FrameTaskState[]> = {
  pending: ['running'],
  running: ['done', 'failed'],
  done: [],
  failed: [],
};

/**
 * State table for one job's frames. The only place task state is written; every transition is
 * checked so a task moves pending → running → done | failed exactly once.
 */
export class FrameTaskTable {
  private readonly records: TaskRecord[];

  private constructor(records: TaskRecord[]) {
    this.records = records;
  }

  /** `inputPaths[i]` becomes task `i`; its output keeps the same file name under `outputDir`. */
  static fromFrames(inputPaths: readonly string[], outputDir: string): FrameTaskTable {
    return new FrameTaskTable(
      inputPaths.map((inputPath, index) => ({
        index,
        inputPath,
        outputPath: join(outputDir, basename(inputPath)),
        state: 'pending',
      })),
    );
  }

  get size(): number {
    return this.records.length;
  }

  get(index: number): FrameTask {
    return { ...this.record(index) };
  }

  list(): FrameTask[] {
    return this.records.map((record) => ({ ...record }));
  }

  markRunning(index: number): void {
    this.transition(index, 'running');
  }

  markDone(index: number): void {
    this.transition(index, 'done');
  }

  markFailed(index: number, failure: FrameFailure): void {
    this.transition(index, 'failed');
    this.record(index).failure = failure;
  }

  countByState(): Record<FrameTaskState, number> {
    const counts: Record<FrameTaskState, number> = { pending: 0, running: 0, done: 0, failed: 0 };
    for (const record of this.records) {
      counts[record.state] += 1;
    }
    return counts;
  }

  failures(): FrameFailure[] {
    const failures: FrameFailure[] = [];
    for (const record of this.records) {
      if (record.failure) {
        failures.push(record.failure);
      }
    }
    return failures;
  }

  allDone(): boolean {
    return this.records.length > 0 && this.records.every((record) => record.state === 'done');
  }

  private record(index: number): TaskRecord {
    const record = this.records[index];
    if (!record) {
      throw new RangeError(`No frame task #${index} (table has ${this.records.length})`);
    }
    return record;
  }

  private transition(index: number, next: FrameTaskState): void {
    const record = this.record(index);
    if (!ALLOWED_TRANSITIONS[record.state].includes(next)) {
      throw new Error(`Illegal frame task transition #${index}: ${record.state} → ${next}`);
    }
    record.state = next;
  }
}
