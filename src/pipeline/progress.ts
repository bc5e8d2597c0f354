export type FrameOutcome = 'done' | 'failed';

export type FrameSample = {
  readonly frameIndex: number;
  readonly frameMs: number;
  readonly outcome: FrameOutcome;
};

export type ProgressSnapshot = {
  readonly total: number;
  readonly settled: number;
  readonly done: number;
  readonly failed: number;
  readonly frameMsAvg: number;
  readonly frameMsMax: number;
  readonly lastSample: FrameSample | null;
  readonly history: readonly FrameSample[];
};

type Clock = {
  now: () => bigint;
};

export type UpscaleProgressOptions = {
  /** Number of most recent samples kept in the snapshot history. */
  historySize?: number;
};

const DEFAULT_CLOCK: Clock = {
  now: () => process.hrtime.bigint(),
};

/** Per-frame timing for the upscale stage; frames may be in flight concurrently. */
export class UpscaleProgress {
  private readonly total: number;
  private readonly historySize: number;
  private readonly clock: Clock;
  private readonly started = new Map<number, bigint>();
  private readonly history: FrameSample[] = [];

  private done = 0;
  private failed = 0;
  private frameMsTotal = 0;
  private frameMsMax = 0;
  private lastSample: FrameSample | null = null;

  constructor(total: number, options: UpscaleProgressOptions = {}, clock: Clock = DEFAULT_CLOCK) {
    this.total = Math.max(0, Math.floor(total));
    this.historySize = Math.max(0, Math.floor(options.historySize ?? 32));
    this.clock = clock;
  }

  begin(frameIndex: number): void {
    if (this.started.has(frameIndex)) {
      throw new Error(`[progress] frame #${frameIndex} started twice without settling.`);
    }
    this.started.set(frameIndex, this.clock.now());
  }

  end(frameIndex: number, outcome: FrameOutcome): FrameSample {
    const start = this.started.get(frameIndex);
    if (start === undefined) {
      throw new Error(`[progress] frame #${frameIndex} settled without being started.`);
    }
    this.started.delete(frameIndex);
    const frameMs = Number(this.clock.now() - start) / 1_000_000;
    const sample: FrameSample = { frameIndex, frameMs, outcome };

    if (outcome === 'done') {
      this.done += 1;
    } else {
      this.failed += 1;
    }
    this.frameMsTotal += frameMs;
    this.frameMsMax = Math.max(this.frameMsMax, frameMs);
    this.lastSample = sample;
    if (this.historySize > 0) {
      this.history.push(sample);
      if (this.history.length > this.historySize) {
        this.history.shift();
      }
    }
    return sample;
  }

  snapshot(): ProgressSnapshot {
    const settled = this.done + this.failed;
    return {
      total: this.total,
      settled,
      done: this.done,
      failed: this.failed,
      frameMsAvg: settled > 0 ? this.frameMsTotal / settled : 0,
      frameMsMax: this.frameMsMax,
      lastSample: this.lastSample,
      history: [...this.history],
    };
  }
}

export const formatProgressLine = (snapshot: ProgressSnapshot): string => {
  const percent = snapshot.total > 0 ? Math.floor((snapshot.settled * 100) / snapshot.total) : 100;
  return `[upscale] ${snapshot.settled}/${snapshot.total} (${percent}%) - done ${snapshot.done}, failed ${snapshot.failed}, avg ${snapshot.frameMsAvg.toFixed(0)}ms/frame`;
};
