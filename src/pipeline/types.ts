import type { CommandRunner } from '../cli/utils/exec.js';
import type { Logger } from '../runtime/logger.js';
import type { PipelineConfig, ToolPaths } from './config.js';
import type { FrameTaskTable } from './frameTasks.js';
import type { ScratchDirectory } from './scratch.js';

/** Derived once by the media inspector; frozen afterwards. */
export type VideoSpec = {
  readonly path: string;
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  /** Frame rate exactly as reported by ffprobe, e.g. `30000/1001`. */
  readonly fpsRational: string;
  readonly duration: number;
  readonly hasAudio: boolean;
  readonly frameCountHint: number;
};

export type FrameTaskState = 'pending' | 'running' | 'done' | 'failed';

export type FrameFailureReason =
  | 'spawn-failure'
  | 'timeout'
  | 'exit-non-zero'
  | 'missing-output'
  | 'cancelled'
  | 'unknown';

export type FrameFailure = {
  readonly index: number;
  readonly reason: FrameFailureReason;
  readonly message: string;
  readonly diagnostics: string;
};

export type FrameTask = {
  readonly index: number;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly state: FrameTaskState;
  readonly failure?: FrameFailure;
};

export type PipelineJob = {
  readonly id: string;
  readonly config: PipelineConfig;
  readonly video: VideoSpec;
  readonly scratch: ScratchDirectory;
  readonly tasks: FrameTaskTable;
};

/** What every stage that shells out needs. */
export type StageContext = {
  readonly runner: CommandRunner;
  readonly tools: ToolPaths;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};
