import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import { runCommand, type CommandRunner } from '../cli/utils/exec.js';
import type { PipelineConfig } from '../pipeline/config.js';
import {
  CancellationError,
  PipelineError,
  UpscaleError,
  describeError,
  throwIfCancelled,
} from '../pipeline/errors.js';
import { createFrameTasks, extractFrames } from '../pipeline/frameExtractor.js';
import { createFrameUpscaler, ensureModelFolder } from '../pipeline/frameUpscaler.js';
import { inspectVideo } from '../pipeline/mediaInspector.js';
import type { FrameSample, ProgressSnapshot } from '../pipeline/progress.js';
import { reassembleVideo } from '../pipeline/reassembler.js';
import { withScratchDirectory } from '../pipeline/scratch.js';
import type { PipelineJob, StageContext, VideoSpec } from '../pipeline/types.js';
import { runUpscalePool } from '../pipeline/workerPool.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { nullTelemetry, type TelemetrySink } from './telemetry.js';

export type UpscaleVideoDependencies = {
  readonly runner?: CommandRunner;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly telemetry?: TelemetrySink;
  readonly onFrameSettled?: (sample: FrameSample, snapshot: ProgressSnapshot) => void;
  readonly createJobId?: () => string;
};

export type UpscaleSummary = {
  readonly jobId: string;
  readonly input: string;
  readonly output: string;
  readonly source: VideoSpec;
  readonly width: number;
  readonly height: number;
  readonly scale: number;
  readonly model: string;
  readonly workers: number;
  readonly frames: number;
  readonly bytes: number;
  readonly elapsedSeconds: number;
  /** Kept scratch directory when keep-frames was requested, otherwise `null`. */
  readonly scratchDir: string | null;
  readonly frameMsAvg: number;
  readonly frameMsMax: number;
};

const describeSource = (logger: Logger, video: VideoSpec, scale: number) => {
  logger.info(`  resolution: ${video.width}x${video.height}`);
  logger.info(`  frame rate: ${video.fps.toFixed(2)} fps (${video.fpsRational})`);
  logger.info(`  duration:   ${video.duration.toFixed(1)} s`);
  if (video.frameCountHint > 0) {
    logger.info(`  frames:     ~${video.frameCountHint}`);
  }
  logger.info(`  audio:      ${video.hasAudio ? 'yes' : 'no'}`);
  logger.info(`  target:     ${video.width * scale}x${video.height * scale}`);
};

/**
 * Runs one job end to end: model check → scratch → probe → extract → upscale → encode. Any
 * stage failure halts the job; the scratch directory is released on every path.
 */
export const upscaleVideo = async (
  config: PipelineConfig,
  dependencies: UpscaleVideoDependencies = {},
): Promise<UpscaleSummary> => {
  const logger = dependencies.logger ?? createConsoleLogger({ verbose: config.verbose });
  const telemetry = dependencies.telemetry ?? nullTelemetry;
  const signal = dependencies.signal;
  const jobId = (dependencies.createJobId ?? randomUUID)();
  const context: StageContext = {
    runner: dependencies.runner ?? runCommand,
    tools: config.tools,
    logger,
    signal,
  };
  const started = performance.now();

  try {
    await ensureModelFolder(config.modelPath);
    const summary = await withScratchDirectory(
      {
        prefix: `video-upscale-${jobId.slice(0, 8)}-`,
        parentDir: config.scratchParent,
        keep: config.keepFrames,
        logger,
      },
      async (scratch) => {
        throwIfCancelled(signal, 'probe');
        logger.info('[1/4] probing input…');
        const video = await inspectVideo(config.input, context);
        describeSource(logger, video, config.scale);

        throwIfCancelled(signal, 'extract');
        logger.info('\n[2/4] extracting frames…');
        const frames = await extractFrames(video, scratch, context);
        logger.info(`  extracted ${frames.length} frames`);

        const job: PipelineJob = {
          id: jobId,
          config,
          video,
          scratch,
          tasks: createFrameTasks(frames, scratch),
        };
        telemetry.send({
          type: 'job-start',
          jobId,
          input: video.path,
          width: video.width,
          height: video.height,
          fps: video.fps,
          frames: job.tasks.size,
          scale: config.scale,
          workers: config.workers,
        });

        throwIfCancelled(signal, 'upscale');
        logger.info(
          `\n[3/4] upscaling ${job.tasks.size} frames (${config.scale}x, model ${config.model}, ${config.workers} worker(s))…`,
        );
        const report = await runUpscalePool(job.tasks, createFrameUpscaler(context, config), {
          workers: config.workers,
          signal,
          onFrameSettled: (sample, snapshot) => {
            telemetry.send({
              type: 'frame',
              jobId,
              frameIndex: sample.frameIndex,
              outcome: sample.outcome,
              frameMs: sample.frameMs,
              settled: snapshot.settled,
              total: snapshot.total,
            });
            dependencies.onFrameSettled?.(sample, snapshot);
          },
        });
        if (report.cancelled) {
          throw new CancellationError('upscale');
        }
        if (report.failures.length > 0) {
          throw new UpscaleError(report.failures);
        }

        throwIfCancelled(signal, 'encode');
        logger.info('\n[4/4] encoding upscaled video…');
        const result = await reassembleVideo(job, context);

        return {
          jobId,
          input: video.path,
          output: result.output,
          source: video,
          width: video.width * config.scale,
          height: video.height * config.scale,
          scale: config.scale,
          model: config.model,
          workers: report.workers,
          frames: result.frames,
          bytes: result.bytes,
          elapsedSeconds: 0,
          scratchDir: config.keepFrames ? scratch.root : null,
          frameMsAvg: report.progress.frameMsAvg,
          frameMsMax: report.progress.frameMsMax,
        } satisfies UpscaleSummary;
      },
    );
    telemetry.send({ type: 'job-end', jobId, status: 'ok' });
    return { ...summary, elapsedSeconds: (performance.now() - started) / 1000 };
  } catch (error) {
    telemetry.send({
      type: 'job-end',
      jobId,
      status: error instanceof CancellationError ? 'cancelled' : 'failed',
      message: error instanceof PipelineError ? `[${error.stage}] ${error.message}` : describeError(error),
    });
    throw error;
  }
};
