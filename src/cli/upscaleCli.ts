#!/usr/bin/env node
import process from 'node:process';

import { CliUsageError, parseUpscaleArgs, type ParsedCommand } from './args.js';
import { formatSummary } from './summary.js';
import { killRunningCommands } from './utils/exec.js';
import {
  createPipelineConfig,
  DEFAULT_MODEL,
  DEFAULT_MODEL_PATH,
  type PipelineConfig,
} from '../pipeline/config.js';
import { CancellationError, ConfigError, formatPipelineError } from '../pipeline/errors.js';
import { formatProgressLine, type FrameSample, type ProgressSnapshot } from '../pipeline/progress.js';
import { createConsoleLogger, type Logger } from '../runtime/logger.js';
import { connectTelemetry, nullTelemetry } from '../runtime/telemetry.js';
import { upscaleVideo } from '../runtime/upscaleVideo.js';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;
const EXIT_CANCELLED = 130;

const printUsage = () => {
  console.log(`video-upscale – upscale every frame of a video with upscayl

Usage:
  video-upscale <input> [output] [options]

Options:
  -o, --output <path>       Output video (default "<input>_upscaled.<ext>")
  -s, --scale <2|3|4>       Upscale factor (default 4)
  -w, --workers <n>         Frames upscaled concurrently (default 1)
  -n, --model <name>        upscayl model name (default "${DEFAULT_MODEL}")
  -m, --model-path <dir>    upscayl model folder (default "${DEFAULT_MODEL_PATH}")
  -v, --verbose             Echo external commands and their output on failure
      --keep-frames         Keep extracted and upscaled frames for inspection
      --frame-timeout <s>   Per-frame upscale timeout in seconds, 0 disables (default 600)
      --crf <0-51>          x265 quality (default 18)
      --preset <name>       x265 preset (default "slow")
      --gpu-id <n>          GPU used by upscayl (default auto)
      --tile-size <n>       upscayl tile size, 0 = auto
      --tta                 Enable upscayl TTA mode
      --ffmpeg <path>       ffmpeg executable (default "ffmpeg")
      --ffprobe <path>      ffprobe executable (default "ffprobe")
      --upscayl <path>      upscayl executable (default "upscayl")
      --telemetry <ws-url>  Stream progress events to a WebSocket endpoint
      --json                Print the result summary as JSON
  -h, --help                Show this help

Examples:
  video-upscale input.mp4                      # 4x
  video-upscale input.mp4 -s 2                 # 2x
  video-upscale input.mp4 -s 4 -o output.mp4   # explicit output
  video-upscale input.mp4 -w 4 -v              # 4 workers, verbose`);
};

const exitWithError = (message: string, code: number): never => {
  console.error(message);
  process.exit(code);
};

/** Logs every frame in verbose mode, otherwise each 10% step and every failure. */
const createProgressReporter = (logger: Logger, verbose: boolean) => {
  let lastDecile = -1;
  return (sample: FrameSample, snapshot: ProgressSnapshot) => {
    if (sample.outcome === 'failed') {
      logger.warn(`[upscale] frame #${sample.frameIndex} failed`);
    }
    const decile =
      snapshot.total > 0 ? Math.floor((snapshot.settled * 10) / snapshot.total) : 10;
    if (verbose || decile > lastDecile || snapshot.settled === snapshot.total) {
      logger.info(formatProgressLine(snapshot));
    }
    lastDecile = Math.max(lastDecile, decile);
  };
};

const resolveConfig = (command: Extract<ParsedCommand, { kind: 'run' }>): PipelineConfig => {
  try {
    return createPipelineConfig(command.options);
  } catch (error) {
    if (error instanceof ConfigError) {
      return exitWithError(formatPipelineError(error), EXIT_USAGE);
    }
    throw error;
  }
};

const main = async () => {
  const [, , ...argv] = process.argv;
  let command: ParsedCommand;
  try {
    command = parseUpscaleArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      return exitWithError(`${error.message}\nRun "video-upscale --help" for usage.`, EXIT_USAGE);
    }
    throw error;
  }
  if (command.kind === 'help') {
    printUsage();
    return;
  }

  const config = resolveConfig(command);
  const logger = createConsoleLogger({ verbose: config.verbose, quiet: command.json });
  const controller = new AbortController();
  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals += 1;
    if (signals > 1) {
      killRunningCommands();
      exitWithError(`\n[cancel] ${signal} again, exiting immediately`, EXIT_CANCELLED);
    }
    logger.warn(`\n[cancel] ${signal} received, stopping… (repeat to force)`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const telemetry = config.telemetryUrl
    ? await connectTelemetry(config.telemetryUrl, logger)
    : nullTelemetry;
  try {
    const summary = await upscaleVideo(config, {
      logger,
      signal: controller.signal,
      telemetry,
      onFrameSettled: createProgressReporter(logger, config.verbose),
    });
    if (command.json) {
      console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
    } else {
      (await formatSummary(summary)).forEach((line) => console.log(line));
    }
  } catch (error) {
    console.error(formatPipelineError(error, { verbose: config.verbose }));
    process.exitCode = error instanceof CancellationError ? EXIT_CANCELLED : EXIT_FAILURE;
  } finally {
    await telemetry.close();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(EXIT_FAILURE);
});
