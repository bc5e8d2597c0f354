import { mkdir, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { formatCommandLine } from '../cli/utils/exec.js';
import { buildEncodeArgs, buildRemuxArgs } from '../cli/utils/ffmpeg.js';
import { FRAME_FILE_PATTERN } from '../cli/utils/videoUtils.js';
import { describeError, EncodeError, PipelineError, wrapCommandError } from './errors.js';
import type { FrameTaskTable } from './frameTasks.js';
import { fileSize } from './scratch.js';
import type { PipelineJob, StageContext } from './types.js';

export type ReassemblyResult = {
  readonly output: string;
  readonly bytes: number;
  readonly frames: number;
};

export type ReassembleOptions = {
  /** `0` (default) waits for the encoder however long it takes. */
  readonly timeoutMs?: number;
};

export const verifyUpscaledFrames = async (tasks: FrameTaskTable): Promise<void> => {
  let found = 0;
  for (const task of tasks.list()) {
    if (task.state === 'done' && (await fileSize(task.outputPath)) > 0) {
      found += 1;
    }
  }
  if (found !== tasks.size) {
    throw new EncodeError(
      'missing-frames',
      `Expected ${tasks.size} upscaled frames, found ${found}`,
    );
  }
};

/**
 * Encodes the upscaled frames at the source frame rate, then stream-copies the source audio in
 * when there is any. A failed run leaves no output file behind.
 */
export const reassembleVideo = async (
  job: PipelineJob,
  context: StageContext,
  options: ReassembleOptions = {},
): Promise<ReassemblyResult> => {
  const { config, video, scratch, tasks } = job;
  await verifyUpscaledFrames(tasks);

  const output = config.output;
  const encodeTarget = video.hasAudio ? join(scratch.root, `encoded.${config.container}`) : output;
  const run = async (args: string[]) => {
    context.logger.debug(`[encode] ${formatCommandLine(context.tools.ffmpeg, args)}`);
    await context.runner(context.tools.ffmpeg, args, {
      timeoutMs: options.timeoutMs ?? 0,
      signal: context.signal,
    });
  };

  try {
    await mkdir(dirname(output), { recursive: true });
    await run(
      buildEncodeArgs({
        inputPattern: join(scratch.upscaledDir, FRAME_FILE_PATTERN),
        fpsRational: video.fpsRational,
        output: encodeTarget,
        container: config.container,
        encoder: config.encoder,
      }),
    ).catch((error: unknown) => {
      throw wrapCommandError(
        'encode',
        error,
        (message, wrapOptions) => new EncodeError('encode-failure', message, wrapOptions),
      );
    });

    if (video.hasAudio) {
      await run(
        buildRemuxArgs({
          video: encodeTarget,
          audioSource: video.path,
          output,
          container: config.container,
        }),
      ).catch((error: unknown) => {
        throw wrapCommandError(
          'encode',
          error,
          (message, wrapOptions) =>
            new EncodeError('audio-remux-failure', `Audio remux failed: ${message}`, wrapOptions),
        );
      });
    }

    const bytes = await fileSize(output);
    if (bytes === 0) {
      throw new EncodeError('empty-output', `Encoder finished but ${output} is missing or empty`);
    }
    return { output, bytes, frames: tasks.size };
  } catch (error) {
    await rm(output, { force: true }).catch((cleanupError: unknown) => {
      context.logger.warn(`[encode] could not remove partial output: ${describeError(cleanupError)}`);
    });
    if (error instanceof PipelineError) {
      throw error;
    }
    throw new EncodeError('encode-failure', describeError(error), { cause: error });
  }
};
