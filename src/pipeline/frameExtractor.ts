import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { formatCommandLine } from '../cli/utils/exec.js';
import { buildExtractArgs } from '../cli/utils/ffmpeg.js';
import { FRAME_FILE_PATTERN, parseFrameIndex } from '../cli/utils/videoUtils.js';
import { ExtractionError, wrapCommandError } from './errors.js';
import { FrameTaskTable } from './frameTasks.js';
import type { ScratchDirectory } from './scratch.js';
import type { StageContext, VideoSpec } from './types.js';

export type ExtractOptions = {
  /** `0` (default) waits for the decoder however long it takes. */
  readonly timeoutMs?: number;
};

/**
 * Reads the decoded frame files back in numeric index order and checks that the indices run
 * 0..N-1 without gaps.
 */
export const listFrameFiles = async (dir: string): Promise<string[]> => {
  const indexed: { index: number; name: string }[] = [];
  for (const name of await readdir(dir)) {
    const index = parseFrameIndex(name);
    if (index !== null) {
      indexed.push({ index, name });
    }
  }
  indexed.sort((a, b) => a.index - b.index);
  indexed.forEach((entry, position) => {
    if (entry.index !== position) {
      throw new ExtractionError(
        'non-contiguous-frames',
        `Decoded frames are not contiguous: expected frame #${position}, found #${entry.index}`,
      );
    }
  });
  return indexed.map((entry) => join(dir, entry.name));
};

export const extractFrames = async (
  video: VideoSpec,
  scratch: ScratchDirectory,
  context: StageContext,
  options: ExtractOptions = {},
): Promise<string[]> => {
  const args = buildExtractArgs(video.path, join(scratch.framesDir, FRAME_FILE_PATTERN));
  context.logger.debug(`[extract] ${formatCommandLine(context.tools.ffmpeg, args)}`);
  try {
    await context.runner(context.tools.ffmpeg, args, {
      timeoutMs: options.timeoutMs ?? 0,
      signal: context.signal,
    });
  } catch (error) {
    throw wrapCommandError(
      'extract',
      error,
      (message, wrapOptions) =>
        new ExtractionError('decode-failure', `Frame decode failed: ${message}`, wrapOptions),
    );
  }

  const frames = await listFrameFiles(scratch.framesDir);
  if (frames.length === 0) {
    throw new ExtractionError('no-frames-produced', `Decoding ${video.path} produced no frames`);
  }
  return frames;
};

export const createFrameTasks = (
  frames: readonly string[],
  scratch: ScratchDirectory,
): FrameTaskTable => FrameTaskTable.fromFrames(frames, scratch.upscaledDir);
