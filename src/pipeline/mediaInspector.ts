import { stat } from 'node:fs/promises';

import { formatCommandLine } from '../cli/utils/exec.js';
import { buildProbeArgs, parseProbeOutput, ProbeParseError } from '../cli/utils/ffmpeg.js';
import { describeError, InputError, ProbeError, wrapCommandError } from './errors.js';
import type { StageContext, VideoSpec } from './types.js';

const PROBE_TIMEOUT_MS = 60_000;

const ensureReadableFile = async (path: string) => {
  const info = await stat(path).catch((error: unknown) => {
    throw new InputError('missing-input', `Input file does not exist: ${path}`, { cause: error });
  });
  if (!info.isFile()) {
    throw new InputError('not-a-file', `Input is not a regular file: ${path}`);
  }
};

export const inspectVideo = async (path: string, context: StageContext): Promise<VideoSpec> => {
  await ensureReadableFile(path);

  const args = buildProbeArgs(path);
  context.logger.debug(`[probe] ${formatCommandLine(context.tools.ffprobe, args)}`);
  let stdout: string;
  try {
    const result = await context.runner(context.tools.ffprobe, args, {
      timeoutMs: PROBE_TIMEOUT_MS,
      signal: context.signal,
    });
    stdout = result.stdout.toString('utf8');
  } catch (error) {
    throw wrapCommandError(
      'probe',
      error,
      (message, options) =>
        new ProbeError('unreadable', `Could not read ${path}: ${message}`, options),
    );
  }

  try {
    const probe = parseProbeOutput(stdout, path);
    return Object.freeze({
      path,
      width: probe.width,
      height: probe.height,
      fps: probe.fps,
      fpsRational: probe.fpsRational,
      duration: probe.duration,
      hasAudio: probe.hasAudio,
      frameCountHint: probe.frameCount ?? 0,
    });
  } catch (error) {
    if (error instanceof ProbeParseError) {
      const code =
        error.reason === 'no-video-stream'
          ? 'no-video-stream'
          : error.reason === 'invalid-frame-rate'
            ? 'invalid-metadata'
            : 'unreadable';
      throw new ProbeError(code, error.message, { cause: error, diagnostics: stdout });
    }
    throw new ProbeError('unreadable', describeError(error), { cause: error });
  }
};
