import { mkdir, mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Logger } from '../runtime/logger.js';
import { describeError, ResourceError } from './errors.js';

export type ScratchDirectory = {
  readonly root: string;
  /** Decoded source frames. */
  readonly framesDir: string;
  /** Upscaled frames, same file names as `framesDir`. */
  readonly upscaledDir: string;
};

export type ScratchOptions = {
  readonly prefix: string;
  readonly parentDir?: string | null;
  /** Keep the directory and its contents instead of removing it. */
  readonly keep: boolean;
  readonly logger: Logger;
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';

/** Size in bytes, or `0` when the path does not exist. */
export const fileSize = async (path: string): Promise<number> => {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : 0;
  } catch (error) {
    if (isMissingFileError(error)) {
      return 0;
    }
    throw error;
  }
};

export const createScratchDirectory = async (
  prefix: string,
  parentDir?: string | null,
): Promise<ScratchDirectory> => {
  const parent = parentDir ?? tmpdir();
  try {
    const root = await mkdtemp(join(parent, prefix));
    const framesDir = join(root, 'frames');
    const upscaledDir = join(root, 'upscaled');
    await mkdir(framesDir);
    await mkdir(upscaledDir);
    return { root, framesDir, upscaledDir };
  } catch (error) {
    throw new ResourceError(
      'scratch-create',
      `Could not create a scratch directory in ${parent}: ${describeError(error)}`,
      { cause: error },
    );
  }
};

/**
 * Runs `body` with a scratch directory that belongs to it alone. The directory is removed on
 * every exit path unless `keep` is set.
 */
export const withScratchDirectory = async <T>(
  options: ScratchOptions,
  body: (scratch: ScratchDirectory) => Promise<T>,
): Promise<T> => {
  const scratch = await createScratchDirectory(options.prefix, options.parentDir);
  options.logger.debug(`[scratch] created ${scratch.root}`);

  let result: T;
  try {
    result = await body(scratch);
  } catch (error) {
    await releaseScratch(scratch, options).catch((cleanupError: unknown) => {
      options.logger.warn(`[scratch] ${describeError(cleanupError)}`);
    });
    throw error;
  }
  await releaseScratch(scratch, options);
  return result;
};

const releaseScratch = async (scratch: ScratchDirectory, options: ScratchOptions) => {
  if (options.keep) {
    options.logger.warn(`[scratch] keeping frames in ${scratch.root}`);
    return;
  }
  try {
    await rm(scratch.root, { recursive: true, force: true });
  } catch (error) {
    throw new ResourceError(
      'scratch-remove',
      `Could not remove scratch directory ${scratch.root}: ${describeError(error)}`,
      { cause: error },
    );
  }
  options.logger.debug(`[scratch] removed ${scratch.root}`);
};
