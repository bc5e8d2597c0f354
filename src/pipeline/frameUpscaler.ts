import { stat } from 'node:fs/promises';

import { formatCommandLine } from '../cli/utils/exec.js';
import { buildUpscaylArgs } from '../cli/utils/upscayl.js';
import type { PipelineConfig } from './config.js';
import { InputError } from './errors.js';
import { fileSize } from './scratch.js';
import type { FrameTask, StageContext } from './types.js';
import type { UpscaleFrameFn } from './workerPool.js';

export class FrameOutputMissingError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Upscaler exited cleanly but produced no image at ${path}`);
    this.name = 'FrameOutputMissingError';
    this.path = path;
  }
}

/** Fails with `missing-model-path` unless `modelPath` is `null` or an existing directory. */
export const ensureModelFolder = async (modelPath: string | null) => {
  if (modelPath === null) {
    return;
  }
  const info = await stat(modelPath).catch((error: unknown) => {
    throw new InputError('missing-model-path', `Model folder does not exist: ${modelPath}`, {
      cause: error,
    });
  });
  if (!info.isDirectory()) {
    throw new InputError('missing-model-path', `Model path is not a directory: ${modelPath}`);
  }
};

/** One upscayl invocation per frame, writing only to the task's own output path. */
export const createFrameUpscaler =
  (context: StageContext, config: PipelineConfig): UpscaleFrameFn =>
  async (task: FrameTask, signal?: AbortSignal) => {
    const args = buildUpscaylArgs({
      input: task.inputPath,
      output: task.outputPath,
      model: config.model,
      scale: config.scale,
      modelPath: config.modelPath,
      gpuId: config.gpuId,
      tileSize: config.tileSize,
      tta: config.tta,
    });
    context.logger.debug(`[upscale] #${task.index} ${formatCommandLine(context.tools.upscayl, args)}`);
    await context.runner(context.tools.upscayl, args, {
      timeoutMs: config.frameTimeoutMs,
      signal,
    });
    if ((await fileSize(task.outputPath)) === 0) {
      throw new FrameOutputMissingError(task.outputPath);
    }
  };
