import { CommandAbortedError, CommandError } from '../cli/utils/exec.js';
import type { FrameFailure } from './types.js';

export type PipelineStage =
  | 'config'
  | 'input'
  | 'probe'
  | 'extract'
  | 'upscale'
  | 'encode'
  | 'scratch';

export type PipelineErrorOptions = {
  readonly frameIndex?: number;
  readonly diagnostics?: string;
  readonly cause?: unknown;
};

export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly code: string;
  readonly frameIndex: number | undefined;
  readonly diagnostics: string | undefined;

  constructor(
    stage: PipelineStage,
    code: string,
    message: string,
    options: PipelineErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.code = code;
    this.frameIndex = options.frameIndex;
    this.diagnostics = options.diagnostics;
  }
}

export type ConfigIssue = {
  readonly code: string;
  readonly message: string;
  readonly path: readonly string[];
};

export class ConfigError extends PipelineError {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    const summary =
      issues.length === 1 && issues[0]
        ? issues[0].message
        : `${issues.length} configuration issues`;
    super('config', 'invalid-config', summary);
    this.issues = [...issues];
  }
}

export class InputError extends PipelineError {
  constructor(
    code: 'missing-input' | 'not-a-file' | 'missing-model-path',
    message: string,
    options?: PipelineErrorOptions,
  ) {
    super('input', code, message, options);
  }
}

export class ProbeError extends PipelineError {
  constructor(
    code: 'unreadable' | 'no-video-stream' | 'invalid-metadata',
    message: string,
    options?: PipelineErrorOptions,
  ) {
    super('probe', code, message, options);
  }
}

export class ExtractionError extends PipelineError {
  constructor(
    code: 'decode-failure' | 'no-frames-produced' | 'non-contiguous-frames',
    message: string,
    options?: PipelineErrorOptions,
  ) {
    super('extract', code, message, options);
  }
}

export class UpscaleError extends PipelineError {
  readonly failures: readonly FrameFailure[];

  constructor(failures: readonly FrameFailure[]) {
    const ordered = [...failures].sort((a, b) => a.index - b.index);
    const listed = ordered
      .slice(0, 10)
      .map((failure) => `#${failure.index} (${failure.reason}: ${failure.message})`)
      .join(', ');
    const more = ordered.length > 10 ? `, … ${ordered.length - 10} more` : '';
    super('upscale', 'frames-failed', `${ordered.length} frame(s) failed: ${listed}${more}`, {
      frameIndex: ordered[0]?.index,
      diagnostics: ordered
        .filter((failure) => failure.diagnostics.length > 0)
        .map((failure) => `--- frame #${failure.index} ---\n${failure.diagnostics}`)
        .join('\n'),
    });
    this.failures = ordered;
  }
}

export class EncodeError extends PipelineError {
  constructor(
    code: 'missing-frames' | 'encode-failure' | 'audio-remux-failure' | 'empty-output',
    message: string,
    options?: PipelineErrorOptions,
  ) {
    super('encode', code, message, options);
  }
}

export class ResourceError extends PipelineError {
  constructor(
    code: 'scratch-create' | 'scratch-remove',
    message: string,
    options?: PipelineErrorOptions,
  ) {
    super('scratch', code, message, options);
  }
}

export class CancellationError extends PipelineError {
  constructor(stage: PipelineStage, options?: PipelineErrorOptions) {
    super(stage, 'cancelled', `Cancelled during ${stage}`, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Wraps a Process Runner failure for `stage`; cancellation always surfaces as
 * {@link CancellationError}.
 */
export const wrapCommandError = (
  stage: PipelineStage,
  error: unknown,
  wrap: (message: string, options: PipelineErrorOptions) => PipelineError,
): PipelineError => {
  if (error instanceof PipelineError) {
    return error;
  }
  if (error instanceof CommandAbortedError) {
    return new CancellationError(stage, { cause: error, diagnostics: error.diagnostics });
  }
  if (error instanceof CommandError) {
    return wrap(error.message, { cause: error, diagnostics: error.diagnostics });
  }
  return wrap(describeError(error), { cause: error });
};

export const throwIfCancelled = (signal: AbortSignal | undefined, stage: PipelineStage): void => {
  if (signal?.aborted) {
    throw new CancellationError(stage);
  }
};

export const formatPipelineError = (error: unknown, options: { verbose?: boolean } = {}): string => {
  if (!(error instanceof PipelineError)) {
    return `✖ ${describeError(error)}`;
  }
  const lines = [`✖ [${error.stage}] ${error.message}`];
  if (error instanceof ConfigError && error.issues.length > 1) {
    error.issues.forEach((issue) => {
      lines.push(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    });
  }
  if (options.verbose && error.diagnostics) {
    lines.push(error.diagnostics);
  }
  return lines.join('\n');
};
