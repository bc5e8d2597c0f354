import { homedir } from 'node:os';
import { basename, dirname, extname, join, resolve } from 'node:path';

import { MAX_TIMEOUT_MS } from '../cli/utils/exec.js';
import { ConfigError, type ConfigIssue } from './errors.js';

export const SCALE_FACTORS = [2, 3, 4] as const;
export type ScaleFactor = (typeof SCALE_FACTORS)[number];

export const OUTPUT_CONTAINERS = ['mp4', 'mov', 'm4v', 'mkv'] as const;
export type OutputContainer = (typeof OUTPUT_CONTAINERS)[number];

export const X265_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
  'placebo',
] as const;
export type X265Preset = (typeof X265_PRESETS)[number];

export const DEFAULT_SCALE: ScaleFactor = 4;
export const DEFAULT_MODEL = 'upscayl-standard-4x';
export const DEFAULT_MODEL_PATH = join(homedir(), '.upscayl-cli', 'resources', 'models');
export const DEFAULT_FRAME_TIMEOUT_MS = 600_000;
export const DEFAULT_CRF = 18;
export const DEFAULT_PRESET: X265Preset = 'slow';

export type ToolPaths = {
  readonly ffmpeg: string;
  readonly ffprobe: string;
  readonly upscayl: string;
};

export const DEFAULT_TOOLS: ToolPaths = {
  ffmpeg: 'ffmpeg',
  ffprobe: 'ffprobe',
  upscayl: 'upscayl',
};

export type EncoderSettings = {
  readonly codec: 'libx265';
  readonly crf: number;
  readonly preset: X265Preset;
  readonly pixelFormat: 'yuv420p';
};

export type UpscaleJobOptions = {
  input?: string;
  output?: string;
  scale?: number;
  workers?: number;
  model?: string;
  modelPath?: string;
  keepFrames?: boolean;
  verbose?: boolean;
  frameTimeoutMs?: number;
  crf?: number;
  preset?: string;
  gpuId?: number;
  tileSize?: number;
  tta?: boolean;
  tools?: Partial<ToolPaths>;
  scratchParent?: string;
  telemetryUrl?: string;
};

export type PipelineConfig = {
  readonly input: string;
  readonly output: string;
  readonly container: OutputContainer;
  readonly scale: ScaleFactor;
  readonly workers: number;
  readonly model: string;
  /** `null` leaves the model folder to the upscaler's own default. */
  readonly modelPath: string | null;
  readonly keepFrames: boolean;
  readonly verbose: boolean;
  readonly frameTimeoutMs: number;
  readonly encoder: EncoderSettings;
  readonly gpuId: number | null;
  readonly tileSize: number | null;
  readonly tta: boolean;
  readonly tools: ToolPaths;
  readonly scratchParent: string | null;
  readonly telemetryUrl: string | null;
};

const pushIssue = (issues: ConfigIssue[], code: string, message: string, path: string) => {
  issues.push({ code, message, path: [path] });
};

const isScaleFactor = (value: number): value is ScaleFactor =>
  SCALE_FACTORS.some((scale) => scale === value);

const isX265Preset = (value: string): value is X265Preset =>
  X265_PRESETS.some((preset) => preset === value);

export const containerFromPath = (path: string): OutputContainer | null => {
  const extension = extname(path).slice(1).toLowerCase();
  return OUTPUT_CONTAINERS.find((container) => container === extension) ?? null;
};

/** `<dir>/<stem>_upscaled.<ext>`, keeping the input's extension when it is a supported container. */
export const defaultOutputPath = (input: string): string => {
  const extension = extname(input);
  const stem = basename(input, extension);
  const outputExtension = containerFromPath(input) ? extension : '.mp4';
  return join(dirname(input), `${stem}_upscaled${outputExtension}`);
};

const readOptionalInteger = (
  issues: ConfigIssue[],
  value: number | undefined,
  path: string,
  label: string,
): number | null => {
  if (value === undefined) {
    return null;
  }
  if (!Number.isInteger(value) || value < 0) {
    pushIssue(issues, `${path}/invalid`, `${label} must be a non-negative integer (got ${value})`, path);
    return null;
  }
  return value;
};

const readToolPath = (issues: ConfigIssue[], value: string | undefined, key: keyof ToolPaths) => {
  if (value === undefined) {
    return DEFAULT_TOOLS[key];
  }
  if (value.trim().length === 0) {
    pushIssue(issues, `tools/${key}/empty`, `The ${key} executable path must not be empty`, key);
    return DEFAULT_TOOLS[key];
  }
  return value;
};

export const createPipelineConfig = (
  options: UpscaleJobOptions,
  cwd: string = process.cwd(),
): PipelineConfig => {
  const issues: ConfigIssue[] = [];

  let input = '';
  if (!options.input || options.input.trim().length === 0) {
    pushIssue(issues, 'input/required', 'An input video path is required', 'input');
  } else {
    input = resolve(cwd, options.input);
  }

  const output =
    options.output !== undefined && options.output.length > 0
      ? resolve(cwd, options.output)
      : defaultOutputPath(input);
  let container: OutputContainer = 'mp4';
  const outputContainer = containerFromPath(output);
  if (outputContainer) {
    container = outputContainer;
  } else {
    pushIssue(
      issues,
      'output/container',
      `Unsupported output container "${extname(output) || '(none)'}"; use one of ${OUTPUT_CONTAINERS.map((c) => `.${c}`).join(', ')}`,
      'output',
    );
  }
  if (input && output === input) {
    pushIssue(issues, 'output/same-as-input', 'Output path must differ from the input path', 'output');
  }

  const rawScale = options.scale ?? DEFAULT_SCALE;
  let scale: ScaleFactor = DEFAULT_SCALE;
  if (isScaleFactor(rawScale)) {
    scale = rawScale;
  } else {
    pushIssue(
      issues,
      'scale/unsupported',
      `Unsupported scale "${rawScale}". Use ${SCALE_FACTORS.join(', ')}.`,
      'scale',
    );
  }

  const rawWorkers = options.workers ?? 1;
  let workers = 1;
  if (!Number.isInteger(rawWorkers)) {
    pushIssue(issues, 'workers/integer', `Worker count must be an integer (got ${rawWorkers})`, 'workers');
  } else {
    workers = Math.max(1, rawWorkers);
  }

  const model = (options.model ?? DEFAULT_MODEL).trim();
  if (model.length === 0) {
    pushIssue(issues, 'model/empty', 'Model name must not be empty', 'model');
  }

  const modelPath =
    options.modelPath === undefined
      ? DEFAULT_MODEL_PATH
      : options.modelPath.trim().length > 0
        ? resolve(cwd, options.modelPath)
        : null;

  const frameTimeoutMs = options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS;
  if (!Number.isFinite(frameTimeoutMs) || frameTimeoutMs < 0 || frameTimeoutMs > MAX_TIMEOUT_MS) {
    pushIssue(
      issues,
      'frameTimeout/invalid',
      `Frame timeout must be between 0 and ${MAX_TIMEOUT_MS} milliseconds (got ${frameTimeoutMs})`,
      'frameTimeoutMs',
    );
  }

  const crf = options.crf ?? DEFAULT_CRF;
  if (!Number.isInteger(crf) || crf < 0 || crf > 51) {
    pushIssue(issues, 'encoder/crf', `CRF must be an integer between 0 and 51 (got ${crf})`, 'crf');
  }

  const rawPreset = options.preset ?? DEFAULT_PRESET;
  let preset: X265Preset = DEFAULT_PRESET;
  if (isX265Preset(rawPreset)) {
    preset = rawPreset;
  } else {
    pushIssue(
      issues,
      'encoder/preset',
      `Unknown encoder preset "${rawPreset}". Use one of ${X265_PRESETS.join(', ')}.`,
      'preset',
    );
  }

  const gpuId = readOptionalInteger(issues, options.gpuId, 'gpuId', 'GPU id');
  const tileSize = readOptionalInteger(issues, options.tileSize, 'tileSize', 'Tile size');

  let telemetryUrl: string | null = null;
  if (options.telemetryUrl !== undefined) {
    if (URL.canParse(options.telemetryUrl)) {
      const url = new URL(options.telemetryUrl);
      if (url.protocol === 'ws:' || url.protocol === 'wss:') {
        telemetryUrl = url.toString();
      }
    }
    if (telemetryUrl === null) {
      pushIssue(
        issues,
        'telemetry/url',
        `Telemetry endpoint must be a ws:// or wss:// URL (got "${options.telemetryUrl}")`,
        'telemetryUrl',
      );
    }
  }

  const tools: ToolPaths = {
    ffmpeg: readToolPath(issues, options.tools?.ffmpeg, 'ffmpeg'),
    ffprobe: readToolPath(issues, options.tools?.ffprobe, 'ffprobe'),
    upscayl: readToolPath(issues, options.tools?.upscayl, 'upscayl'),
  };

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return Object.freeze({
    input,
    output,
    container,
    scale,
    workers,
    model,
    modelPath,
    keepFrames: options.keepFrames ?? false,
    verbose: options.verbose ?? false,
    frameTimeoutMs,
    encoder: Object.freeze({ codec: 'libx265', crf, preset, pixelFormat: 'yuv420p' }),
    gpuId,
    tileSize,
    tta: options.tta ?? false,
    tools: Object.freeze(tools),
    scratchParent: options.scratchParent ? resolve(cwd, options.scratchParent) : null,
    telemetryUrl,
  });
};
