import type { ToolPaths, UpscaleJobOptions } from '../pipeline/config.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type ParsedCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'run'; readonly options: UpscaleJobOptions; readonly json: boolean };

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index];
  if (value === undefined) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
};

const parseNumber = (value: string, flag: string): number => {
  const parsed = Number(value);
  if (value.trim().length === 0 || Number.isNaN(parsed)) {
    throw new CliUsageError(`Invalid number for ${flag}: "${value}"`);
  }
  return parsed;
};

/**
 * Turns argv (without the node and script entries) into job options. Range checks are left to
 * `createPipelineConfig` so that the CLI and programmatic callers share them.
 */
export const parseUpscaleArgs = (args: readonly string[]): ParsedCommand => {
  const options: UpscaleJobOptions = {};
  const tools: { -readonly [K in keyof ToolPaths]?: string } = {};
  const positional: string[] = [];
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-s':
      case '--scale':
        options.scale = parseNumber(takeValue(args, ++i, arg), arg);
        break;
      case '-o':
      case '--output':
        options.output = takeValue(args, ++i, arg);
        break;
      case '-w':
      case '--workers':
        options.workers = parseNumber(takeValue(args, ++i, arg), arg);
        break;
      case '-n':
      case '--model':
      case '--model-name':
        options.model = takeValue(args, ++i, arg);
        break;
      case '-m':
      case '--model-path':
        options.modelPath = takeValue(args, ++i, arg);
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '--keep-frames':
        options.keepFrames = true;
        break;
      case '--frame-timeout':
        options.frameTimeoutMs = parseNumber(takeValue(args, ++i, arg), arg) * 1000;
        break;
      case '--crf':
        options.crf = parseNumber(takeValue(args, ++i, arg), arg);
        break;
      case '--preset':
        options.preset = takeValue(args, ++i, arg);
        break;
      case '--gpu-id':
        options.gpuId = parseNumber(takeValue(args, ++i, arg), arg);
        break;
      case '--tile-size':
        options.tileSize = parseNumber(takeValue(args, ++i, arg), arg);
        break;
      case '--tta':
        options.tta = true;
        break;
      case '--ffmpeg':
        tools.ffmpeg = takeValue(args, ++i, arg);
        break;
      case '--ffprobe':
        tools.ffprobe = takeValue(args, ++i, arg);
        break;
      case '--upscayl':
        tools.upscayl = takeValue(args, ++i, arg);
        break;
      case '--telemetry':
        options.telemetryUrl = takeValue(args, ++i, arg);
        break;
      case '--json':
        json = true;
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}"`);
    }
  }

  const [input, outputArg, extra] = positional;
  if (extra !== undefined) {
    throw new CliUsageError(`Unexpected argument "${extra}"`);
  }
  if (!input) {
    throw new CliUsageError('An input video path is required.');
  }
  if (outputArg !== undefined && options.output !== undefined && outputArg !== options.output) {
    throw new CliUsageError(`Output given twice: "${outputArg}" and "${options.output}"`);
  }
  options.input = input;
  if (options.output === undefined && outputArg !== undefined) {
    options.output = outputArg;
  }
  if (Object.keys(tools).length > 0) {
    options.tools = tools;
  }

  return { kind: 'run', options, json };
};
