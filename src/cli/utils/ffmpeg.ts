import { basename } from 'node:path';

import type { EncoderSettings, OutputContainer } from '../../pipeline/config.js';
import { parseRationalFps } from './videoUtils.js';

export type MediaProbe = {
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  readonly fpsRational: string;
  readonly duration: number;
  readonly hasAudio: boolean;
  readonly frameCount?: number;
};

export class ProbeParseError extends Error {
  readonly reason: 'malformed' | 'no-video-stream' | 'invalid-frame-rate';

  constructor(reason: ProbeParseError['reason'], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeParseError';
    this.reason = reason;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
const asPositiveInteger = (value: unknown): number | null =>
  typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;

const parseNumericString = (value: unknown): number | null => {
  const text = asString(value);
  if (text === null || text.length === 0) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
};

const HVC1_CONTAINERS: readonly OutputContainer[] = ['mp4', 'mov', 'm4v'];

export const buildProbeArgs = (input: string): string[] => [
  '-v',
  'error',
  '-show_entries',
  'stream=index,codec_type,width,height,r_frame_rate,nb_frames:format=duration',
  '-of',
  'json',
  input,
];

export const parseProbeOutput = (stdout: string, input: string): MediaProbe => {
  let payload: unknown;
  try {
    payload = JSON.parse(stdout);
  } catch (error) {
    throw new ProbeParseError('malformed', `ffprobe returned malformed JSON for ${basename(input)}`, {
      cause: error,
    });
  }
  if (!isRecord(payload)) {
    throw new ProbeParseError('malformed', `ffprobe returned no metadata for ${basename(input)}`);
  }
  const streams = Array.isArray(payload.streams) ? payload.streams.filter(isRecord) : [];
  const video = streams.find(
    (stream) =>
      stream.codec_type === 'video' &&
      asPositiveInteger(stream.width) !== null &&
      asPositiveInteger(stream.height) !== null,
  );
  if (!video) {
    throw new ProbeParseError('no-video-stream', `No decodable video stream in ${basename(input)}`);
  }
  const width = asPositiveInteger(video.width);
  const height = asPositiveInteger(video.height);
  if (width === null || height === null) {
    throw new ProbeParseError('no-video-stream', `No decodable video stream in ${basename(input)}`);
  }

  const fpsRational = asString(video.r_frame_rate) ?? '';
  let fps: number;
  try {
    fps = parseRationalFps(fpsRational);
  } catch (error) {
    throw new ProbeParseError(
      'invalid-frame-rate',
      `ffprobe reported an unusable frame rate "${fpsRational}" for ${basename(input)}`,
      { cause: error },
    );
  }

  const format = isRecord(payload.format) ? payload.format : {};
  const duration = parseNumericString(format.duration) ?? 0;
  const frames = parseNumericString(video.nb_frames);

  return {
    width,
    height,
    fps,
    fpsRational,
    duration,
    hasAudio: streams.some((stream) => stream.codec_type === 'audio'),
    frameCount:
      frames !== null && frames > 0
        ? frames
        : duration > 0
          ? Math.round(fps * duration)
          : undefined,
  };
};

export const buildExtractArgs = (input: string, outputPattern: string): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-i',
  input,
  '-map',
  '0:v:0',
  '-fps_mode',
  'cfr',
  '-start_number',
  '0',
  outputPattern,
];

export type EncodeArgsOptions = {
  readonly inputPattern: string;
  readonly fpsRational: string;
  readonly output: string;
  readonly container: OutputContainer;
  readonly encoder: EncoderSettings;
};

export const buildEncodeArgs = (options: EncodeArgsOptions): string[] => {
  const args = [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-framerate',
    options.fpsRational,
    '-start_number',
    '0',
    '-i',
    options.inputPattern,
    '-c:v',
    options.encoder.codec,
    '-crf',
    options.encoder.crf.toString(),
    '-preset',
    options.encoder.preset,
  ];
  if (HVC1_CONTAINERS.includes(options.container)) {
    args.push('-tag:v', 'hvc1');
  }
  args.push('-pix_fmt', options.encoder.pixelFormat, options.output);
  return args;
};

export type RemuxArgsOptions = {
  readonly video: string;
  readonly audioSource: string;
  readonly output: string;
  readonly container: OutputContainer;
};

/** Stream-copies the encoded video and every audio stream of the source; nothing is re-encoded. */
export const buildRemuxArgs = (options: RemuxArgsOptions): string[] => {
  const args = [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-i',
    options.video,
    '-i',
    options.audioSource,
    '-map',
    '0:v:0',
    '-map',
    '1:a',
    '-c',
    'copy',
  ];
  if (HVC1_CONTAINERS.includes(options.container)) {
    args.push('-tag:v', 'hvc1');
  }
  args.push(options.output);
  return args;
};
