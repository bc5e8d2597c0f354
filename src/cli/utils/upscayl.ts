export type UpscaylRequest = {
  readonly input: string;
  readonly output: string;
  readonly model: string;
  readonly scale: number;
  readonly modelPath: string | null;
  readonly gpuId: number | null;
  /** `0` lets upscayl pick the tile size. */
  readonly tileSize: number | null;
  readonly tta: boolean;
};

export const buildUpscaylArgs = (request: UpscaylRequest): string[] => {
  const args = [
    'run',
    '-i',
    request.input,
    '-o',
    request.output,
    '-n',
    request.model,
    '-s',
    request.scale.toString(),
    '-f',
    'png',
  ];
  if (request.modelPath) {
    args.push('-m', request.modelPath);
  }
  if (request.gpuId !== null) {
    args.push('-g', request.gpuId.toString());
  }
  if (request.tileSize !== null) {
    args.push('-t', request.tileSize.toString());
  }
  if (request.tta) {
    args.push('-x');
  }
  return args;
};
