export const FRAME_INDEX_DIGITS = 8;
export const FRAME_EXTENSION = '.png';
export const FRAME_FILE_PATTERN = `frame_%0${FRAME_INDEX_DIGITS}d${FRAME_EXTENSION}`;

const FRAME_NAME_RE = new RegExp(`^frame_(\\d{${FRAME_INDEX_DIGITS}})\\${FRAME_EXTENSION}$`);

export const parseRationalFps = (value: string): number => {
  if (!value) {
    throw new Error('Missing FPS value from ffprobe.');
  }
  if (value.includes('/')) {
    const [num, den] = value.split('/');
    const numerator = Number(num);
    const denominator = Number(den);
    if (
      !Number.isFinite(numerator) ||
      !Number.isFinite(denominator) ||
      denominator === 0 ||
      numerator <= 0
    ) {
      throw new Error(`Invalid FPS rational: ${value}`);
    }
    return numerator / denominator;
  }
  const numeric = Number(value);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new Error(`Invalid FPS value: ${value}`);
  }
  return numeric;
};

/** Zero-padded so that lexicographic and numeric order agree. */
export const formatFrameName = (index: number): string => {
  if (!Number.isInteger(index) || index < 0 || index >= 10 ** FRAME_INDEX_DIGITS) {
    throw new RangeError(`Frame index out of range: ${index}`);
  }
  return `frame_${index.toString().padStart(FRAME_INDEX_DIGITS, '0')}${FRAME_EXTENSION}`;
};

export const parseFrameIndex = (name: string): number | null => {
  const match = FRAME_NAME_RE.exec(name);
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
};
