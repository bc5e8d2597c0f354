import { fileSize } from '../pipeline/scratch.js';
import type { UpscaleSummary } from '../runtime/upscaleVideo.js';

const formatMegabytes = (bytes: number) => `${(bytes / (1024 * 1024)).toFixed(1)} MB`;

/** Closing report of a finished job. The input may be gone by now; its size is then left out. */
export const formatSummary = async (summary: UpscaleSummary): Promise<string[]> => {
  const inputBytes = await fileSize(summary.input);
  const lines = [
    '\nDone!',
    `  input:  ${summary.input}${inputBytes > 0 ? ` (${formatMegabytes(inputBytes)})` : ''}`,
    `  output: ${summary.output} (${formatMegabytes(summary.bytes)})`,
    `  scale:  ${summary.scale}x (${summary.source.width}x${summary.source.height} -> ${summary.width}x${summary.height}), ${summary.frames} frames in ${summary.elapsedSeconds.toFixed(1)}s`,
  ];
  if (summary.scratchDir) {
    lines.push(`  frames kept in ${summary.scratchDir}`);
  }
  return lines;
};
