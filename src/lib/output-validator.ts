/**
 * Checks an encoded file before it is reported as converted
 */

import fs from 'fs/promises';
import {
  isHevcCodec,
  readMediaInfo,
  videoCodecOf,
  type MediaReadOptions,
} from './ffmpeg-capabilities';

export interface OutputValidation {
  valid: boolean;
  /** Problems that fail the task */
  errors: string[];
  /** Problems recorded on a successful result */
  warnings: string[];
}

export interface ValidateOutputOptions extends MediaReadOptions {
  /** Source duration in seconds; 0 skips the comparison */
  sourceDuration?: number;
}

const MIN_DURATION = 0.1;
const DURATION_TOLERANCE_SECONDS = 1;
const DURATION_TOLERANCE_RATIO = 0.01;

export async function validateOutput(
  outputPath: string,
  options: ValidateOutputOptions = {},
): Promise<OutputValidation> {
  const errors: string[] = [];
  const warnings: string[] = [];
  const done = () => ({ valid: errors.length === 0, errors, warnings });

  let size: number;
  try {
    size = (await fs.stat(outputPath)).size;
  } catch {
    errors.push('Output file not found');
    return done();
  }
  if (size === 0) {
    errors.push('Output file is empty');
    return done();
  }

  const info = await readMediaInfo(outputPath, options);
  if (!info) {
    errors.push('FFprobe could not read the output file');
    return done();
  }

  const codec = videoCodecOf(info);
  if (codec === null) {
    errors.push('No video stream found');
  } else if (!isHevcCodec(codec)) {
    errors.push(`Unexpected video codec: ${codec}`);
  }

  if (!info.streams.some((stream) => stream.codecType === 'audio')) {
    warnings.push('No audio stream found');
  }

  if (info.duration <= 0) {
    errors.push('Invalid duration (0 or negative)');
  } else {
    if (info.duration < MIN_DURATION) {
      warnings.push(`Very short duration: ${info.duration.toFixed(3)}s`);
    }
    const source = options.sourceDuration ?? 0;
    const drift = Math.abs(info.duration - source);
    if (
      source > 0 &&
      drift >
        Math.max(DURATION_TOLERANCE_SECONDS, source * DURATION_TOLERANCE_RATIO)
    ) {
      warnings.push(`Duration differs from source by ${drift.toFixed(1)}s`);
    }
  }

  return done();
}
