/**
 * FFmpeg capability detection
 * Detects available encoders and reads media information
 */

import { logger } from './sentry';
import {
  captureOutput,
  runCommand,
  type ProcessLauncher,
} from './process-runner';

export interface MediaReadOptions {
  /** FFmpeg binary (default: ffmpeg) */
  ffmpegPath?: string;
  /** FFprobe binary (default: ffprobe) */
  ffprobePath?: string;
  launcher?: ProcessLauncher;
  /** Aborting kills a running ffprobe */
  signal?: AbortSignal;
}

export interface MediaStream {
  /** video, audio, subtitle, data */
  codecType: string;
  codecName: string;
}

/**
 * Container and stream summary read with ffprobe
 */
export interface MediaInfo {
  /** Seconds, 0 when the container does not say */
  duration: number;
  streams: MediaStream[];
}

const H264_CODECS: ReadonlySet<string> = new Set([
  'h264',
  'avc',
  'avc1',
  'x264',
]);
const HEVC_CODECS: ReadonlySet<string> = new Set([
  'hevc',
  'h265',
  'hvc1',
  'hev1',
  'x265',
]);

export function isH264Codec(codec: string | null): boolean {
  return codec !== null && H264_CODECS.has(codec.toLowerCase());
}

export function isHevcCodec(codec: string | null): boolean {
  return codec !== null && HEVC_CODECS.has(codec.toLowerCase());
}

/**
 * Arguments of the fixed encoder listing
 */
export const ENCODER_LISTING_ARGS = ['-hide_banner', '-encoders'] as const;

/**
 * Run the encoder listing and report whether it names the given encoder.
 * A listing that cannot launch reports the encoder as missing.
 */
export async function detectEncoder(
  encoderName: string,
  options: MediaReadOptions = {},
): Promise<boolean> {
  const ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  try {
    const output = await runCommand(
      ffmpegPath,
      ENCODER_LISTING_ARGS,
      options.launcher,
    );
    const available = hasEncoder(output, encoderName);
    if (available) {
      logger.debug('[FFmpeg Capabilities] Encoder available', {
        encoderName,
      });
    } else {
      logger.warn('[FFmpeg Capabilities] Encoder not available', {
        encoderName,
      });
    }
    return available;
  } catch (error) {
    logger.error('[FFmpeg Capabilities] Failed to list encoders', {
      ffmpegPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Whether an `ffmpeg -encoders` listing contains the encoder as a token
 */
export function hasEncoder(output: string, encoderName: string): boolean {
  return output.split(/\s+/).some((token) => token === encoderName);
}

/**
 * Get source duration in seconds using ffprobe; 0 when unknown
 */
export async function readDuration(
  inputPath: string,
  options: MediaReadOptions = {},
): Promise<number> {
  const output = await runFfprobe(
    [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      inputPath,
    ],
    options,
  );
  const duration = parseFloat(output?.trim() ?? '');
  if (Number.isFinite(duration) && duration > 0) {
    return duration;
  }
  logger.debug('[FFmpeg Capabilities] Duration unknown', { inputPath });
  return 0;
}

/**
 * Read duration and streams; null when ffprobe cannot read the file
 */
export async function readMediaInfo(
  filePath: string,
  options: MediaReadOptions = {},
): Promise<MediaInfo | null> {
  const output = await runFfprobe(
    [
      '-v',
      'error',
      '-show_entries',
      'format=duration:stream=codec_type,codec_name',
      '-of',
      'json',
      filePath,
    ],
    options,
  );
  if (output === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    logger.warn('[FFmpeg Capabilities] Unreadable ffprobe output', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
  return parseMediaInfo(parsed);
}

/**
 * Codec of the first video stream, lowercased; null when unknown
 */
export async function readVideoCodec(
  filePath: string,
  options: MediaReadOptions = {},
): Promise<string | null> {
  const info = await readMediaInfo(filePath, options);
  return info ? videoCodecOf(info) : null;
}

export function videoCodecOf(info: MediaInfo): string | null {
  const video = info.streams.find((stream) => stream.codecType === 'video');
  return video ? video.codecName.toLowerCase() : null;
}

export function parseMediaInfo(value: unknown): MediaInfo | null {
  if (!isRecord(value)) return null;

  const format = isRecord(value.format) ? value.format : {};
  const duration = parseFloat(String(format.duration ?? ''));
  const streams: MediaStream[] = [];
  if (Array.isArray(value.streams)) {
    for (const stream of value.streams) {
      if (!isRecord(stream)) continue;
      streams.push({
        codecType: String(stream.codec_type ?? 'unknown'),
        codecName: String(stream.codec_name ?? 'unknown'),
      });
    }
  }

  return {
    duration: Number.isFinite(duration) && duration > 0 ? duration : 0,
    streams,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Run ffprobe and return stdout, or null when it failed, could not start
 * or was aborted
 */
async function runFfprobe(
  args: readonly string[],
  options: MediaReadOptions,
): Promise<string | null> {
  const ffprobePath = options.ffprobePath ?? 'ffprobe';
  try {
    const result = await captureOutput(ffprobePath, args, {
      launcher: options.launcher,
      signal: options.signal,
    });
    if (result.aborted || result.exitCode !== 0) {
      logger.debug('[FFmpeg Capabilities] ffprobe did not succeed', {
        exitCode: result.exitCode,
        aborted: result.aborted,
        stderr: result.stderr.trim(),
      });
      return null;
    }
    return result.stdout;
  } catch (error) {
    logger.warn('[FFmpeg Capabilities] Failed to run ffprobe', {
      ffprobePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
