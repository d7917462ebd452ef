/**
 * Shared encoder strategy contract and argument helpers
 */

import {
  DEFAULT_AUDIO_MODE,
  type ConversionRequest,
} from '../types/conversion';
import { detectEncoder, type MediaReadOptions } from './ffmpeg-capabilities';

export type StrategyMode = 'hardware' | 'software';

/**
 * Fully specified external-process invocation
 */
export interface EncoderInvocation {
  /** Executable to launch */
  command: string;
  /** Argument vector (passed to spawn, never through a shell) */
  args: string[];
  /** Human-readable command string for logs */
  displayCommand: string;
}

export interface EncoderStrategy {
  readonly mode: StrategyMode;
  readonly encoderName: string;
  /** Checked once per instance; later calls reuse the first answer */
  isAvailable(): Promise<boolean>;
  buildInvocation(request: ConversionRequest): EncoderInvocation;
}

export type EncoderStrategyOptions = Pick<
  MediaReadOptions,
  'ffmpegPath' | 'launcher'
>;

/**
 * Clamp to an integer range, substituting the fallback for NaN/Infinity
 */
export function clampInteger(
  value: number,
  min: number,
  max: number,
  fallback: number,
): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.round(value)));
}

/**
 * Audio codec names are plain tokens; anything else falls back to copy
 */
export function normalizeAudioMode(audioMode: string): string {
  return /^[A-Za-z0-9_-]+$/.test(audioMode) ? audioMode : DEFAULT_AUDIO_MODE;
}

/**
 * Remove null bytes, the one thing an argument vector cannot carry
 */
export function sanitizePath(filePath: string): string {
  return filePath.replace(/\0/g, '');
}

export abstract class BaseEncoderStrategy implements EncoderStrategy {
  abstract readonly mode: StrategyMode;
  abstract readonly encoderName: string;
  protected readonly ffmpegPath: string;
  private readonly launcher: EncoderStrategyOptions['launcher'];
  private availability: Promise<boolean> | null = null;

  constructor(options: EncoderStrategyOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.launcher = options.launcher;
  }

  isAvailable(): Promise<boolean> {
    if (!this.availability) {
      this.availability = detectEncoder(this.encoderName, {
        ffmpegPath: this.ffmpegPath,
        launcher: this.launcher,
      });
    }
    return this.availability;
  }

  buildInvocation(request: ConversionRequest): EncoderInvocation {
    const args = [
      '-hide_banner',
      '-y',
      '-i',
      sanitizePath(request.inputPath),
      ...this.buildVideoArgs(request),
      // Compatibility tag for Apple players
      '-tag:v',
      'hvc1',
      '-c:a',
      normalizeAudioMode(request.audioMode),
      '-map_metadata',
      '0',
      '-movflags',
      '+faststart+use_metadata_tags',
      sanitizePath(request.outputPath),
    ];

    return {
      command: this.ffmpegPath,
      args,
      displayCommand: [this.ffmpegPath, ...args].join(' '),
    };
  }

  /**
   * Codec selection and rate control, with values already clamped
   */
  protected abstract buildVideoArgs(request: ConversionRequest): string[];
}
