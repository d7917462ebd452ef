/**
 * Parse FFmpeg stderr status lines into progress samples
 */

import type { ConversionProgress } from '../types/conversion';

const FRAME_PATTERN = /frame=\s*(\d+)/;
const FPS_PATTERN = /fps=\s*(\d+(?:\.\d+)?)/;
const QUALITY_PATTERN = /\bq=\s*(-?\d+(?:\.\d+)?)/;
const SIZE_PATTERN = /size=\s*(\d+)kB/i;
const TIME_PATTERN = /time=\s*(\d+):(\d{1,2}):(\d{1,2})\.(\d+)/;
const BITRATE_PATTERN = /bitrate=\s*(\d+(?:\.\d+)?)kbits\/s/;
const SPEED_PATTERN = /speed=\s*(\d+(?:\.\d+)?)x/;

/**
 * Convert an FFmpeg timestamp (HH:MM:SS.cc) to seconds.
 * The fractional part is read as centiseconds, so "00:00:01.5" is 1.05s,
 * matching how FFmpeg prints two-digit fractions.
 */
export function parseTimestamp(text: string): number | null {
  const match = text.match(/^(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d+))?$/);
  if (!match) return null;
  return toSeconds(match[1], match[2], match[3], match[4] ?? '0');
}

function toSeconds(
  hours: string,
  minutes: string,
  seconds: string,
  centiseconds: string,
): number {
  return (
    parseInt(hours, 10) * 3600 +
    parseInt(minutes, 10) * 60 +
    parseInt(seconds, 10) +
    parseInt(centiseconds, 10) / 100
  );
}

function matchNumber(line: string, pattern: RegExp): number {
  const match = line.match(pattern);
  if (!match) return 0;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : 0;
}

export function clampPercentage(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.min(100, value);
}

/**
 * Stateful per-run parser; remembers the last sample it produced
 */
export class ProgressParser {
  readonly totalDuration: number;
  private last: ConversionProgress | null = null;

  constructor(totalDuration = 0) {
    this.totalDuration =
      Number.isFinite(totalDuration) && totalDuration > 0 ? totalDuration : 0;
  }

  /**
   * Parse one diagnostic line. Returns null when the line carries no
   * frame/time pair; other fields default to 0 when absent or malformed.
   */
  parseLine(line: string): ConversionProgress | null {
    if (!line.includes('frame=') || !line.includes('time=')) {
      return null;
    }

    const frameMatch = line.match(FRAME_PATTERN);
    const timeMatch = line.match(TIME_PATTERN);
    if (!frameMatch || !timeMatch) {
      // "time=N/A" and friends
      return null;
    }

    const timeSeconds = toSeconds(
      timeMatch[1],
      timeMatch[2],
      timeMatch[3],
      timeMatch[4],
    );
    const speed = matchNumber(line, SPEED_PATTERN);

    const progress: ConversionProgress = {
      frame: parseInt(frameMatch[1], 10),
      fps: matchNumber(line, FPS_PATTERN),
      quality: matchNumber(line, QUALITY_PATTERN),
      size: matchNumber(line, SIZE_PATTERN) * 1024,
      timeSeconds,
      totalDuration: this.totalDuration,
      bitrate: matchNumber(line, BITRATE_PATTERN),
      speed,
      percentage: this.percentageFor(timeSeconds),
      etaSeconds: this.etaFor(timeSeconds, speed),
    };

    this.last = progress;
    return progress;
  }

  /**
   * Most recent sample, or null before the first progress line
   */
  get lastProgress(): ConversionProgress | null {
    return this.last;
  }

  private percentageFor(timeSeconds: number): number {
    if (this.totalDuration <= 0) return 0;
    return clampPercentage((timeSeconds / this.totalDuration) * 100);
  }

  private etaFor(timeSeconds: number, speed: number): number | null {
    if (this.totalDuration <= 0 || speed <= 0) return null;
    return Math.max(0, this.totalDuration - timeSeconds) / speed;
  }
}
