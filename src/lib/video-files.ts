/**
 * Discovery of source videos and naming of converted outputs
 */

import fs from 'fs/promises';
import micromatch from 'micromatch';
import { orderBy } from 'natural-orderby';
import path from 'path';

export const VIDEO_EXTENSIONS = [
  '.mov',
  '.mp4',
  '.m4v',
  '.avi',
  '.mkv',
  '.wmv',
  '.flv',
  '.webm',
] as const;

export const DEFAULT_OUTPUT_SUFFIX = '_h265';

export function isVideoFile(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return (VIDEO_EXTENSIONS as readonly string[]).includes(ext);
}

/**
 * Whether the file name (without extension) already ends with the suffix
 */
export function isConvertedFile(
  fileName: string,
  suffix: string = DEFAULT_OUTPUT_SUFFIX,
): boolean {
  if (!suffix) return false;
  const stem = path.parse(fileName).name;
  return stem.toLowerCase().endsWith(suffix.toLowerCase());
}

export interface FindVideoFilesOptions {
  /** Glob matched against file names, case-insensitive */
  pattern?: string;
  /** Descend into subdirectories (hidden ones are skipped) */
  recursive?: boolean;
  /** Names carrying this suffix are treated as earlier outputs */
  suffix?: string;
}

/**
 * List convertible videos under a directory, in natural order of their
 * paths relative to it
 */
export async function findVideoFiles(
  dir: string,
  options: FindVideoFilesOptions = {},
): Promise<string[]> {
  const suffix = options.suffix ?? DEFAULT_OUTPUT_SUFFIX;
  const pattern = options.pattern?.trim() || undefined;
  const found: string[] = [];

  const scan = async (current: string): Promise<void> => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    const subdirectories: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = path.join(current, entry.name);

      if (entry.isDirectory()) {
        if (options.recursive) subdirectories.push(fullPath);
        continue;
      }
      if (!entry.isFile() || !isVideoFile(entry.name)) continue;
      if (isConvertedFile(entry.name, suffix)) continue;
      if (
        pattern &&
        !micromatch.isMatch(entry.name, pattern, { nocase: true })
      ) {
        continue;
      }

      found.push(fullPath);
    }

    await Promise.all(subdirectories.map(scan));
  };

  await scan(dir);

  return orderBy(found, [(file) => path.relative(dir, file)], ['asc']);
}

export interface OutputPathOptions {
  /** Directory for the output; defaults to the input's directory */
  outputDir?: string;
  suffix?: string;
}

/**
 * Output path for a converted file: <dir>/<stem><suffix>.mp4
 *
 * Example: /videos/holiday.MOV -> /videos/holiday_h265.mp4
 */
export function createOutputPath(
  inputPath: string,
  options: OutputPathOptions = {},
): string {
  const suffix = options.suffix ?? DEFAULT_OUTPUT_SUFFIX;
  const parsed = path.parse(inputPath);
  const stem = isConvertedFile(parsed.base, suffix)
    ? parsed.name
    : `${parsed.name}${suffix}`;
  return path.join(options.outputDir ?? parsed.dir, `${stem}.mp4`);
}
