/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  loadConfig,
  resolveConfig,
} from '@/lib/config';
import { ConfigError } from '@/lib/errors';
import { Orchestrator } from '@/lib/orchestrator';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = path.join(tempDir, 'converter.json');
    await writeFile(configPath, content);
    return configPath;
  }

  it('should return the defaults for an empty environment', () => {
    const config = loadConfig({ env: {} });

    expect(config).toEqual(DEFAULT_ORCHESTRATOR_CONFIG);
    expect(config.maxConcurrent).toBe(2);
    expect(config.outputSuffix).toBe('_h265');
    expect(config.defaults).toEqual({
      mode: 'auto',
      quality: 45,
      crf: 22,
      preset: 'medium',
      bitDepth: 8,
      hdr: false,
      audioMode: 'copy',
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      env: {
        VIDEO_CONVERTER_MAX_CONCURRENT: '4',
        VIDEO_CONVERTER_MODE: 'Software',
        VIDEO_CONVERTER_CRF: '28',
        VIDEO_CONVERTER_BIT_DEPTH: '10',
        VIDEO_CONVERTER_HDR: 'true',
        VIDEO_CONVERTER_AUDIO: 'aac',
        VIDEO_CONVERTER_TIMEOUT: '60000',
        FFMPEG_BIN_PATH: '/opt/ffmpeg/bin/ffmpeg',
        FFPROBE_BIN_PATH: '/opt/ffmpeg/bin/ffprobe',
      },
    });

    expect(config.maxConcurrent).toBe(4);
    expect(config.timeout).toBe(60000);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.ffprobePath).toBe('/opt/ffmpeg/bin/ffprobe');
    expect(config.defaults).toEqual({
      mode: 'software',
      quality: 45,
      crf: 28,
      preset: 'medium',
      bitDepth: 10,
      hdr: true,
      audioMode: 'aac',
    });
  });

  it('should read the finalizing switches from the environment', () => {
    const config = loadConfig({
      env: {
        VIDEO_CONVERTER_VALIDATE_OUTPUT: 'false',
        VIDEO_CONVERTER_PRESERVE_TIMESTAMPS: 'no',
        VIDEO_CONVERTER_H264_ONLY: '0',
        VIDEO_CONVERTER_MIN_FREE_SPACE: '1073741824',
        VIDEO_CONVERTER_MOVE_TO_PROCESSED: '/videos/processed',
      },
    });

    expect(config.validateOutput).toBe(false);
    expect(config.preserveTimestamps).toBe(false);
    expect(config.h264Only).toBe(false);
    expect(config.minFreeSpace).toBe(1073741824);
    expect(config.deleteOriginal).toBe(false);
    expect(config.moveToProcessed).toBe('/videos/processed');
  });

  it('should layer the environment over the config file', async () => {
    const configFile = await writeConfig(
      JSON.stringify({
        maxConcurrent: 3,
        outputSuffix: '_hevc',
        defaults: { quality: 70, preset: 'slow' },
      }),
    );

    const config = loadConfig({
      configFile,
      env: { VIDEO_CONVERTER_PRESET: 'fast' },
    });

    expect(config.maxConcurrent).toBe(3);
    expect(config.outputSuffix).toBe('_hevc');
    expect(config.defaults.quality).toBe(70);
    expect(config.defaults.preset).toBe('fast');
    expect(config.defaults.crf).toBe(22);
  });

  it('should find the config file through VIDEO_CONVERTER_CONFIG', async () => {
    const configFile = await writeConfig('{ "killGracePeriod": 1000 }');

    const config = loadConfig({ env: { VIDEO_CONVERTER_CONFIG: configFile } });

    expect(config.killGracePeriod).toBe(1000);
  });

  it('should leave out-of-range encoding values for the strategies', () => {
    const config = loadConfig({ env: { VIDEO_CONVERTER_QUALITY: '500' } });
    expect(config.defaults.quality).toBe(500);
  });

  describe('invalid values', () => {
    it('should reject non-positive concurrency', () => {
      expect(() =>
        loadConfig({ env: { VIDEO_CONVERTER_MAX_CONCURRENT: '0' } }),
      ).toThrow('maxConcurrent must be a positive integer, got 0');
    });

    it('should reject non-numeric values', () => {
      expect(() =>
        loadConfig({ env: { VIDEO_CONVERTER_MAX_CONCURRENT: 'two' } }),
      ).toThrow('VIDEO_CONVERTER_MAX_CONCURRENT must be a number, got "two"');
    });

    it('should reject unknown modes', () => {
      expect(() =>
        loadConfig({ env: { VIDEO_CONVERTER_MODE: 'gpu' } }),
      ).toThrow(ConfigError);
    });

    it('should reject unparsable booleans', () => {
      expect(() =>
        loadConfig({ env: { VIDEO_CONVERTER_HDR: 'maybe' } }),
      ).toThrow('VIDEO_CONVERTER_HDR must be a boolean, got "maybe"');
    });

    it('should reject invalid JSON', async () => {
      const configFile = await writeConfig('{ maxConcurrent: 2');

      expect(() => loadConfig({ configFile, env: {} })).toThrow(
        /^Invalid JSON in config file/,
      );
    });

    it('should reject fields of the wrong type', async () => {
      const configFile = await writeConfig('{ "maxConcurrent": "two" }');

      expect(() => loadConfig({ configFile, env: {} })).toThrow(
        'Config field "maxConcurrent" must be a number',
      );
    });

    it('should reject deleting and moving originals together', async () => {
      const configFile = await writeConfig(
        JSON.stringify({ deleteOriginal: true, moveToProcessed: '/processed' }),
      );

      expect(() => loadConfig({ configFile, env: {} })).toThrow(
        'deleteOriginal and moveToProcessed cannot both be set',
      );
    });

    it('should reject a negative free space requirement', () => {
      expect(() => resolveConfig({ minFreeSpace: -1 })).toThrow(
        'minFreeSpace must not be negative, got -1',
      );
    });

    it('should reject a missing config file', () => {
      expect(() =>
        loadConfig({ configFile: path.join(tempDir, 'missing.json'), env: {} }),
      ).toThrow(ConfigError);
    });
  });
});

describe('resolveConfig', () => {
  it('should ignore undefined fields in later layers', () => {
    const config = resolveConfig(
      { maxConcurrent: 5 },
      { maxConcurrent: undefined, defaults: { crf: undefined } },
    );

    expect(config.maxConcurrent).toBe(5);
    expect(config.defaults.crf).toBe(22);
  });

  it('should be applied by the orchestrator constructor', () => {
    expect(() => new Orchestrator({ maxConcurrent: 0 })).toThrow(ConfigError);
    expect(new Orchestrator({ maxConcurrent: 3 }).config.maxConcurrent).toBe(3);
  });
});
