/**
 * Orchestrator configuration: defaults, then an optional JSON file, then
 * environment variables
 */

import fs from 'fs';
import {
  DEFAULT_ENCODING,
  type EncodingDefaults,
  type EncodingMode,
} from '../types/conversion';
import { ConfigError, getErrorMessage } from './errors';
import { DEFAULT_OUTPUT_SUFFIX } from './video-files';

export interface OrchestratorConfig {
  /** Maximum simultaneously running encoder processes (>= 1) */
  maxConcurrent: number;
  /** Settings for requests that leave them out */
  defaults: EncodingDefaults;
  ffmpegPath: string;
  ffprobePath: string;
  /** Appended to output file stems */
  outputSuffix: string;
  /** Per-task timeout in milliseconds; undefined means none */
  timeout?: number;
  /** Delay between SIGTERM and SIGKILL on cancellation */
  killGracePeriod: number;
  /** Check each output and fail tasks whose output is unusable */
  validateOutput: boolean;
  /** Copy access and modification times from the source */
  preserveTimestamps: boolean;
  /** Bytes that must be free in the output directory; 0 disables */
  minFreeSpace: number;
  /** submitDirectory only queues H.264 sources */
  h264Only: boolean;
  /** Delete the source after a successful conversion */
  deleteOriginal: boolean;
  /** Move the source here after a successful conversion */
  moveToProcessed?: string;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxConcurrent: 2,
  defaults: DEFAULT_ENCODING,
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
  outputSuffix: DEFAULT_OUTPUT_SUFFIX,
  killGracePeriod: 5000,
  validateOutput: true,
  preserveTimestamps: true,
  minFreeSpace: 0,
  h264Only: true,
  deleteOriginal: false,
};

export type OrchestratorConfigInput = Partial<
  Omit<OrchestratorConfig, 'defaults'>
> & {
  defaults?: Partial<EncodingDefaults>;
};

const ENCODING_MODES: readonly EncodingMode[] = [
  'hardware',
  'software',
  'auto',
];

function isEncodingMode(value: unknown): value is EncodingMode {
  return ENCODING_MODES.some((mode) => mode === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readField<T>(
  source: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!guard(value)) {
    throw new ConfigError(`Config field "${key}" must be ${expected}`);
  }
  return value;
}

const isNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);
const isString = (value: unknown): value is string =>
  typeof value === 'string';
const isBoolean = (value: unknown): value is boolean =>
  typeof value === 'boolean';

/**
 * Validate a parsed JSON config document
 */
export function parseConfigObject(value: unknown): OrchestratorConfigInput {
  if (!isRecord(value)) {
    throw new ConfigError('Config file must contain a JSON object');
  }

  const config: OrchestratorConfigInput = {
    maxConcurrent: readField(value, 'maxConcurrent', isNumber, 'a number'),
    ffmpegPath: readField(value, 'ffmpegPath', isString, 'a string'),
    ffprobePath: readField(value, 'ffprobePath', isString, 'a string'),
    outputSuffix: readField(value, 'outputSuffix', isString, 'a string'),
    timeout: readField(value, 'timeout', isNumber, 'a number'),
    killGracePeriod: readField(value, 'killGracePeriod', isNumber, 'a number'),
    validateOutput: readField(value, 'validateOutput', isBoolean, 'a boolean'),
    preserveTimestamps: readField(
      value,
      'preserveTimestamps',
      isBoolean,
      'a boolean',
    ),
    minFreeSpace: readField(value, 'minFreeSpace', isNumber, 'a number'),
    h264Only: readField(value, 'h264Only', isBoolean, 'a boolean'),
    deleteOriginal: readField(value, 'deleteOriginal', isBoolean, 'a boolean'),
    moveToProcessed: readField(value, 'moveToProcessed', isString, 'a string'),
  };

  const defaults = value.defaults;
  if (defaults !== undefined) {
    if (!isRecord(defaults)) {
      throw new ConfigError('Config field "defaults" must be an object');
    }
    config.defaults = {
      mode: readField(
        defaults,
        'mode',
        isEncodingMode,
        'one of hardware, software, auto',
      ),
      quality: readField(defaults, 'quality', isNumber, 'a number'),
      crf: readField(defaults, 'crf', isNumber, 'a number'),
      preset: readField(defaults, 'preset', isString, 'a string'),
      bitDepth: readField(defaults, 'bitDepth', isNumber, 'a number'),
      hdr: readField(defaults, 'hdr', isBoolean, 'a boolean'),
      audioMode: readField(defaults, 'audioMode', isString, 'a string'),
    };
  }

  return config;
}

/**
 * Read and validate a JSON config file
 */
export function readConfigFile(filePath: string): OrchestratorConfigInput {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in config file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
  return parseConfigObject(parsed);
}

/**
 * Overrides taken from VIDEO_CONVERTER_* and *_BIN_PATH variables
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv,
): OrchestratorConfigInput {
  const config: OrchestratorConfigInput = {};
  const defaults: { -readonly [K in keyof EncodingDefaults]?: EncodingDefaults[K] } = {};

  if (env.VIDEO_CONVERTER_MAX_CONCURRENT) {
    config.maxConcurrent = parseNumber(
      'VIDEO_CONVERTER_MAX_CONCURRENT',
      env.VIDEO_CONVERTER_MAX_CONCURRENT,
    );
  }
  if (env.VIDEO_CONVERTER_TIMEOUT) {
    config.timeout = parseNumber(
      'VIDEO_CONVERTER_TIMEOUT',
      env.VIDEO_CONVERTER_TIMEOUT,
    );
  }
  if (env.VIDEO_CONVERTER_OUTPUT_SUFFIX !== undefined) {
    config.outputSuffix = env.VIDEO_CONVERTER_OUTPUT_SUFFIX;
  }
  if (env.VIDEO_CONVERTER_MIN_FREE_SPACE) {
    config.minFreeSpace = parseNumber(
      'VIDEO_CONVERTER_MIN_FREE_SPACE',
      env.VIDEO_CONVERTER_MIN_FREE_SPACE,
    );
  }
  if (env.VIDEO_CONVERTER_VALIDATE_OUTPUT) {
    config.validateOutput = parseBoolean(
      'VIDEO_CONVERTER_VALIDATE_OUTPUT',
      env.VIDEO_CONVERTER_VALIDATE_OUTPUT,
    );
  }
  if (env.VIDEO_CONVERTER_PRESERVE_TIMESTAMPS) {
    config.preserveTimestamps = parseBoolean(
      'VIDEO_CONVERTER_PRESERVE_TIMESTAMPS',
      env.VIDEO_CONVERTER_PRESERVE_TIMESTAMPS,
    );
  }
  if (env.VIDEO_CONVERTER_H264_ONLY) {
    config.h264Only = parseBoolean(
      'VIDEO_CONVERTER_H264_ONLY',
      env.VIDEO_CONVERTER_H264_ONLY,
    );
  }
  if (env.VIDEO_CONVERTER_DELETE_ORIGINAL) {
    config.deleteOriginal = parseBoolean(
      'VIDEO_CONVERTER_DELETE_ORIGINAL',
      env.VIDEO_CONVERTER_DELETE_ORIGINAL,
    );
  }
  if (env.VIDEO_CONVERTER_MOVE_TO_PROCESSED) {
    config.moveToProcessed = env.VIDEO_CONVERTER_MOVE_TO_PROCESSED;
  }
  if (env.FFMPEG_BIN_PATH) config.ffmpegPath = env.FFMPEG_BIN_PATH;
  if (env.FFPROBE_BIN_PATH) config.ffprobePath = env.FFPROBE_BIN_PATH;

  if (env.VIDEO_CONVERTER_MODE) {
    const mode = env.VIDEO_CONVERTER_MODE.trim().toLowerCase();
    if (!isEncodingMode(mode)) {
      throw new ConfigError(
        `VIDEO_CONVERTER_MODE must be one of ${ENCODING_MODES.join(', ')}, got "${env.VIDEO_CONVERTER_MODE}"`,
      );
    }
    defaults.mode = mode;
  }
  if (env.VIDEO_CONVERTER_QUALITY) {
    defaults.quality = parseNumber(
      'VIDEO_CONVERTER_QUALITY',
      env.VIDEO_CONVERTER_QUALITY,
    );
  }
  if (env.VIDEO_CONVERTER_CRF) {
    defaults.crf = parseNumber('VIDEO_CONVERTER_CRF', env.VIDEO_CONVERTER_CRF);
  }
  if (env.VIDEO_CONVERTER_PRESET) {
    defaults.preset = env.VIDEO_CONVERTER_PRESET.trim();
  }
  if (env.VIDEO_CONVERTER_BIT_DEPTH) {
    defaults.bitDepth = parseNumber(
      'VIDEO_CONVERTER_BIT_DEPTH',
      env.VIDEO_CONVERTER_BIT_DEPTH,
    );
  }
  if (env.VIDEO_CONVERTER_HDR) {
    defaults.hdr = parseBoolean('VIDEO_CONVERTER_HDR', env.VIDEO_CONVERTER_HDR);
  }
  if (env.VIDEO_CONVERTER_AUDIO) {
    defaults.audioMode = env.VIDEO_CONVERTER_AUDIO.trim();
  }

  if (Object.keys(defaults).length > 0) {
    config.defaults = defaults;
  }
  return config;
}

function withoutUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(
  value: T,
  key: PropertyKey,
): key is keyof T {
  return key in value;
}

/**
 * Apply overrides in order and validate the result
 */
export function resolveConfig(
  ...layers: OrchestratorConfigInput[]
): OrchestratorConfig {
  let config: OrchestratorConfig = {
    ...DEFAULT_ORCHESTRATOR_CONFIG,
    defaults: { ...DEFAULT_ORCHESTRATOR_CONFIG.defaults },
  };

  for (const layer of layers) {
    const { defaults, ...rest } = layer;
    config = {
      ...config,
      ...withoutUndefined(rest),
      defaults: {
        ...config.defaults,
        ...(defaults ? withoutUndefined(defaults) : {}),
      },
    };
  }

  if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
    throw new ConfigError(
      `maxConcurrent must be a positive integer, got ${config.maxConcurrent}`,
    );
  }
  if (!isEncodingMode(config.defaults.mode)) {
    throw new ConfigError(`Unknown encoding mode: ${config.defaults.mode}`);
  }
  if (config.timeout !== undefined && config.timeout <= 0) {
    throw new ConfigError(`timeout must be positive, got ${config.timeout}`);
  }
  if (config.killGracePeriod < 0) {
    throw new ConfigError(
      `killGracePeriod must not be negative, got ${config.killGracePeriod}`,
    );
  }

  if (config.minFreeSpace < 0) {
    throw new ConfigError(
      `minFreeSpace must not be negative, got ${config.minFreeSpace}`,
    );
  }
  if (config.deleteOriginal && config.moveToProcessed) {
    throw new ConfigError(
      'deleteOriginal and moveToProcessed cannot both be set',
    );
  }

  return config;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON file path; defaults to VIDEO_CONVERTER_CONFIG */
  configFile?: string;
}

export function loadConfig(
  options: LoadConfigOptions = {},
): OrchestratorConfig {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env.VIDEO_CONVERTER_CONFIG;
  const fileLayer = configFile ? readConfigFile(configFile) : {};
  return resolveConfig(fileLayer, configFromEnv(env));
}
