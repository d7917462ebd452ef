/**
 * Conversion data model with the FFmpeg flags each setting maps to
 */

/**
 * Requested encoder family
 */
export type EncodingMode =
  /** hevc_videotoolbox, fast, quality-scaled */
  | 'hardware'
  /** libx265, slower, CRF-controlled (maps to -c:v libx265) */
  | 'software'
  /** Hardware when the host has it, software otherwise */
  | 'auto';

/**
 * libx265 speed/efficiency presets for the -preset flag, fastest first
 */
export const ENCODING_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
  'placebo',
] as const;

export type EncodingPreset = (typeof ENCODING_PRESETS)[number];

/**
 * Supported output bit depths (maps to -pix_fmt yuv420p / yuv420p10le)
 */
export type BitDepth = 8 | 10;

/**
 * Parameter ranges enforced by the encoder strategies
 */
export const HARDWARE_QUALITY_RANGE = { min: 1, max: 100, default: 45 };
export const SOFTWARE_CRF_RANGE = { min: 0, max: 51, default: 22 };
export const DEFAULT_PRESET: EncodingPreset = 'medium';
export const DEFAULT_BIT_DEPTH: BitDepth = 8;
export const DEFAULT_AUDIO_MODE = 'copy';

/**
 * A single conversion request, immutable once created
 */
export interface ConversionRequest {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly mode: EncodingMode;
  /** VideoToolbox quality, 1-100, higher is better (maps to -q:v) */
  readonly quality: number;
  /** libx265 constant rate factor, 0-51, lower is better (maps to -crf) */
  readonly crf: number;
  /** libx265 preset (maps to -preset); unknown names fall back to medium */
  readonly preset: string;
  readonly bitDepth: number;
  /** Append HDR10 signalling; only honoured for 10-bit software encodes */
  readonly hdr: boolean;
  /** Audio codec or 'copy' (maps to -c:a) */
  readonly audioMode: string;
}

/**
 * Encoding settings applied to requests that leave them out
 */
export type EncodingDefaults = Omit<
  ConversionRequest,
  'inputPath' | 'outputPath'
>;

export const DEFAULT_ENCODING: EncodingDefaults = {
  mode: 'auto',
  quality: HARDWARE_QUALITY_RANGE.default,
  crf: SOFTWARE_CRF_RANGE.default,
  preset: DEFAULT_PRESET,
  bitDepth: DEFAULT_BIT_DEPTH,
  hdr: false,
  audioMode: DEFAULT_AUDIO_MODE,
};

export type ConversionRequestInput = Pick<
  ConversionRequest,
  'inputPath' | 'outputPath'
> &
  Partial<EncodingDefaults>;

/**
 * Build a frozen request, filling unspecified settings from defaults
 */
export function createConversionRequest(
  input: ConversionRequestInput,
  defaults: EncodingDefaults = DEFAULT_ENCODING,
): ConversionRequest {
  return Object.freeze({
    inputPath: input.inputPath,
    outputPath: input.outputPath,
    mode: input.mode ?? defaults.mode,
    quality: input.quality ?? defaults.quality,
    crf: input.crf ?? defaults.crf,
    preset: input.preset ?? defaults.preset,
    bitDepth: input.bitDepth ?? defaults.bitDepth,
    hdr: input.hdr ?? defaults.hdr,
    audioMode: input.audioMode ?? defaults.audioMode,
  });
}

export type ConversionStatus =
  | 'queued'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<ConversionStatus> =
  new Set<ConversionStatus>(['succeeded', 'failed', 'cancelled']);

export type ConversionStage =
  | 'queued'
  | 'probing'
  | 'encoding'
  | 'finalizing'
  | 'done';

/**
 * Progress sample parsed from one line of encoder diagnostics
 */
export interface ConversionProgress {
  /** Current frame being processed */
  frame: number;
  /** Frames per second during processing */
  fps: number;
  /** Encoder quality metric (q=) */
  quality: number;
  /** Output size so far in bytes */
  size: number;
  /** Position in the source, in seconds */
  timeSeconds: number;
  /** Source duration in seconds, 0 when unknown */
  totalDuration: number;
  /** Output bitrate in kbit/s */
  bitrate: number;
  /** Processing speed relative to realtime */
  speed: number;
  /** Completion, 0-100 */
  percentage: number;
  /** Estimated seconds remaining, null while it cannot be estimated */
  etaSeconds: number | null;
}

export type ConversionOutcome = 'success' | 'failure' | 'cancelled';

export type ConversionErrorKind =
  | 'availability'
  | 'launch'
  | 'runtime'
  | 'validation'
  | 'timeout'
  | 'internal';

export interface ConversionErrorDetail {
  kind: ConversionErrorKind;
  message: string;
  /** Tail of the encoder diagnostics, when the encoder ran */
  detail?: string;
}

/**
 * Outcome of one task; created once and frozen
 */
export interface ConversionResult {
  readonly taskId: string;
  readonly outcome: ConversionOutcome;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly encoderName: string | null;
  readonly elapsedSeconds: number;
  readonly inputSize: number;
  readonly outputSize: number;
  readonly spaceSaved: number;
  /** 0.6 means the output is 60% smaller than the input */
  readonly compressionRatio: number;
  /** Media seconds encoded per wall-clock second */
  readonly speedRatio: number;
  readonly error?: ConversionErrorDetail;
  readonly warnings: readonly string[];
  readonly startedAt: string;
  readonly completedAt: string;
}

/**
 * Queue entry owned by the orchestrator
 */
export interface ConversionTask {
  id: string;
  request: ConversionRequest;
  status: ConversionStatus;
  stage: ConversionStage;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Latest sample; percentage holds the highest value seen */
  progress?: ConversionProgress;
  encoderName?: string;
  result?: ConversionResult;
}

/**
 * Aggregate over one batch, results in completion order
 */
export interface ConversionReport {
  batchId: string;
  startedAt: string;
  completedAt: string | null;
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  totalInputSize: number;
  totalOutputSize: number;
  totalSpaceSaved: number;
  results: ConversionResult[];
  /** "<file name>: <message>" for each failure */
  errors: string[];
}

export type ProgressCallback = (
  task: ConversionTask,
  progress: ConversionProgress,
) => void;

export type CompletionCallback = (
  task: ConversionTask,
  result: ConversionResult,
) => void;

/**
 * Metadata/GPS collaborator used during the finalizing stage
 */
export interface MetadataProcessor {
  extract(path: string): Promise<Record<string, unknown>>;
  copy(source: string, dest: string): Promise<void>;
  verify(
    source: string,
    dest: string,
  ): Promise<{ passed: boolean; details: string[] }>;
}
