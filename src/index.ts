export * from './types/conversion';
export { Orchestrator } from './lib/orchestrator';
export type {
  OrchestratorDependencies,
  OrchestratorEvents,
  OrchestratorState,
  SubmitDirectoryOptions,
} from './lib/orchestrator';
export {
  ConversionExecutor,
  createResult,
  formatStderrTail,
} from './lib/conversion-executor';
export type {
  ConversionExecutorEvents,
  ConversionExecutorOptions,
  ExecutorState,
  ResultFields,
} from './lib/conversion-executor';
export { ProgressParser, parseTimestamp } from './lib/progress-parser';
export {
  BaseEncoderStrategy,
  clampInteger,
  normalizeAudioMode,
} from './lib/encoder-strategy';
export type {
  EncoderInvocation,
  EncoderStrategy,
  EncoderStrategyOptions,
  StrategyMode,
} from './lib/encoder-strategy';
export { HardwareEncoder } from './lib/hardware-encoder';
export { HDR_ARGS, SoftwareEncoder } from './lib/software-encoder';
export {
  EncoderSelector,
  createDefaultStrategies,
  selectEncoder,
} from './lib/encoder-selector';
export {
  hasEncoder,
  isH264Codec,
  isHevcCodec,
  readDuration,
  detectEncoder,
  readMediaInfo,
  readVideoCodec,
} from './lib/ffmpeg-capabilities';
export type {
  MediaInfo,
  MediaStream,
  MediaReadOptions,
} from './lib/ffmpeg-capabilities';
export { validateOutput } from './lib/output-validator';
export type {
  OutputValidation,
  ValidateOutputOptions,
} from './lib/output-validator';
export {
  captureOutput,
  runCommand,
  spawnProcess,
} from './lib/process-runner';
export type {
  CapturedOutput,
  CaptureOptions,
  ProcessLauncher,
  SpawnedProcess,
} from './lib/process-runner';
export {
  ConversionReportBuilder,
  formatBytes,
  formatDuration,
  formatReportSummary,
} from './lib/conversion-report';
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  configFromEnv,
  loadConfig,
  resolveConfig,
} from './lib/config';
export type {
  LoadConfigOptions,
  OrchestratorConfig,
  OrchestratorConfigInput,
} from './lib/config';
export {
  VIDEO_EXTENSIONS,
  createOutputPath,
  findVideoFiles,
  isVideoFile,
} from './lib/video-files';
export {
  ConfigError,
  ConversionError,
  EncoderProcessError,
  EncoderUnavailableError,
  LaunchError,
  OutputValidationError,
  TaskNotFoundError,
  getErrorMessage,
} from './lib/errors';
export {
  ConsoleMonitor,
  initializeMonitoring,
  setMonitor,
} from './lib/sentry';
export type { LogLevel, Monitor } from './lib/sentry';
