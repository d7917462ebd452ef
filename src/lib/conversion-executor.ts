/**
 * Runs one conversion request through one external encoder process,
 * with progress tracking and cooperative cancellation
 */

import { EventEmitter } from 'events';
import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type {
  ConversionErrorDetail,
  ConversionOutcome,
  ConversionProgress,
  ConversionRequest,
  ConversionResult,
  ConversionStage,
} from '../types/conversion';
import type { EncoderInvocation } from './encoder-strategy';
import { formatBytes } from './conversion-report';
import { EncoderSelector } from './encoder-selector';
import {
  ConversionError,
  EncoderProcessError,
  LaunchError,
  OutputValidationError,
  getErrorCode,
  getErrorMessage,
} from './errors';
import { readDuration } from './ffmpeg-capabilities';
import { validateOutput } from './output-validator';
import {
  LineSplitter,
  spawnProcess,
  type ProcessLauncher,
  type SpawnedProcess,
} from './process-runner';
import { ProgressParser } from './progress-parser';
import { logger } from './sentry';

export type ExecutorState =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

/**
 * Conversion executor options
 */
export interface ConversionExecutorOptions {
  /** Identifier carried into the result */
  taskId: string;
  /** Strategy source; its instances hold the availability cache */
  selector: EncoderSelector;
  /** FFprobe binary used to read the source duration */
  ffprobePath?: string;
  launcher?: ProcessLauncher;
  /** Timeout in milliseconds (optional, no timeout if not specified) */
  timeout?: number;
  /** Check the output and fail the run on errors (default true) */
  validateOutput?: boolean;
  /** Copy access and modification times from the source (default true) */
  preserveTimestamps?: boolean;
  /** Bytes that must be free next to the output; 0 skips the check */
  minFreeSpace?: number;
  /** Delay between SIGTERM and SIGKILL on cancellation (default 5000) */
  killGracePeriod?: number;
}

/**
 * Conversion executor events
 */
export interface ConversionExecutorEvents {
  /** Emitted when the pipeline moves to a new stage */
  stage: (stage: ConversionStage) => void;
  /** Emitted once the encoder process has been launched */
  start: (info: { encoderName: string; command: string }) => void;
  /** Emitted for every progress sample, in diagnostic line order */
  progress: (progress: ConversionProgress) => void;
  /** Emitted exactly once with the final result */
  complete: (result: ConversionResult) => void;
}

interface EncoderRun {
  exitCode: number | null;
  stderrTail: string[];
  lastProgress: ConversionProgress | null;
}

const STDERR_TAIL_LINES = 20;
const ERROR_DETAIL_LINES = 5;
const ERROR_DETAIL_CHARS = 500;

/**
 * Last few diagnostic lines, at most 500 characters
 */
export function formatStderrTail(lines: readonly string[]): string {
  const relevant = lines.slice(-ERROR_DETAIL_LINES).join('\n');
  return relevant.length > ERROR_DETAIL_CHARS
    ? relevant.substring(relevant.length - ERROR_DETAIL_CHARS)
    : relevant;
}

/**
 * Fields a result is built from; sizes default to 0
 */
export interface ResultFields {
  outcome: ConversionOutcome;
  startedAt: Date;
  completedAt?: Date;
  encoderName?: string | null;
  inputSize?: number;
  outputSize?: number;
  speedRatio?: number;
  error?: ConversionErrorDetail;
  warnings?: readonly string[];
}

/**
 * Build a frozen result. Savings are only counted for successful runs.
 */
export function createResult(
  taskId: string,
  request: ConversionRequest,
  fields: ResultFields,
): ConversionResult {
  const completedAt = fields.completedAt ?? new Date();
  const inputSize = fields.inputSize ?? 0;
  const outputSize = fields.outputSize ?? 0;
  const succeeded = fields.outcome === 'success';

  return Object.freeze({
    taskId,
    outcome: fields.outcome,
    inputPath: request.inputPath,
    outputPath: request.outputPath,
    encoderName: fields.encoderName ?? null,
    elapsedSeconds:
      (completedAt.getTime() - fields.startedAt.getTime()) / 1000,
    inputSize,
    outputSize,
    spaceSaved: succeeded ? Math.max(0, inputSize - outputSize) : 0,
    compressionRatio:
      succeeded && inputSize > 0 ? 1 - outputSize / inputSize : 0,
    speedRatio: fields.speedRatio ?? 0,
    ...(fields.error ? { error: fields.error } : {}),
    warnings: Object.freeze([...(fields.warnings ?? [])]),
    startedAt: fields.startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
  });
}

export class ConversionExecutor extends EventEmitter {
  private options: ConversionExecutorOptions;
  private launcher: ProcessLauncher;
  private process: SpawnedProcess | null = null;
  private mediaReadAbort = new AbortController();
  private killTimer: NodeJS.Timeout | null = null;
  private deadline: NodeJS.Timeout | null = null;
  private cancelRequested = false;
  private timedOut = false;
  private currentState: ExecutorState = 'pending';

  constructor(options: ConversionExecutorOptions) {
    super();
    this.options = options;
    this.launcher = options.launcher ?? spawnProcess;
  }

  get state(): ExecutorState {
    return this.currentState;
  }

  /**
   * Execute a request. Never rejects for task-level failures: they are
   * reported in the returned result. Rejects only when called twice.
   */
  async execute(request: ConversionRequest): Promise<ConversionResult> {
    if (this.currentState !== 'pending') {
      throw new Error('ConversionExecutor can only execute once', {
        cause: { taskId: this.options.taskId, state: this.currentState },
      });
    }
    this.currentState = 'running';

    const startedAt = new Date();
    let encoderName: string | null = null;
    let inputSize = 0;
    const soFar = () => ({ startedAt, encoderName, inputSize });

    try {
      const early = this.interruption(request, soFar());
      if (early) return early;
      this.startDeadline();

      if (
        path.resolve(request.inputPath) === path.resolve(request.outputPath)
      ) {
        throw new LaunchError('Output path must differ from input path');
      }
      const input = await this.statInput(request.inputPath);
      inputSize = input.size;

      const strategy = await this.options.selector.select(request.mode);
      encoderName = strategy.encoderName;

      this.setStage('probing');
      const duration = await readDuration(request.inputPath, {
        ffprobePath: this.options.ffprobePath,
        launcher: this.launcher,
        signal: this.mediaReadAbort.signal,
      });

      const outputDir = path.dirname(request.outputPath);
      await fs.mkdir(outputDir, { recursive: true });
      if (this.options.minFreeSpace) {
        await checkDiskSpace(outputDir, this.options.minFreeSpace);
      }

      const beforeEncode = this.interruption(request, soFar());
      if (beforeEncode) return beforeEncode;

      const invocation = strategy.buildInvocation(request);
      this.setStage('encoding');
      logger.info('[ConversionExecutor] Starting conversion', {
        taskId: this.options.taskId,
        inputPath: request.inputPath,
        encoderName,
      });
      logger.debug('[ConversionExecutor] Command', {
        command: invocation.displayCommand,
      });

      const run = await this.runEncoder(invocation, encoderName, duration);

      const afterEncode = this.interruption(
        request,
        soFar(),
        formatStderrTail(run.stderrTail),
      );
      if (afterEncode) return afterEncode;

      if (run.exitCode !== 0) {
        throw new EncoderProcessError(
          `Encoder failed with exit code ${run.exitCode}`,
          run.exitCode,
          formatStderrTail(run.stderrTail),
        );
      }

      this.setStage('finalizing');
      const outputSize = await this.readOutputSize(request.outputPath);
      const warnings: string[] = [];

      if (this.options.validateOutput !== false) {
        const validation = await validateOutput(request.outputPath, {
          ffprobePath: this.options.ffprobePath,
          launcher: this.launcher,
          signal: this.mediaReadAbort.signal,
          sourceDuration: duration,
        });
        const duringValidation = this.interruption(request, soFar());
        if (duringValidation) return duringValidation;

        if (!validation.valid) {
          return this.finish(request, {
            ...soFar(),
            outcome: 'failure',
            outputSize,
            error: new OutputValidationError(validation.errors).toDetail(),
            warnings: validation.warnings,
          });
        }
        warnings.push(...validation.warnings);
      }

      if (this.options.preserveTimestamps !== false) {
        try {
          await fs.utimes(request.outputPath, input.atime, input.mtime);
        } catch (error) {
          warnings.push(
            `Timestamp sync incomplete: ${getErrorMessage(error)}`,
          );
        }
      }

      const afterFinalize = this.interruption(request, soFar());
      if (afterFinalize) return afterFinalize;

      const elapsed = (Date.now() - startedAt.getTime()) / 1000;
      const speedRatio =
        run.lastProgress && run.lastProgress.speed > 0
          ? run.lastProgress.speed
          : duration > 0 && elapsed > 0
            ? duration / elapsed
            : 0;

      return this.finish(request, {
        ...soFar(),
        outcome: 'success',
        outputSize,
        speedRatio,
        warnings,
      });
    } catch (error) {
      return (
        this.interruption(request, soFar()) ??
        this.finish(request, {
          ...soFar(),
          outcome: 'failure',
          error: toErrorDetail(error),
        })
      );
    }
  }

  /**
   * Request cancellation. Stops the running ffprobe or encoder and returns
   * without waiting for it to exit. Returns false when there is nothing
   * left to cancel.
   */
  cancel(): boolean {
    if (
      this.cancelRequested ||
      (this.currentState !== 'pending' && this.currentState !== 'running')
    ) {
      return false;
    }
    this.cancelRequested = true;
    this.mediaReadAbort.abort();

    if (this.process) {
      logger.info('[ConversionExecutor] Cancelling conversion', {
        taskId: this.options.taskId,
      });
      const proc = this.process;
      proc.kill('SIGTERM');

      // Force kill if the encoder ignores SIGTERM
      this.killTimer = setTimeout(() => {
        if (this.process === proc) {
          proc.kill('SIGKILL');
        }
      }, this.options.killGracePeriod ?? 5000);
      this.killTimer.unref();
    }
    return true;
  }

  /**
   * Result for a run stopped by cancel() or the timeout, if it was
   */
  private interruption(
    request: ConversionRequest,
    fields: Pick<ResultFields, 'startedAt' | 'encoderName' | 'inputSize'>,
    detail?: string,
  ): ConversionResult | null {
    if (this.cancelRequested) {
      return this.finish(request, { ...fields, outcome: 'cancelled' });
    }
    if (this.timedOut) {
      const message = `Conversion timed out after ${this.options.timeout}ms`;
      return this.finish(request, {
        ...fields,
        outcome: 'failure',
        error: detail
          ? { kind: 'timeout', message, detail }
          : { kind: 'timeout', message },
      });
    }
    return null;
  }

  /**
   * The timeout covers probing, encoding and validation
   */
  private startDeadline(): void {
    const { timeout } = this.options;
    if (!timeout) return;

    this.deadline = setTimeout(() => {
      this.timedOut = true;
      logger.warn('[ConversionExecutor] Conversion timed out', {
        taskId: this.options.taskId,
        timeout,
      });
      this.mediaReadAbort.abort();
      this.process?.kill('SIGKILL');
    }, timeout);
  }

  private setStage(stage: ConversionStage): void {
    this.safeEmit('stage', stage);
  }

  private safeEmit<E extends keyof ConversionExecutorEvents>(
    event: E,
    ...args: Parameters<ConversionExecutorEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      logger.warn('[ConversionExecutor] Listener threw', {
        event,
        taskId: this.options.taskId,
        error: getErrorMessage(error),
      });
    }
  }

  private async statInput(inputPath: string): Promise<Stats> {
    try {
      const stat = await fs.stat(inputPath);
      if (!stat.isFile()) {
        throw new LaunchError(`Input is not a file: ${inputPath}`);
      }
      return stat;
    } catch (error) {
      if (error instanceof LaunchError) throw error;
      throw new LaunchError(
        `Cannot read input file: ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  private async readOutputSize(outputPath: string): Promise<number> {
    try {
      const stat = await fs.stat(outputPath);
      return stat.size;
    } catch (error) {
      throw new ConversionError('runtime', 'Output file was not created', {
        cause: error,
      });
    }
  }

  private runEncoder(
    invocation: EncoderInvocation,
    encoderName: string,
    duration: number,
  ): Promise<EncoderRun> {
    const parser = new ProgressParser(duration);
    const splitter = new LineSplitter();
    const stderrTail: string[] = [];

    const handleLine = (line: string) => {
      const progress = parser.parseLine(line);
      if (progress) {
        this.safeEmit('progress', progress);
        return;
      }
      stderrTail.push(line);
      if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
    };

    return new Promise((resolve, reject) => {
      let settled = false;
      const proc = this.launch(invocation);
      if (proc instanceof LaunchError) {
        reject(proc);
        return;
      }
      this.process = proc;

      const cleanup = () => {
        if (this.killTimer) {
          clearTimeout(this.killTimer);
          this.killTimer = null;
        }
        this.process = null;
      };

      // Nothing is read from stdout; keep it flowing so the pipe never fills
      proc.stdout?.resume();
      proc.stderr?.setEncoding('utf8');
      proc.stderr?.on('data', (chunk: string) => {
        for (const line of splitter.push(chunk)) handleLine(line);
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        cleanup();
        for (const line of splitter.flush()) handleLine(line);
        resolve({
          exitCode: code,
          stderrTail,
          lastProgress: parser.lastProgress,
        });
      });

      proc.on('error', (error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(launchFailure(invocation.command, error));
      });

      this.safeEmit('start', {
        encoderName,
        command: invocation.displayCommand,
      });
    });
  }

  private launch(invocation: EncoderInvocation): SpawnedProcess | LaunchError {
    try {
      return this.launcher(invocation.command, invocation.args);
    } catch (error) {
      return launchFailure(invocation.command, error);
    }
  }

  private finish(
    request: ConversionRequest,
    fields: ResultFields,
  ): ConversionResult {
    const result = createResult(this.options.taskId, request, fields);
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }

    this.currentState =
      result.outcome === 'success'
        ? 'completed'
        : result.outcome === 'cancelled'
          ? 'cancelled'
          : 'failed';

    if (result.outcome === 'success') {
      logger.info('[ConversionExecutor] Conversion complete', {
        taskId: result.taskId,
        inputSize: result.inputSize,
        outputSize: result.outputSize,
        speedRatio: result.speedRatio,
      });
    } else if (result.outcome === 'failure') {
      logger.error('[ConversionExecutor] Conversion failed', {
        taskId: result.taskId,
        error: result.error?.message,
      });
    } else {
      logger.info('[ConversionExecutor] Conversion cancelled', {
        taskId: result.taskId,
      });
    }

    this.safeEmit('complete', result);
    return result;
  }
}

async function checkDiskSpace(dir: string, required: number): Promise<void> {
  let free: number;
  try {
    const stats = await fs.statfs(dir);
    free = stats.bavail * stats.bsize;
  } catch (error) {
    logger.warn('[ConversionExecutor] Cannot read free disk space', {
      dir,
      error: getErrorMessage(error),
    });
    return;
  }
  if (free < required) {
    throw new LaunchError(
      `Insufficient disk space: ${formatBytes(free)} free, ` +
        `${formatBytes(required)} required`,
    );
  }
}

function launchFailure(command: string, error: unknown): LaunchError {
  const code = getErrorCode(error);
  const message =
    code === 'ENOENT'
      ? `Encoder binary not found: ${command}`
      : `Failed to start encoder: ${getErrorMessage(error)}`;
  return new LaunchError(message, error);
}

function toErrorDetail(error: unknown): ConversionErrorDetail {
  if (error instanceof ConversionError) {
    return error.toDetail();
  }
  return { kind: 'internal', message: getErrorMessage(error) };
}
