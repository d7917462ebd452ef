/**
 * Orchestrator for batches of conversions
 * Handles queueing, bounded-concurrency dispatch, cancellation, status
 * queries and batch reporting
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import {
  TERMINAL_STATUSES,
  createConversionRequest,
  type CompletionCallback,
  type ConversionProgress,
  type ConversionReport,
  type ConversionRequestInput,
  type ConversionResult,
  type ConversionStage,
  type ConversionStatus,
  type ConversionTask,
  type EncodingDefaults,
  type MetadataProcessor,
  type ProgressCallback,
} from '../types/conversion';
import {
  resolveConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from './config';
import { ConversionExecutor, createResult } from './conversion-executor';
import { ConversionReportBuilder } from './conversion-report';
import { EncoderSelector, createDefaultStrategies } from './encoder-selector';
import { TaskNotFoundError, getErrorMessage } from './errors';
import { isH264Codec, readVideoCodec } from './ffmpeg-capabilities';
import type { ProcessLauncher } from './process-runner';
import { captureException, logger, startSpan } from './sentry';
import { createOutputPath, findVideoFiles } from './video-files';

/**
 * Collaborators the orchestrator can be given instead of its defaults
 */
export interface OrchestratorDependencies {
  /** Shared by every task; owns the encoder availability cache */
  selector?: EncoderSelector;
  /** Process launcher for ffprobe and encodes */
  launcher?: ProcessLauncher;
  /** Copies and verifies metadata after successful encodes */
  metadataProcessor?: MetadataProcessor;
  createTaskId?: () => string;
}

/**
 * Orchestrator events
 */
export interface OrchestratorEvents {
  /** Emitted when a task enters the queue */
  'task:queued': (task: ConversionTask) => void;
  /** Emitted when a task is handed to an executor */
  'task:start': (task: ConversionTask) => void;
  /** Emitted for every progress sample */
  'task:progress': (
    task: ConversionTask,
    progress: ConversionProgress,
  ) => void;
  /** Emitted once per task with its terminal result */
  'task:complete': (task: ConversionTask, result: ConversionResult) => void;
  /** Emitted when the queue drains and nothing is running */
  'batch:complete': (report: ConversionReport) => void;
}

export interface OrchestratorState {
  queued: number;
  running: number;
  completed: number;
}

export type SubmitDirectoryOptions = Partial<EncodingDefaults> & {
  /** Glob matched against file names */
  pattern?: string;
  recursive?: boolean;
  /** Output root; subdirectory layout is mirrored under it */
  outputDir?: string;
};

const OUTCOME_STATUS = {
  success: 'succeeded',
  failure: 'failed',
  cancelled: 'cancelled',
} as const satisfies Record<ConversionResult['outcome'], ConversionStatus>;

export class Orchestrator extends EventEmitter {
  readonly config: OrchestratorConfig;
  private selector: EncoderSelector;
  private launcher?: ProcessLauncher;
  private metadataProcessor?: MetadataProcessor;
  private createTaskId: () => string;

  private tasks = new Map<string, ConversionTask>();
  private queue: string[] = [];
  private running = new Map<string, ConversionExecutor>();
  private progressCallbacks = new Set<ProgressCallback>();
  private completionCallbacks = new Set<CompletionCallback>();
  private report: ConversionReportBuilder | null = null;
  private lastReport: ConversionReport | null = null;
  private batchWaiters: Array<(report: ConversionReport) => void> = [];

  constructor(
    config: OrchestratorConfigInput = {},
    dependencies: OrchestratorDependencies = {},
  ) {
    super();
    this.config = resolveConfig(config);
    this.launcher = dependencies.launcher;
    this.metadataProcessor = dependencies.metadataProcessor;
    this.createTaskId = dependencies.createTaskId ?? randomUUID;
    this.selector =
      dependencies.selector ??
      new EncoderSelector(
        createDefaultStrategies({
          ffmpegPath: this.config.ffmpegPath,
          launcher: this.launcher,
        }),
      );
  }

  /**
   * Queue a conversion. Unspecified settings come from the configured
   * defaults; dispatch happens without waiting for the encode.
   */
  submit(input: ConversionRequestInput): string {
    const request = createConversionRequest(input, this.config.defaults);

    if (!this.report || this.report.isFinalized) {
      this.report = new ConversionReportBuilder();
      logger.info('[Orchestrator] Starting new batch', {
        batchId: this.report.snapshot().batchId,
      });
    }

    const task: ConversionTask = {
      id: this.createTaskId(),
      request,
      status: 'queued',
      stage: 'queued',
      createdAt: new Date().toISOString(),
    };
    this.tasks.set(task.id, task);
    this.queue.push(task.id);

    logger.debug('[Orchestrator] Task queued', {
      taskId: task.id,
      inputPath: request.inputPath,
      mode: request.mode,
    });
    this.safeEmit('task:queued', snapshotTask(task));

    this.dispatch();
    return task.id;
  }

  submitMany(inputs: readonly ConversionRequestInput[]): string[] {
    return inputs.map((input) => this.submit(input));
  }

  /**
   * Queue every video found under a directory. With `h264Only` set, files
   * whose first video stream is not H.264 are skipped.
   */
  async submitDirectory(
    dir: string,
    options: SubmitDirectoryOptions = {},
  ): Promise<string[]> {
    const { pattern, recursive, outputDir, ...encoding } = options;
    const suffix = this.config.outputSuffix;
    const found = await findVideoFiles(dir, { pattern, recursive, suffix });
    const files = this.config.h264Only ? await this.filterH264(found) : found;

    logger.info('[Orchestrator] Found videos to convert', {
      dir,
      found: found.length,
      count: files.length,
    });

    return this.submitMany(
      files.map((inputPath) => ({
        ...encoding,
        inputPath,
        outputPath: createOutputPath(inputPath, {
          suffix,
          outputDir: outputDir
            ? path.join(
                outputDir,
                path.relative(dir, path.dirname(inputPath)),
              )
            : undefined,
        }),
      })),
    );
  }

  private async filterH264(files: readonly string[]): Promise<string[]> {
    const selected: string[] = [];
    for (const file of files) {
      const codec = await readVideoCodec(file, {
        ffprobePath: this.config.ffprobePath,
        launcher: this.launcher,
      });
      if (isH264Codec(codec)) {
        selected.push(file);
      } else {
        logger.info('[Orchestrator] Skipping non-H.264 video', {
          file,
          codec,
        });
      }
    }
    return selected;
  }

  /**
   * Cancel a task
   * A queued task is cancelled at once; a running task's encoder is
   * signalled and the task completes as cancelled when it exits.
   * Returns false when the task already finished.
   */
  cancel(taskId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (TERMINAL_STATUSES.has(task.status)) {
      return false;
    }

    if (task.status === 'queued') {
      logger.info('[Orchestrator] Cancelling queued task', { taskId });
      this.queue = this.queue.filter((id) => id !== taskId);
      const now = new Date();
      this.completeTask(
        task,
        createResult(task.id, task.request, {
          outcome: 'cancelled',
          startedAt: now,
          completedAt: now,
        }),
      );
      return true;
    }

    const executor = this.running.get(taskId);
    if (!executor) return false;
    logger.info('[Orchestrator] Cancelling running task', { taskId });
    return executor.cancel();
  }

  /**
   * Cancel everything queued or running; returns how many were cancelled
   */
  cancelAll(): number {
    let cancelled = 0;
    for (const taskId of [...this.queue]) {
      if (this.cancel(taskId)) cancelled++;
    }
    for (const taskId of [...this.running.keys()]) {
      if (this.cancel(taskId)) cancelled++;
    }
    return cancelled;
  }

  getStatus(taskId: string): ConversionTask {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return snapshotTask(task);
  }

  /**
   * Every known task, in submission order
   */
  listTasks(): ConversionTask[] {
    return [...this.tasks.values()].map(snapshotTask);
  }

  getState(): OrchestratorState {
    let completed = 0;
    for (const task of this.tasks.values()) {
      if (TERMINAL_STATUSES.has(task.status)) completed++;
    }
    return {
      queued: this.queue.length,
      running: this.running.size,
      completed,
    };
  }

  /**
   * Forget finished tasks; returns how many were removed. Their results
   * stay in the batch report.
   */
  clearFinished(): number {
    let removed = 0;
    for (const [taskId, task] of this.tasks) {
      if (TERMINAL_STATUSES.has(task.status)) {
        this.tasks.delete(taskId);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Returns a function that unregisters the callback
   */
  registerProgressCallback(callback: ProgressCallback): () => void {
    this.progressCallbacks.add(callback);
    return () => {
      this.progressCallbacks.delete(callback);
    };
  }

  /**
   * Returns a function that unregisters the callback
   */
  registerCompletionCallback(callback: CompletionCallback): () => void {
    this.completionCallbacks.add(callback);
    return () => {
      this.completionCallbacks.delete(callback);
    };
  }

  /**
   * Resolve with the batch report once the queue is empty and nothing is
   * running. When already idle, resolves with the last finalized report.
   */
  waitForBatch(): Promise<ConversionReport> {
    if (this.isIdle()) {
      return Promise.resolve(
        this.lastReport ?? new ConversionReportBuilder().finalize(),
      );
    }
    return new Promise((resolve) => {
      this.batchWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0;
  }

  /**
   * Start queued tasks, oldest first, while slots are free
   */
  private dispatch(): void {
    while (
      this.running.size < this.config.maxConcurrent &&
      this.queue.length > 0
    ) {
      const taskId = this.queue.shift();
      const task = taskId ? this.tasks.get(taskId) : undefined;
      if (!task || task.status !== 'queued') continue;
      this.startTask(task);
    }
  }

  private startTask(task: ConversionTask): void {
    const executor = new ConversionExecutor({
      taskId: task.id,
      selector: this.selector,
      ffprobePath: this.config.ffprobePath,
      launcher: this.launcher,
      timeout: this.config.timeout,
      killGracePeriod: this.config.killGracePeriod,
      validateOutput: this.config.validateOutput,
      preserveTimestamps: this.config.preserveTimestamps,
      minFreeSpace: this.config.minFreeSpace,
    });
    this.running.set(task.id, executor);

    task.status = 'running';
    task.startedAt = new Date().toISOString();

    logger.info('[Orchestrator] Started task', {
      taskId: task.id,
      inputPath: task.request.inputPath,
      running: this.running.size,
      queued: this.queue.length,
    });
    this.safeEmit('task:start', snapshotTask(task));

    this.runTask(task, executor).catch((error: unknown) => {
      logger.error('[Orchestrator] Task runner failed', {
        taskId: task.id,
        error: getErrorMessage(error),
      });
      captureException(error, { extra: { taskId: task.id } });
      if (!TERMINAL_STATUSES.has(task.status)) {
        this.completeTask(
          task,
          createResult(task.id, task.request, {
            outcome: 'failure',
            startedAt: new Date(task.startedAt ?? task.createdAt),
            error: { kind: 'internal', message: getErrorMessage(error) },
          }),
        );
      }
    });
  }

  private runTask(
    task: ConversionTask,
    executor: ConversionExecutor,
  ): Promise<void> {
    return startSpan(
      {
        op: 'conversion.task',
        name: `Convert ${path.basename(task.request.inputPath)}`,
      },
      async () => {
        executor.on('stage', (stage: ConversionStage) => {
          task.stage = stage;
        });
        executor.on('start', (info: { encoderName: string }) => {
          task.encoderName = info.encoderName;
        });
        executor.on('progress', (progress: ConversionProgress) => {
          this.handleProgress(task, progress);
        });

        let result = await executor.execute(task.request);

        if (result.outcome === 'success' && this.metadataProcessor) {
          result = await this.applyMetadata(
            task,
            result,
            this.metadataProcessor,
          );
        }
        if (result.outcome === 'success') {
          result = await this.disposeOriginal(task, result);
        }

        if (result.outcome === 'failure') {
          captureException(new Error(result.error?.message), {
            tags: { errorKind: result.error?.kind ?? 'internal' },
            extra: {
              taskId: task.id,
              inputPath: result.inputPath,
              outputPath: result.outputPath,
              encoderName: result.encoderName,
              encoderStderr: result.error?.detail,
            },
          });
        }

        this.completeTask(task, result);
      },
    );
  }

  private handleProgress(
    task: ConversionTask,
    progress: ConversionProgress,
  ): void {
    const percentage = Math.max(
      task.progress?.percentage ?? 0,
      progress.percentage,
    );
    task.progress = { ...progress, percentage };

    const snapshot = snapshotTask(task);
    this.safeEmit('task:progress', snapshot, progress);
    for (const callback of this.progressCallbacks) {
      try {
        callback(snapshot, progress);
      } catch (error) {
        this.reportCallbackError('progress', task.id, error);
      }
    }
  }

  /**
   * Copy then verify metadata; problems become warnings on the result
   */
  private async applyMetadata(
    task: ConversionTask,
    result: ConversionResult,
    processor: MetadataProcessor,
  ): Promise<ConversionResult> {
    task.stage = 'finalizing';
    const warnings: string[] = [];

    try {
      await processor.copy(result.inputPath, result.outputPath);
      const verification = await processor.verify(
        result.inputPath,
        result.outputPath,
      );
      if (!verification.passed) {
        warnings.push(
          ...(verification.details.length > 0
            ? verification.details
            : ['Metadata verification failed']),
        );
      }
    } catch (error) {
      warnings.push(`Metadata copy failed: ${getErrorMessage(error)}`);
    }

    if (warnings.length === 0) return result;

    logger.warn('[Orchestrator] Metadata problems', {
      taskId: task.id,
      warnings,
    });
    return Object.freeze({
      ...result,
      warnings: Object.freeze([...result.warnings, ...warnings]),
    });
  }

  /**
   * Delete or move the source after a successful conversion, as
   * configured; problems become warnings
   */
  private async disposeOriginal(
    task: ConversionTask,
    result: ConversionResult,
  ): Promise<ConversionResult> {
    const { deleteOriginal, moveToProcessed } = this.config;
    if (!deleteOriginal && !moveToProcessed) return result;

    let warning: string | null = null;
    if (deleteOriginal) {
      try {
        await fs.unlink(result.inputPath);
        logger.info('[Orchestrator] Deleted original', {
          taskId: task.id,
          inputPath: result.inputPath,
        });
      } catch (error) {
        warning = `Could not delete original: ${getErrorMessage(error)}`;
      }
    } else if (moveToProcessed) {
      const dest = path.join(moveToProcessed, path.basename(result.inputPath));
      try {
        await fs.mkdir(moveToProcessed, { recursive: true });
        await fs.rename(result.inputPath, dest);
        logger.info('[Orchestrator] Moved original', {
          taskId: task.id,
          dest,
        });
      } catch (error) {
        warning = `Could not move original: ${getErrorMessage(error)}`;
      }
    }

    if (warning === null) return result;
    logger.warn('[Orchestrator] Cleanup problem', {
      taskId: task.id,
      warning,
    });
    return Object.freeze({
      ...result,
      warnings: Object.freeze([...result.warnings, warning]),
    });
  }

  private completeTask(task: ConversionTask, result: ConversionResult): void {
    this.running.delete(task.id);

    task.status = OUTCOME_STATUS[result.outcome];
    task.stage = 'done';
    task.completedAt = result.completedAt;
    task.result = result;
    if (result.encoderName) task.encoderName = result.encoderName;

    this.report?.add(result);

    logger.info('[Orchestrator] Task finished', {
      taskId: task.id,
      status: task.status,
      elapsedSeconds: result.elapsedSeconds,
    });

    const snapshot = snapshotTask(task);
    this.safeEmit('task:complete', snapshot, result);
    for (const callback of this.completionCallbacks) {
      try {
        callback(snapshot, result);
      } catch (error) {
        this.reportCallbackError('completion', task.id, error);
      }
    }

    this.dispatch();
    this.finishBatchIfIdle();
  }

  private finishBatchIfIdle(): void {
    if (!this.isIdle() || !this.report || this.report.isFinalized) return;

    const report = this.report.finalize();
    this.lastReport = report;
    logger.info('[Orchestrator] Batch complete', {
      batchId: report.batchId,
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failed,
      cancelled: report.cancelled,
    });

    this.safeEmit('batch:complete', report);
    const waiters = this.batchWaiters;
    this.batchWaiters = [];
    for (const resolve of waiters) resolve(report);
  }

  private safeEmit<E extends keyof OrchestratorEvents>(
    event: E,
    ...args: Parameters<OrchestratorEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.reportCallbackError(event, undefined, error);
    }
  }

  private reportCallbackError(
    source: string,
    taskId: string | undefined,
    error: unknown,
  ): void {
    logger.error('[Orchestrator] Callback threw', {
      source,
      taskId,
      error: getErrorMessage(error),
    });
    captureException(error, { extra: { source, taskId } });
  }
}

/**
 * Copy of a task that callers can hold without seeing later updates
 */
function snapshotTask(task: ConversionTask): ConversionTask {
  return {
    ...task,
    progress: task.progress ? { ...task.progress } : undefined,
  };
}
