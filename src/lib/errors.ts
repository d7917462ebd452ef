/**
 * Error taxonomy for conversion tasks
 */

import type {
  ConversionErrorDetail,
  ConversionErrorKind,
} from '../types/conversion';

/**
 * Base class for failures confined to a single task
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly detail?: string;

  constructor(
    kind: ConversionErrorKind,
    message: string,
    options?: { cause?: unknown; detail?: string },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ConversionError';
    this.kind = kind;
    this.detail = options?.detail;
  }

  toDetail(): ConversionErrorDetail {
    return this.detail === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, detail: this.detail };
  }
}

/**
 * No encoder strategy able to serve the request exists on this host.
 * Retrying without a different host configuration cannot succeed.
 */
export class EncoderUnavailableError extends ConversionError {
  constructor(message: string) {
    super('availability', message);
    this.name = 'EncoderUnavailableError';
  }
}

/**
 * The encoder could not be started or its input could not be read
 */
export class LaunchError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super('launch', message, { cause });
    this.name = 'LaunchError';
  }
}

/**
 * The encoder ran and exited unsuccessfully
 */
export class EncoderProcessError extends ConversionError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, stderrTail: string) {
    super('runtime', message, { detail: stderrTail });
    this.name = 'EncoderProcessError';
    this.exitCode = exitCode;
  }
}

/**
 * The encoder reported success but its output failed validation
 */
export class OutputValidationError extends ConversionError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super('validation', `Validation failed: ${errors.join(', ')}`);
    this.name = 'OutputValidationError';
    this.errors = errors;
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) when present
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
