/**
 * Monitoring for the conversion engine
 * Uses Sentry when configured, falls back to console logging otherwise
 */

import type * as SentryNode from '@sentry/node';

type SentryModule = typeof SentryNode;

export interface SentryConfig {
  dsn?: string;
  environment?: string;
  sendDefaultPii?: boolean;
}

export interface SpanContext {
  op: string;
  name: string;
}

export type LogData = Record<string, unknown>;

export interface Logger {
  trace(message: string, data?: LogData): void;
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  fatal(message: string, data?: LogData): void;
}

export interface CaptureContext {
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
}

export interface Monitor {
  captureException(error: unknown, context?: CaptureContext): void;
  startSpan<T>(context: SpanContext, callback: () => T): T;
  logger: Logger;
}

export const LOG_LEVELS = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

class SentryMonitor implements Monitor {
  logger: Logger;
  private sentryInstance: SentryModule;

  constructor(sentryInstance: SentryModule) {
    this.sentryInstance = sentryInstance;
    const sentryLogger = sentryInstance.logger;
    this.logger = {
      trace: (message, data) => sentryLogger.trace(message, data),
      debug: (message, data) => sentryLogger.debug(message, data),
      info: (message, data) => sentryLogger.info(message, data),
      warn: (message, data) => sentryLogger.warn(message, data),
      error: (message, data) => sentryLogger.error(message, data),
      fatal: (message, data) => sentryLogger.fatal(message, data),
    };
  }

  captureException(error: unknown, context?: CaptureContext): void {
    this.sentryInstance.captureException(error, context);
  }

  startSpan<T>(context: SpanContext, callback: () => T): T {
    return this.sentryInstance.startSpan(context, callback);
  }
}

export class ConsoleMonitor implements Monitor {
  logger: Logger;
  private threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LOG_LEVELS.indexOf(level);
    const enabled = (candidate: LogLevel) =>
      LOG_LEVELS.indexOf(candidate) >= this.threshold;

    this.logger = {
      trace: (message, data) => {
        if (enabled('trace')) console.debug('[TRACE]', message, data ?? '');
      },
      debug: (message, data) => {
        if (enabled('debug')) console.debug('[DEBUG]', message, data ?? '');
      },
      info: (message, data) => {
        if (enabled('info')) console.info('[INFO]', message, data ?? '');
      },
      warn: (message, data) => {
        if (enabled('warn')) console.warn('[WARN]', message, data ?? '');
      },
      error: (message, data) => {
        if (enabled('error')) console.error('[ERROR]', message, data ?? '');
      },
      fatal: (message, data) => {
        if (enabled('fatal')) console.error('[FATAL]', message, data ?? '');
      },
    };
  }

  captureException(error: unknown, context?: CaptureContext): void {
    if (LOG_LEVELS.indexOf('error') < this.threshold) return;
    console.error('Exception:', error);
    if (context) {
      console.error('Context:', context);
    }
  }

  startSpan<T>(context: SpanContext, callback: () => T): T {
    this.logger.trace(`Span [${context.op}]: ${context.name}`);
    return callback();
  }
}

let monitor: Monitor | null = null;

function logLevelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  return env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
}

/**
 * Initialize monitoring from environment variables.
 * Call early in the application lifecycle; Sentry is loaded lazily so
 * hosts without a DSN never pay for it.
 */
export async function initializeMonitoring(
  env: NodeJS.ProcessEnv = process.env,
): Promise<Monitor> {
  const level = logLevelFromEnv(env);
  const config: SentryConfig = {
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT,
    sendDefaultPii: env.SENTRY_SEND_DEFAULT_PII === 'true',
  };

  try {
    if (config.dsn) {
      const Sentry = await import('@sentry/node');
      Sentry.init({
        dsn: config.dsn,
        environment: config.environment || 'production',
        sendDefaultPii: config.sendDefaultPii,
        enableLogs: true,
      });
      monitor = new SentryMonitor(Sentry);
      console.log('Sentry initialized successfully');
    } else {
      monitor = new ConsoleMonitor(level);
    }
  } catch (error) {
    console.error('Failed to initialize monitoring:', error);
    monitor = new ConsoleMonitor(level);
  }
  return monitor;
}

/**
 * Replace the active monitor (tests, embedding hosts)
 */
export function setMonitor(next: Monitor): void {
  monitor = next;
}

/**
 * Get the monitor instance. Before initializeMonitoring() runs, a console
 * monitor honouring LOG_LEVEL stands in.
 */
export function getMonitor(): Monitor {
  if (!monitor) {
    monitor = new ConsoleMonitor(logLevelFromEnv(process.env));
  }
  return monitor;
}

/**
 * Convenience exports for common operations
 */
export const captureException = (error: unknown, context?: CaptureContext) =>
  getMonitor().captureException(error, context);
export const startSpan = <T>(context: SpanContext, callback: () => T): T =>
  getMonitor().startSpan(context, callback);
export const logger: Logger = {
  trace: (message, data) => getMonitor().logger.trace(message, data),
  debug: (message, data) => getMonitor().logger.debug(message, data),
  info: (message, data) => getMonitor().logger.info(message, data),
  warn: (message, data) => getMonitor().logger.warn(message, data),
  error: (message, data) => getMonitor().logger.error(message, data),
  fatal: (message, data) => getMonitor().logger.fatal(message, data),
};
