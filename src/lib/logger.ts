/**
 * Logger factory built on pino.
 *
 * Records always go to stderr: stdout is reserved for machine-readable output
 * (matrix JSON, dependency reports) that CI steps capture.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
}

const REDACTED_PATHS = [
  'password',
  '*.password',
  'authconfig.password',
  'credentials.password',
  'token',
  '*.token',
  'webhookUrl',
  '*.webhookUrl',
];

function resolveLevel(explicit?: string): string {
  if (explicit) return explicit;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Create a pino logger writing to stderr.
 *
 * Pretty printing is enabled only for interactive terminals outside of tests; CI
 * logs stay as JSON lines.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: resolveLevel(options.level),
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (options.name) {
    loggerOptions.name = options.name;
  }

  const pretty = process.stderr.isTTY && process.env.NODE_ENV !== 'test';
  if (pretty) {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, colorize: true, ignore: 'pid,hostname', translateTime: 'HH:MM:ss' },
      },
    });
  }

  return pino(loggerOptions, pino.destination(2));
}

/**
 * Operation timer that logs its duration on completion
 */
export interface Timer {
  end(additionalContext?: Record<string, unknown>): void;
  error(error: unknown, additionalContext?: Record<string, unknown>): void;
  /** Logs an intermediate mark and returns elapsed milliseconds */
  checkpoint(label: string, additionalContext?: Record<string, unknown>): number;
}

export function createTimer(logger: Logger, operation: string): Timer {
  const startedAt = Date.now();

  return {
    end(additionalContext = {}) {
      logger.info({ operation, durationMs: Date.now() - startedAt, ...additionalContext }, `${operation} completed`);
    },
    error(error, additionalContext = {}) {
      logger.error(
        { operation, durationMs: Date.now() - startedAt, err: error, ...additionalContext },
        `${operation} failed`,
      );
    },
    checkpoint(label, additionalContext = {}) {
      const elapsed = Date.now() - startedAt;
      logger.debug({ operation, checkpoint: label, elapsedMs: elapsed, ...additionalContext }, label);
      return elapsed;
    },
  };
}
