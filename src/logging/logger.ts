/**
 * Structured logging on pino.
 *
 * Output goes to stderr: stdout carries the line-delimited protocol when the
 * stdio server runs, and must stay free of anything else.
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  tool?: string;
  sessionId?: string;
  url?: string | null;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  destination: 'stderr' | 'stdout' | DestinationStream;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  destination: 'stderr',
};

const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'api_key',
  '*.api_key',
  '*.authorization',
  '*.Authorization',
  'headers.authorization',
];

function createBaseLogger(config: LoggerConfig): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: { pid: process.pid, service: 'web-tool-runtime' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
  return pino(options, resolveDestination(config.destination));
}

function resolveDestination(destination: LoggerConfig['destination']): DestinationStream {
  if (destination === 'stderr') return process.stderr;
  if (destination === 'stdout') return process.stdout;
  return destination;
}

let baseLogger = createBaseLogger(DEFAULT_CONFIG);
// Bumped on every configureLogger() so component loggers know to rebuild their child.
let generation = 0;

export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
  generation += 1;
}

/**
 * Component logger. The pino child is cached and rebuilt only after
 * configureLogger() swaps the base logger, so loggers created at module load
 * still follow the configured level and destination.
 */
export class Logger {
  private cached: PinoLogger | null = null;
  private cachedGeneration = -1;

  constructor(private component: string) {}

  private get target(): PinoLogger {
    if (!this.cached || this.cachedGeneration !== generation) {
      this.cached = baseLogger.child({ component: this.component });
      this.cachedGeneration = generation;
    }
    return this.cached;
  }

  debug(message: string, context?: LogContext): void {
    this.target.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.target.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.target.warn(context ?? {}, message);
  }

  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error !== undefined) {
      const { error, ...rest } = context;
      const err =
        error instanceof Error
          ? { name: error.name, message: error.message, stack: error.stack }
          : { message: String(error) };
      this.target.error({ ...rest, err }, message);
      return;
    }
    this.target.error(context ?? {}, message);
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
