/**
 * Structured logger with JSON output and error tracking
 *
 * Every module logs through a child of the shared `logger`, so one call to
 * `logger.configure()` (made by `applyLoggingConfig`) reaches all of them.
 */

import * as Sentry from '@sentry/node';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LoggerSettings {
  level?: LogLevel;
  format?: LogFormat;
  /** Color pretty output; only takes effect on a TTY */
  colors?: boolean;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  module?: string;
  error?: SerializedError;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const ENTRY_KEYS = new Set(['level', 'message', 'timestamp', 'module', 'error']);

let sentryInitialized = false;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Report error-level entries to Sentry. Without a DSN (argument or
 * SENTRY_DSN) this does nothing.
 */
export function initErrorTracking(dsn?: string): void {
  const sentryDsn = dsn || process.env.SENTRY_DSN;
  if (!sentryDsn || sentryInitialized) {
    return;
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV || 'development',
  });
  sentryInitialized = true;
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    // Own fields first so coordinator errors keep their code and context
    return {
      ...Object.fromEntries(Object.entries(error)),
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    name: 'Error',
    message: typeof error === 'object' && error !== null ? JSON.stringify(error) : String(error),
  };
}

export class Logger {
  private readonly module: string;
  private level: LogLevel = 'info';
  private format: LogFormat = 'pretty';
  private colors = true;
  private readonly children: Logger[] = [];

  constructor(module = '', settings: LoggerSettings = {}) {
    this.module = module;

    if (process.env.LOG_FORMAT === 'json' || process.env.NODE_ENV === 'production') {
      this.format = 'json';
      this.colors = false;
    }
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      this.level = envLevel;
    }

    this.apply(settings);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Logger for `module`, nested under this logger's module. It starts with
   * this logger's settings and follows later `configure` calls.
   */
  child(module: string): Logger {
    const child = new Logger(this.module ? `${this.module}:${module}` : module, {
      level: this.level,
      format: this.format,
      colors: this.colors,
    });
    this.children.push(child);
    return child;
  }

  /**
   * Change settings here and in every child logger
   */
  configure(settings: LoggerSettings): void {
    this.apply(settings);
    for (const child of this.children) {
      child.configure(settings);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private apply(settings: LoggerSettings): void {
    if (settings.level) this.level = settings.level;
    if (settings.format) {
      this.format = settings.format;
      this.colors = settings.format !== 'json';
    }
    if (settings.colors !== undefined) this.colors = settings.colors;
  }

  private formatPretty(entry: LogEntry): string {
    const colored = this.colors && process.stdout.isTTY === true;
    const paint = (code: string, text: string): string => (colored ? `${code}${text}${RESET}` : text);

    const levelStr = paint(COLORS[entry.level], entry.level.toUpperCase().padEnd(5));
    const module = entry.module ? `[${entry.module}] ` : '';

    const extra = Object.fromEntries(Object.entries(entry).filter(([key]) => !ENTRY_KEYS.has(key)));
    const contextStr = Object.keys(extra).length > 0 ? ` ${paint(DIM, JSON.stringify(extra))}` : '';
    const errorStr = entry.error ? `\n${entry.error.stack || `${entry.error.name}: ${entry.error.message}`}` : '';

    return `${paint(DIM, entry.timestamp)} ${levelStr} ${module}${entry.message}${contextStr}${errorStr}`;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const { error, ...fields } = context ?? {};

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(this.module && { module: this.module }),
      ...fields,
    };

    // Plain string errors stay inline; Error objects are serialized with their stack
    if (error instanceof Error) {
      entry.error = serializeError(error);
    } else if (error !== undefined) {
      entry.errorMessage = typeof error === 'string' ? error : serializeError(error).message;
    }

    const formatted = this.format === 'json' ? JSON.stringify(entry) : this.formatPretty(entry);

    switch (level) {
      case 'error':
        console.error(formatted);
        if (sentryInitialized) {
          Sentry.captureException(error instanceof Error ? error : new Error(message), {
            level: 'error',
            contexts: { logger: { module: this.module, ...fields } },
          });
        }
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }
}

export const logger = new Logger();

export function createLogger(module: string): Logger {
  return logger.child(module);
}
