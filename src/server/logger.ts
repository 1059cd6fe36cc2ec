/**
 * Structured Logging for ci-dispatch
 *
 * Provides JSON-formatted logs in production and pretty logs in development.
 * Includes request tracing, timing, and contextual metadata.
 */

import type { MiddlewareHandler } from 'hono';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service?: string;
  traceId?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerContext {
  service?: string;
  traceId?: string;
  [key: string]: unknown;
}

export interface LoggerSettings {
  /** Minimum level written; `silent` drops everything */
  level: LogLevel | 'silent';
  format: 'json' | 'pretty';
}

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const SILENT = Number.POSITIVE_INFINITY;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function levelFromEnv(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'silent') return SILENT;
  if (isLogLevel(raw)) return LOG_LEVELS[raw];
  return process.env.NODE_ENV === 'production' ? LOG_LEVELS.info : LOG_LEVELS.debug;
}

let minLevel = levelFromEnv();
let useJsonFormat = process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json';

/**
 * Override the level and format picked up from the environment at startup
 */
export function configureLogger(settings: Partial<LoggerSettings>): void {
  if (settings.level !== undefined) {
    minLevel = settings.level === 'silent' ? SILENT : LOG_LEVELS[settings.level];
  }
  if (settings.format !== undefined) {
    useJsonFormat = settings.format === 'json';
  }
}

// ANSI color codes for pretty printing
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
};

const levelColors: Record<LogLevel, string> = {
  debug: colors.dim,
  info: colors.cyan,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
};

// =============================================================================
// Formatters
// =============================================================================

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry): string {
  const { level, message, timestamp, service, traceId, duration, ...rest } = entry;

  const color = levelColors[level];
  const time = new Date(timestamp).toLocaleTimeString();

  let output = `${colors.dim}${time}${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset}`;

  if (service) {
    output += ` ${colors.blue}[${service}]${colors.reset}`;
  }

  output += ` ${message}`;

  if (duration !== undefined) {
    output += ` ${colors.dim}(${duration}ms)${colors.reset}`;
  }

  if (traceId) {
    output += ` ${colors.dim}trace=${traceId}${colors.reset}`;
  }

  const extras = Object.entries(rest).filter(([, v]) => v !== undefined);
  if (extras.length > 0) {
    const extraStr = extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
    output += ` ${colors.dim}${extraStr}${colors.reset}`;
  }

  return output;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private context: LoggerContext;

  constructor(context: LoggerContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LoggerContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    const formatted = useJsonFormat ? formatJson(entry) : formatPretty(entry);

    switch (level) {
      case 'error':
      case 'fatal':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log('fatal', message, meta);
  }

  /**
   * Create a timer that logs on completion
   */
  startTimer(message: string, meta?: Record<string, unknown>): { end: (extra?: Record<string, unknown>) => void } {
    const start = Date.now();
    return {
      end: (extra) => {
        this.info(message, { ...meta, ...extra, duration: Date.now() - start });
      },
    };
  }
}

/**
 * Turn an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

// =============================================================================
// Default Logger Instance
// =============================================================================

export const logger = new Logger({ service: 'ci-dispatch' });

// =============================================================================
// Request Logging Middleware
// =============================================================================

export type LoggerVariables = {
  logger: Logger;
  traceId: string;
};

/** Hono environment of every app that mounts `requestLogger` */
export type AppEnv = { Variables: LoggerVariables };

function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 15);
}

/**
 * HTTP request logging middleware
 */
export function requestLogger(
  base: Logger = logger,
  options: { skip?: (path: string) => boolean } = {}
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (options.skip?.(c.req.path)) {
      return next();
    }

    const traceId = c.req.header('x-trace-id') || generateTraceId();
    const start = Date.now();

    c.header('x-trace-id', traceId);

    const reqLogger = base.child({
      traceId,
      method: c.req.method,
      path: c.req.path,
    });

    c.set('logger', reqLogger);
    c.set('traceId', traceId);

    reqLogger.debug('Request started');

    try {
      await next();

      const duration = Date.now() - start;
      const status = c.res.status;

      if (status >= 500) {
        reqLogger.error('Request failed', { status, duration });
      } else if (status >= 400) {
        reqLogger.warn('Request error', { status, duration });
      } else {
        reqLogger.debug('Request completed', { status, duration });
      }
    } catch (error) {
      reqLogger.error('Request exception', {
        duration: Date.now() - start,
        ...errorMeta(error),
      });
      throw error;
    }
  };
}
