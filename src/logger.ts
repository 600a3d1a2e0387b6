import type { LogEntry, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Validates and returns a log level from an environment variable string.
 * @param level The raw string from `process.env`.
 * @returns A valid log level or 'info' as a default.
 */
export function getLogLevel(level?: string): LogLevel {
  const normalized = level?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return 'info';
  }
}

/**
 * A small structured logger that writes one JSON object per line.
 *
 * ENTRY FORMAT: `timestamp` (ISO 8601), `level`, `message`, `context`, then
 * the call's data merged at the top level. Log aggregators can query any of
 * these fields directly.
 *
 * REQUEST SCOPE: Each request gets its own instance through `withContext()`,
 * so entries from one request share its request ID without any shared state.
 *
 * LEVEL FILTERING: Entries below `level` (from `LOG_LEVEL`) are dropped
 * before they are serialized.
 */
export class Logger {
  /**
   * Contextual data attached to all log entries from this logger instance.
   */
  readonly context: Record<string, unknown>;

  constructor(
    readonly level: LogLevel = 'info',
    context: Record<string, unknown> = {},
  ) {
    this.context = context;
  }

  /**
   * Creates a new logger carrying the merged context. The receiver is left
   * untouched.
   */
  withContext(ctx: Record<string, unknown>): Logger {
    return new Logger(this.level, { ...this.context, ...ctx });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      ...data,
    };
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(logEntry));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }
}
