// Date/Time utilities using Luxon
import { DateTime } from 'luxon';

const DEFAULT_TIMEZONE = 'UTC';

function resolveTimezone(): string {
  return process.env.QS_TIMEZONE || DEFAULT_TIMEZONE;
}

/**
 * Get current time in the configured timezone (QS_TIMEZONE, defaults to UTC)
 */
export function getNow(timezone: string = resolveTimezone()): DateTime {
  return DateTime.now().setZone(timezone);
}

/**
 * Parse an ISO date or datetime as UTC and return epoch milliseconds.
 * Throws ConfigurationError for unparseable input.
 */
export function parseUtcDate(value: string): number {
  const parsed = DateTime.fromISO(value.trim(), { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ConfigurationError(`Invalid date "${value}": ${parsed.invalidExplanation ?? parsed.invalidReason}`);
  }
  return parsed.toMillis();
}

/**
 * Epoch milliseconds from a Date, an epoch number, or an ISO / SQL timestamp string.
 * Strings without an offset are read as UTC. NaN when unparseable.
 */
export function toUtcMillis(value: unknown): number {
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value !== 'string') {
    return NaN;
  }
  const text = value.trim();
  let parsed = DateTime.fromISO(text, { zone: 'utc' });
  if (!parsed.isValid) {
    parsed = DateTime.fromSQL(text, { zone: 'utc' });
  }
  return parsed.isValid ? parsed.toMillis() : NaN;
}

/**
 * Format epoch milliseconds as YYYY-MM-DD (UTC)
 */
export function formatUtcDate(epochMs: number): string {
  return DateTime.fromMillis(epochMs, { zone: 'utc' }).toFormat('yyyy-MM-dd');
}

/**
 * Format epoch milliseconds as a full ISO timestamp (UTC)
 */
export function formatUtcTimestamp(epochMs: number): string {
  return DateTime.fromMillis(epochMs, { zone: 'utc' }).toISO() ?? new Date(epochMs).toISOString();
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message };
  }
  return arg;
}

/**
 * Logger utility
 */
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const timestamp = getNow().toISO();
    const argsStr = args.length > 0 ? ` ${JSON.stringify(args.map(serializeArg))}` : '';
    return `[${timestamp}] [${level}] [${this.context}] ${message}${argsStr}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel()];
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('INFO', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.formatMessage('ERROR', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('WARN', message, ...args));
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG === 'true' && this.enabled('debug')) {
      console.debug(this.formatMessage('DEBUG', message, ...args));
    }
  }
}

/**
 * Custom error classes
 */
export class QuantSweepError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'QuantSweepError';
  }
}

/**
 * Invalid invocation or settings. Aborts the whole run before any computation.
 */
export class ConfigurationError extends QuantSweepError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Unusable price data for one evaluation (too short, malformed, out of order).
 */
export class DataError extends QuantSweepError {
  constructor(message: string) {
    super(message, 'DATA_ERROR');
    this.name = 'DataError';
  }
}

/**
 * Raised when a filter produces unusable output. Never escapes the signal pipeline.
 */
export class FilterDegradationError extends QuantSweepError {
  constructor(message: string, public filterName: string) {
    super(message, 'FILTER_DEGRADATION');
    this.name = 'FilterDegradationError';
  }
}

export class ValidationError extends QuantSweepError {
  constructor(message: string, public field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
