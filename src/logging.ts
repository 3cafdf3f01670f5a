/**
 * Logging
 *
 * Components take a Logger in their options; nothing logs through a
 * process-wide instance.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'off'];

export type LogFields = Record<string, unknown>;

export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Case-insensitive; accepts `warning` and `none` as aliases.
 * Returns undefined for anything else.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.trim().toLowerCase();
  if (lower === 'warning') return 'warn';
  if (lower === 'none') return 'off';
  return isLogLevel(lower) ? lower : undefined;
}

/**
 * Writes through `console`, prefixed with `[quill]`.
 * Messages below the configured level are dropped.
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(readonly level: LogLevel = 'info') {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  trace(message: string, fields?: LogFields): void {
    if (this.enabled('trace')) console.debug(format(message, fields));
  }

  debug(message: string, fields?: LogFields): void {
    if (this.enabled('debug')) console.debug(format(message, fields));
  }

  info(message: string, fields?: LogFields): void {
    if (this.enabled('info')) console.info(format(message, fields));
  }

  warn(message: string, fields?: LogFields): void {
    if (this.enabled('warn')) console.warn(format(message, fields));
  }

  error(message: string, fields?: LogFields): void {
    if (this.enabled('error')) console.error(format(message, fields));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}

export class NullLogger implements Logger {
  trace(_message: string, _fields?: LogFields): void {}
  debug(_message: string, _fields?: LogFields): void {}
  info(_message: string, _fields?: LogFields): void {}
  warn(_message: string, _fields?: LogFields): void {}
  error(_message: string, _fields?: LogFields): void {}
}

function format(message: string, fields?: LogFields): string {
  if (!fields || Object.keys(fields).length === 0) {
    return `[quill] ${message}`;
  }
  return `[quill] ${message} ${JSON.stringify(fields)}`;
}
