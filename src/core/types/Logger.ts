/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  /** Byte messages are written as given, without decoding */
  info(message: string | Uint8Array, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Anything a log line can be written to (process.stderr, a test buffer)
 */
export interface LogWriter {
  write(chunk: string | Uint8Array): unknown;
}

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string | Uint8Array, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {}
}

export interface ConsoleLoggerOptions {
  minLevel?: LogLevel;
  timestamps?: boolean;
  stream?: LogWriter;
  clock?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Format a date as `YYYY/MM/DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Console logger implementation
 *
 * Writes every level to one stream, stderr unless told otherwise. Info lines
 * carry no level tag so that tool output reads cleanly; timestamps can be
 * switched on after startup.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private levels = { debug: 0, info: 1, warn: 2, error: 3 };
  private timestamps: boolean;
  private stream: LogWriter;
  private clock: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.timestamps = options.timestamps ?? false;
    this.stream = options.stream ?? process.stderr;
    this.clock = options.clock ?? (() => new Date());
  }

  setTimestamps(enabled: boolean): void {
    this.timestamps = enabled;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.minLevel];
  }

  private formatContext(context?: Record<string, unknown>): string {
    return context ? ` ${JSON.stringify(context)}` : '';
  }

  private write(tag: string, message: string | Uint8Array, suffix = ''): void {
    const prefix = this.timestamps ? `${formatTimestamp(this.clock())} ` : '';
    if (typeof message === 'string') {
      this.stream.write(`${prefix}${tag}${message}${suffix}\n`);
      return;
    }
    this.stream.write(
      Buffer.concat([Buffer.from(`${prefix}${tag}`), message, Buffer.from(`${suffix}\n`)])
    );
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.write('[DEBUG] ', `${message}${this.formatContext(context)}`);
    }
  }

  info(message: string | Uint8Array, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.write('', message, this.formatContext(context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.write('[WARN] ', `${message}${this.formatContext(context)}`);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      const errorInfo = error ? ` - ${error.message}` : '';
      this.write('[ERROR] ', `${message}${errorInfo}${this.formatContext(context)}`);
      if (error?.stack && this.minLevel === 'debug') {
        this.stream.write(`${error.stack}\n`);
      }
    }
  }
}
