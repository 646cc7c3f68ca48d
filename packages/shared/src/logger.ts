export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  debug(...args: unknown[]): void;
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Console logger with a bracketed component prefix, e.g. `[station:703] Connected`.
 * Child loggers share the parent's level and sink.
 */
export class Logger {
  constructor(
    readonly tag: string,
    readonly level: LogLevel = 'info',
    private readonly sink: LogSink = console,
  ) {}

  child(tag: string): Logger {
    return new Logger(tag, this.level, this.sink);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) this.sink.debug(`[${this.tag}] ${message}`, ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) this.sink.log(`[${this.tag}] ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) this.sink.warn(`[${this.tag}] ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) this.sink.error(`[${this.tag}] ${message}`, ...details);
  }
}
