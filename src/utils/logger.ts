/**
 * Logger Utility
 *
 * Structured logging for the collector. The minimum level is chosen by the
 * caller and passed in, so no stage reads ambient verbosity settings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface LoggerOptions {
  serviceName?: string;
  minLevel?: LogLevel;
  sink?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly serviceName: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.serviceName = options.serviceName ?? 'eventlog-digest';
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? stderrSink;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      service: this.serviceName,
    });
  }

  private log(level: LogEntry['level'], message: string, context?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    };

    this.sink(this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>) {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }
}

export class ChildLogger {
  private parent: Logger | ChildLogger;
  private baseContext: Record<string, unknown>;

  constructor(parent: Logger | ChildLogger, context: Record<string, unknown>) {
    this.parent = parent;
    this.baseContext = context;
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.parent.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>) {
    this.parent.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.parent.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, context?: Record<string, unknown>) {
    this.parent.error(message, { ...this.baseContext, ...context });
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }
}

/** Anything that accepts log calls */
export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/** Logger that drops everything */
export const silentLogger = new Logger({ minLevel: 'silent' });
