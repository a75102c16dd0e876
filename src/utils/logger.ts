/**
 * Logger utility for structured logging throughout the save editor
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Verbosity = 'quiet' | 'info' | 'debug';

export type LogFormat = 'pretty' | 'json';

export const VERBOSITY_LEVELS: readonly Verbosity[] = ['quiet', 'info', 'debug'];

export interface LogContext {
  component?: string;
  slot?: number;
  [key: string]: unknown;
}

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

export interface LoggerOptions {
  verbosity?: Verbosity;
  format?: LogFormat;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const VERBOSITY_THRESHOLD: Record<Verbosity, number> = {
  quiet: LEVEL_RANK.warn,
  info: LEVEL_RANK.info,
  debug: LEVEL_RANK.debug
};

export const consoleSink: LogSink = {
  write(level: LogLevel, line: string): void {
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
};

export function isVerbosity(value: string): value is Verbosity {
  return VERBOSITY_LEVELS.some(level => level === value);
}

export class Logger {
  private readonly context: LogContext;
  private readonly verbosity: Verbosity;
  private readonly format: LogFormat;
  private readonly sink: LogSink;

  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.verbosity = options.verbosity ?? 'quiet';
    this.format = options.format ?? 'pretty';
    this.sink = options.sink ?? consoleSink;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger(
      { ...this.context, ...additionalContext },
      { verbosity: this.verbosity, format: this.format, sink: this.sink }
    );
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= VERBOSITY_THRESHOLD[this.verbosity];
  }

  debug(message: string, context: LogContext = {}): void {
    this.log('debug', message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log('info', message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log('warn', message, context);
  }

  error(message: string, context: LogContext = {}): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const mergedContext = { ...this.context, ...context };

    this.sink.write(level, this.formatLogEntry(timestamp, level, message, mergedContext));
  }

  private formatLogEntry(timestamp: string, level: LogLevel, message: string, context: LogContext): string {
    if (this.format === 'json') {
      return JSON.stringify({ timestamp, level: level.toUpperCase(), message, ...context });
    }

    const contextStr = Object.keys(context).length > 0
      ? ` ${JSON.stringify(context)}`
      : '';

    return `[${timestamp}] ${level.toUpperCase()}: ${message}${contextStr}`;
  }
}

// Helper function to create the root logger for one CLI run
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  return new Logger({ component }, options);
}
