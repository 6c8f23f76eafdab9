/**
 * Structured logging utility for collection tasks
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * One logger is built per process at startup and passed by reference into
 * fetch and task functions.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly sink?: LogSink;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export class Logger {
  private readonly config: LoggerConfig;
  private readonly sink: LogSink;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.sink = config.sink ?? consoleSink;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink(level, this.formatMessage(level, message, metadata));
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Logger for a sub-module sharing level, format and sink
   */
  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

/**
 * Create a logger, reading LOG_LEVEL and LOG_FORMAT for anything not given
 */
export function createLogger(options: Partial<LoggerConfig> & { module?: string } = {}): Logger {
  const service = options.module ? `collection-task:${options.module}` : 'collection-task';
  return new Logger({
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
    service: options.service ?? service,
    pretty: options.pretty ?? process.env.LOG_FORMAT !== 'json',
    sink: options.sink,
  });
}

/**
 * Logger that discards everything (library default when none is injected)
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', service: 'collection-task', pretty: true, sink: () => {} });
}
