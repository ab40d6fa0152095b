/**
 * Structured logging for Geoportal
 *
 * One line per event: JSON in production, a readable single line otherwise.
 * Loggers carry bound fields (module, scratch id, request id) that are merged
 * into every line they write; `child()` adds more.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Receives finished lines; the default writes to the console method of the level
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly service: string;
  readonly format: LogFormat;
  readonly bindings?: LogMetadata;
  readonly sink?: LogSink;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const consoleSink: LogSink = (level, line) => {
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
  private readonly bindings: LogMetadata;
  private readonly sink: LogSink;

  constructor(private readonly options: LoggerOptions) {
    this.bindings = options.bindings ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  get service(): string {
    return this.options.service;
  }

  get level(): LogLevel {
    return this.options.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.options.level];
  }

  /**
   * Logger writing the same service with extra bound fields
   */
  child(bindings: LogMetadata): Logger {
    return new Logger({ ...this.options, bindings: { ...this.bindings, ...bindings } });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink(level, this.render(level, message, { ...this.bindings, ...metadata }));
  }

  private render(level: LogLevel, message: string, fields: LogMetadata): string {
    const timestamp = new Date().toISOString();

    if (this.options.format === 'json') {
      return JSON.stringify({ timestamp, level, service: this.options.service, message, ...fields });
    }

    const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    return `[${timestamp}] ${level.toUpperCase()} ${this.options.service}: ${message}${extra}`;
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.trim().toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : undefined;
}

function envOptions(service: string): LoggerOptions {
  return {
    level: parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
    service,
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  };
}

export const logger = new Logger(envOptions('geoportal'));

/**
 * Logger for one module, named `geoportal:<module>`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(envOptions(`geoportal:${context.module}`));
}
