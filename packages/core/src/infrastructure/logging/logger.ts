/**
 * Structured console logger.
 *
 * JSON lines when `pretty` is off, `[time] LEVEL: message {meta}` otherwise.
 * The level defaults to `LOG_LEVEL` (debug | info | warn | error, default info).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

/** Where formatted lines go. Defaults to the console methods of the same level. */
export type LogSink = (level: LogLevel, line: string) => void;

const LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

export class Logger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly sink: LogSink = consoleSink,
  ) {}

  get level(): LogLevel {
    return this.config.level;
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

  /** A logger writing to the same sink under `service:scope`. */
  child(scope: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${scope}` }, this.sink);
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVELS[level] < LEVELS[this.config.level]) return;
    this.sink(level, this.format(level, message, metadata));
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
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
}

/** Parse a log level name, or `undefined` when it is not one. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

export function createLogger(options?: Partial<LoggerConfig>, sink?: LogSink): Logger {
  return new Logger(
    {
      level: options?.level ?? parseLogLevel(process.env['LOG_LEVEL']) ?? 'info',
      service: options?.service ?? 'dumpshift',
      pretty: options?.pretty ?? process.env['NODE_ENV'] !== 'production',
    },
    sink,
  );
}
