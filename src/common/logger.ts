import { Writable } from 'node:stream';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export const LOG_FORMATS = ['text', 'json'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
  }
  return level;
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const format = LOG_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new Error(`Unsupported log format "${value}". Use text or json.`);
  }
  return format;
}

function formatScope(scope?: string): string {
  return scope ? `[${scope}] ` : '';
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.destination = options.destination ?? process.stderr;
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      destination: this.destination,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  configure(options: Omit<LoggerOptions, 'scope'>): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.format) {
      this.format = options.format;
    }
    if (options.destination) {
      this.destination = options.destination;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...metadata,
      };
      this.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const strMetadata = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    this.destination.write(`${timestamp} ${level.toUpperCase()} ${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const rootLogger = new Logger();
const scopedLoggers = new Map<string, Logger>();

/**
 * Scoped loggers are cached so that `configureLogger` reaches loggers handed
 * out before it ran.
 */
export function getLogger(scope?: string): Logger {
  if (!scope) {
    return rootLogger;
  }
  let logger = scopedLoggers.get(scope);
  if (!logger) {
    logger = rootLogger.child(scope);
    scopedLoggers.set(scope, logger);
  }
  return logger;
}

export function configureLogger(options: Omit<LoggerOptions, 'scope'>): void {
  rootLogger.configure(options);
  for (const logger of scopedLoggers.values()) {
    logger.configure(options);
  }
}
