/**
 * Structured logging for the ingestion services.
 *
 * Emits one line per entry: JSON in production, a readable line otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('debug')) return;
    console.debug(this.format('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('info')) return;
    console.info(this.format('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('warn')) return;
    console.warn(this.format('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('error')) return;
    console.error(this.format('error', message, metadata));
  }

  /**
   * Logger for a sub-module, sharing level and output format
   */
  child(module: string, overrides: Partial<LoggerConfig> = {}): Logger {
    return new Logger({
      ...this.config,
      service: `${this.config.service}:${module}`,
      ...overrides
    });
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {})
    });
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
    return level;
  }
  return fallback;
}

export function createLogger(options: Partial<LoggerConfig> = {}): Logger {
  return new Logger({
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
    service: options.service ?? 'rollcall',
    pretty: options.pretty ?? process.env.NODE_ENV !== 'production'
  });
}

const logger = createLogger();

export default logger;
