export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

let configuredLevel: LogLevel | null = null;

/**
 * Threshold for every extractor logger; null goes back to reading LOG_LEVEL on each call
 */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function currentThreshold(): number {
  if (configuredLevel) return LEVEL_RANK[configuredLevel];
  const level = process.env.LOG_LEVEL;
  return LEVEL_RANK[level && isLogLevel(level) ? level : 'info'];
}

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

/**
 * Console logger with a fixed prefix per concern; silent under NODE_ENV=test unless enabled explicitly
 */
class ExtractorLogger {
  private readonly prefix: string;
  private readonly enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Extractor]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
  }

  private shouldLog(level: LogLevel): boolean {
    return this.enabled && LEVEL_RANK[level] >= currentThreshold();
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) console.debug(this.formatMessage('debug', message));
  }

  info(message: string): void {
    if (this.shouldLog('info')) console.info(this.formatMessage('info', message));
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) console.warn(this.formatMessage('warn', message));
  }

  error(message: string, error?: Error): void {
    if (this.shouldLog('error')) console.error(this.formatMessage('error', message), error?.stack || '');
  }
}

export const acquireLogger = new ExtractorLogger({ prefix: '[Acquire]' });
export const dynamicLogger = new ExtractorLogger({ prefix: '[Dynamic]' });
export const staticLogger = new ExtractorLogger({ prefix: '[Static]' });
export const extractLogger = new ExtractorLogger({ prefix: '[Extract]' });
export const linksLogger = new ExtractorLogger({ prefix: '[Links]' });

export function createLogger(prefix: string, enabled?: boolean): ExtractorLogger {
  return new ExtractorLogger({ prefix, enabled });
}

export { ExtractorLogger };
