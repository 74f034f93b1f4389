/**
 * Leveled console logger for wifi-monitor
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

export function parseLogLevel(value: string | undefined, fallback: LogLevel = DEFAULT_LOG_LEVEL): LogLevel {
  if (!value) {
    return fallback;
  }
  const upper = value.toUpperCase();
  const match = LOG_LEVELS.find((level) => level === upper);
  return match ?? fallback;
}

export class Logger {
  private logLevel: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.logLevel = level;
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private serializeMeta(meta: Record<string, unknown>): Record<string, unknown> {
    const serialized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(meta)) {
      if (value instanceof Error) {
        serialized[key] = {
          name: value.name,
          message: value.message,
          stack: value.stack,
          ...(Object.prototype.hasOwnProperty.call(value, 'cause') ? { cause: value.cause } : {}),
        };
      } else {
        serialized[key] = value;
      }
    }

    return serialized;
  }

  private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const line = `[${new Date().toISOString()}] ${level}: ${message}`;
    return meta ? `${line} ${JSON.stringify(this.serializeMeta(meta))}` : line;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('DEBUG')) {
      // eslint-disable-next-line no-console
      console.log(this.formatMessage('DEBUG', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('INFO')) {
      // eslint-disable-next-line no-console
      console.log(this.formatMessage('INFO', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('WARN')) {
      // eslint-disable-next-line no-console
      console.warn(this.formatMessage('WARN', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('ERROR')) {
      // eslint-disable-next-line no-console
      console.error(this.formatMessage('ERROR', message, meta));
    }
  }
}

export const logger = new Logger();
