// Centralized logging utility
// Everything goes to stderr: stdout is reserved for the report
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

type LogMeta = Record<string, unknown>;

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.WARN): LogLevel {
  if (!value) return fallback;
  switch (value.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return fallback;
  }
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private formatMessage(level: string, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] [${level}] ${message}${metaStr}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.DEBUG) {
      console.error(this.formatMessage('DEBUG', message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.INFO) {
      console.error(this.formatMessage('INFO', message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.WARN) {
      console.error(this.formatMessage('WARN', message, meta));
    }
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (this.level <= LogLevel.ERROR) {
      const errorMeta = error instanceof Error
        ? { message: error.message, stack: error.stack, ...meta }
        : { error, ...meta };
      console.error(this.formatMessage('ERROR', message, errorMeta));
    }
  }
}

export const logger = new Logger();
