/**
 * Structured logger
 * One JSON object per line on the console, with optional persistent context.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export type LogContext = {
  orderId?: string;
  customerId?: string;
  [key: string]: unknown;
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find(level => level === upper) ?? LogLevel.INFO;
}

export class Logger {
  constructor(
    private readonly logLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
    private readonly context: LogContext = {}
  ) {}

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = error instanceof Error
      ? {name: error.name, message: error.message, stack: error.stack, ...data}
      : {error, ...data};
    this.log(LogLevel.ERROR, message, errorData);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.logLevel, {...this.context, ...context});
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const line = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...(data === undefined ? {} : {data}),
    });

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
        console.error(line);
        break;
    }
  }
}

export const logger = new Logger();
