/**
 * Console logger with a namespace prefix.
 * Debug lines are only printed when NODE_ENV=development.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

class ConsoleLogger implements Logger {
  constructor(private namespace: string) {}

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.namespace}] ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.NODE_ENV === 'development') {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    console.log(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      console.error(this.formatMessage('error', message, { error: error.message, stack: error.stack }));
    } else if (error !== undefined) {
      console.error(this.formatMessage('error', message, { error }));
    } else {
      console.error(this.formatMessage('error', message));
    }
  }
}

export function createLogger(namespace: string): Logger {
  return new ConsoleLogger(namespace);
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
