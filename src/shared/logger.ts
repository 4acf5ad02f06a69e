/**
 * Structured logging
 *
 * JSON lines in production, one readable line per entry otherwise.
 * Tests run silent unless LOG_LEVEL asks for output.
 */

import { config } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel | 'silent' = config.logLevel,
    private readonly json: boolean = config.isProduction
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private output(entry: LogEntry): void {
    const write = entry.level === 'error' || entry.level === 'warn' ? console.error : console.log;

    if (this.json) {
      write(JSON.stringify({ ...entry, app: 'wiki' }));
      return;
    }

    let line = `[${entry.level.toUpperCase()}] ${entry.timestamp} [${entry.component}] ${entry.message}`;
    if (entry.context) {
      line += ` ${JSON.stringify(entry.context)}`;
    }
    if (entry.error) {
      line += ` (${entry.error.name}: ${entry.error.message})`;
    }
    write(line);

    if (entry.error?.stack && entry.level === 'error') {
      write(entry.error.stack);
    }
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    this.output(entry);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log('warn', message, context, error);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log('error', message, context, error);
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
