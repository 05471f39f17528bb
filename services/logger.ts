/**
 * Logging Service
 *
 * Centralized logging with:
 * - Log levels (debug, info, warn, error)
 * - Contextual prefixes
 * - Environment-aware output (verbose in dev, minimal in prod)
 * - LOG_LEVEL override for tests and deployments
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  context: string;
  message: string;
  data?: unknown;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private callbacks: LogCallback[] = [];

  constructor(context: string = 'App', level?: LogLevel) {
    this.context = context;
    this.level = level ?? this.getDefaultLevel();
  }

  private getDefaultLevel(): LogLevel {
    const fromEnv = parseLogLevel(process.env.LOG_LEVEL);
    if (fromEnv !== undefined) return fromEnv;
    // In production, only show warnings and errors
    return process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      context: this.context,
      message,
      data,
    };

    // Notify callbacks (for external logging services)
    this.callbacks.forEach(cb => cb(entry));

    const prefix = `[${this.context}]`;
    const args = data !== undefined ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      case LogLevel.INFO:
        console.info(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.ERROR:
        console.error(...args);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /** Create a child logger with a sub-context */
  child(subContext: string): Logger {
    const child = new Logger(`${this.context}:${subContext}`, this.level);
    this.callbacks.forEach(cb => child.addCallback(cb));
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Add a callback for external logging services */
  addCallback(callback: LogCallback): void {
    this.callbacks.push(callback);
  }

  removeCallback(callback: LogCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index > -1) {
      this.callbacks.splice(index, 1);
    }
  }
}

// Factory function to create loggers with different contexts
export function createLogger(context: string): Logger {
  return new Logger(context);
}

// Pre-configured loggers for common contexts
export const serverLogger = new Logger('Server');
export const pipelineLogger = new Logger('Pipeline');
export const providerLogger = new Logger('Provider');
