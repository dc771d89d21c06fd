/**
 * Monitor logging
 * Structured, leveled console logging with per-module sub-loggers
 */

import chalk from 'chalk';
import { LogLevelName } from '../types';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  /** Task the entry belongs to, when there is one */
  taskId?: string;
  timestamp: Date;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  consoleOutput?: boolean;
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.bgRed.white
};

export class MonitorLogger {
  private options: Required<LoggerOptions>;
  /** Sub-loggers follow their parent's level until given one of their own */
  private readonly parent: MonitorLogger | null;
  private ownLevel: boolean;

  constructor(options: LoggerOptions = {}, parent: MonitorLogger | null = null) {
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      moduleName: 'monitor',
      ...options
    };
    this.parent = parent;
    this.ownLevel = parent === null || options.minLevel !== undefined;
  }

  debug(message: string, data?: Record<string, unknown>, taskId?: string): void {
    this.log(LogLevel.DEBUG, message, data, taskId);
  }

  info(message: string, data?: Record<string, unknown>, taskId?: string): void {
    this.log(LogLevel.INFO, message, data, taskId);
  }

  warn(message: string, data?: Record<string, unknown>, taskId?: string): void {
    this.log(LogLevel.WARN, message, data, taskId);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>, taskId?: string): void {
    this.log(LogLevel.ERROR, message, data, taskId, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>, taskId?: string): void {
    this.log(LogLevel.FATAL, message, data, taskId, error);
  }

  /**
   * Change the minimum level of this logger
   */
  setLevel(level: LogLevel | LogLevelName): void {
    this.options.minLevel = toLogLevel(level);
    this.ownLevel = true;
  }

  getLevel(): LogLevel {
    if (!this.ownLevel && this.parent) {
      return this.parent.getLevel();
    }
    return this.options.minLevel;
  }

  /**
   * Create a logger for a sub-module; it shares this logger's output and level
   */
  createSubLogger(moduleName: string): MonitorLogger {
    return new MonitorLogger({
      consoleOutput: this.options.consoleOutput,
      moduleName: `${this.options.moduleName}.${moduleName}`
    }, this);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    taskId?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.options.moduleName,
      taskId,
      timestamp: new Date(),
      data,
      error
    };

    if (this.options.consoleOutput) {
      this.writeToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
  }

  private writeToConsole(entry: LogEntry): void {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = LEVEL_COLORS[entry.level](entry.level.toUpperCase().padEnd(5));
    const taskStr = entry.taskId ? ` [task:${entry.taskId}]` : '';

    let logMessage = `${timestamp} ${levelStr} [${entry.module}]${taskStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack && entry.level === LogLevel.FATAL) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += ` ${JSON.stringify(entry.data)}`;
    }

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }
}

export function toLogLevel(level: LogLevel | LogLevelName): LogLevel {
  switch (level) {
    case LogLevel.DEBUG:
    case 'debug':
      return LogLevel.DEBUG;
    case LogLevel.WARN:
    case 'warn':
      return LogLevel.WARN;
    case LogLevel.ERROR:
    case 'error':
      return LogLevel.ERROR;
    case LogLevel.FATAL:
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Root logger of the process
 */
export const defaultLogger = new MonitorLogger();

export function createFetcherLogger(): MonitorLogger {
  return defaultLogger.createSubLogger('fetcher');
}

export function createSchedulerLogger(): MonitorLogger {
  return defaultLogger.createSubLogger('scheduler');
}

export function createNotificationLogger(): MonitorLogger {
  return defaultLogger.createSubLogger('notification');
}

export function createStoreLogger(): MonitorLogger {
  return defaultLogger.createSubLogger('store');
}

export function createConfigLogger(): MonitorLogger {
  return defaultLogger.createSubLogger('config');
}
