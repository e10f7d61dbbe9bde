/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('TimelineCompiler');
 *   log.debug('Details here', { data });
 *   log.info('Operation complete');
 *   log.warn('Something unexpected');
 *   log.error('Failed', error);
 */

import { config, type LogLevelName } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

interface LoggerConfig {
  level: LogLevel;
  prefix: string;
}

/** Root level shared by every logger that has not overridden its own */
let rootLevel: LogLevel = LEVELS_BY_NAME[config.logLevel];

export class Logger {
  private config: { level?: LogLevel; prefix: string };

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      prefix: '',
      ...config,
    };
  }

  private get level(): LogLevel {
    return this.config.level ?? rootLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
    });
  }

  /**
   * Set the log level of this logger at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

/**
 * Set the level used by every logger without its own override
 */
export function setRootLogLevel(level: LogLevel | LogLevelName): void {
  rootLevel = typeof level === 'string' ? LEVELS_BY_NAME[level] : level;
}

// Root logger instance
const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('FrameSchedule');
 * log.debug('Sampling scene', { fps });
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
