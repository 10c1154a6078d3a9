/**
 * Logger Module
 *
 * Levelled, component-tagged logging. Without a log directory every entry
 * goes to stderr, since stdout carries the rebuilt source text. With a log
 * directory, entries are appended to a size-rotated file instead.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  /** Suppress console output (file output is unaffected) */
  setSilentConsole(silent: boolean): void;
}

export interface LoggerConfig {
  /** Log directory path (defaults to console if not provided) */
  logDir?: string;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize?: number;
  /** Maximum number of rotated log files to keep (default: 3) */
  maxFiles?: number;
  /** Initial log level (default: INFO) */
  level?: LogLevel;
  /** Log file name (default: comment-speller.log) */
  fileName?: string;
}

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_FILES = 3;
const DEFAULT_LOG_FILE_NAME = 'comment-speller.log';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

/**
 * File-based logger implementation with rotation support
 */
class FileLogger implements Logger {
  private level: LogLevel;
  private logDir: string | null;
  private maxFileSize: number;
  private maxFiles: number;
  private fileName: string;
  private silentConsole: boolean;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.logDir = config.logDir ?? null;
    this.maxFileSize = config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFiles = config.maxFiles ?? DEFAULT_MAX_FILES;
    this.fileName = config.fileName ?? DEFAULT_LOG_FILE_NAME;
    this.silentConsole = false;

    if (this.logDir) {
      this.initializeLogDir();
    }
  }

  private initializeLogDir(): void {
    if (!this.logDir) return;

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      // Fall back to console logging if directory creation fails
      process.stderr.write(
        `[Logger] Failed to create log directory: ${this.logDir}: ${String(err)}\n`
      );
      this.logDir = null;
    }
  }

  private getLogFilePath(): string | null {
    if (!this.logDir) return null;
    return path.join(this.logDir, this.fileName);
  }

  private getRotatedFilePath(index: number): string {
    if (!this.logDir) throw new Error('No log directory configured');
    const baseName = path.basename(this.fileName, '.log');
    return path.join(this.logDir, `${baseName}.${index}.log`);
  }

  /**
   * Rotate log files when size limit is exceeded
   */
  private rotateLogsIfNeeded(logFilePath: string): void {
    if (!fs.existsSync(logFilePath)) return;

    const stats = fs.statSync(logFilePath);
    if (stats.size < this.maxFileSize) return;

    const oldestFile = this.getRotatedFilePath(this.maxFiles - 1);
    if (fs.existsSync(oldestFile)) {
      fs.unlinkSync(oldestFile);
    }

    for (let i = this.maxFiles - 2; i >= 0; i--) {
      const currentFile = i === 0 ? logFilePath : this.getRotatedFilePath(i);
      const nextFile = this.getRotatedFilePath(i + 1);
      if (fs.existsSync(currentFile)) {
        fs.renameSync(currentFile, nextFile);
      }
    }
  }

  /**
   * Format a log entry with timestamp, level, component, and message
   */
  private formatLogEntry(
    level: LogLevel,
    component: string,
    message: string,
    meta?: object
  ): string {
    const timestamp = new Date().toISOString();
    const levelName = LEVEL_NAMES[level];
    let formattedMessage = `[${timestamp}] [${levelName}] [${component}] ${message}`;

    if (meta && Object.keys(meta).length > 0) {
      formattedMessage += ` ${JSON.stringify(meta)}`;
    }

    return formattedMessage;
  }

  private writeLog(
    level: LogLevel,
    component: string,
    message: string,
    meta?: object
  ): void {
    if (level > this.level) return;

    const logEntry = this.formatLogEntry(level, component, message, meta);
    const logFilePath = this.getLogFilePath();

    if (!logFilePath) {
      this.writeToConsole(logEntry);
      return;
    }

    // Synchronous so a CLI that exits right after a failure keeps its last entries
    try {
      this.rotateLogsIfNeeded(logFilePath);
      fs.appendFileSync(logFilePath, logEntry + '\n');
    } catch (err) {
      process.stderr.write(`[Logger] Failed to write to log file: ${String(err)}\n`);
      this.writeToConsole(logEntry);
    }
  }

  private writeToConsole(message: string): void {
    if (this.silentConsole) return;
    // stderr for every level: stdout is reserved for program output
    console.error(message);
  }

  error(component: string, message: string, meta?: object): void {
    this.writeLog(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.writeLog(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.writeLog(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.writeLog(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSilentConsole(silent: boolean): void {
    this.silentConsole = silent;
  }
}

// Singleton logger instance
let loggerInstance: FileLogger | null = null;

/**
 * Get log level from environment variables
 * Supports DEBUG=1, DEBUG=true, COMMENT_SPELLER_DEBUG=1, or LOG_LEVEL=debug
 */
function getLogLevelFromEnv(): LogLevel {
  const debug = process.env.DEBUG || process.env.COMMENT_SPELLER_DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = process.env.LOG_LEVEL || process.env.COMMENT_SPELLER_LOG_LEVEL;
  if (logLevel) {
    return parseLogLevel(logLevel);
  }

  return LogLevel.WARN;
}

/**
 * Create a new file logger writing into logDir, replacing the singleton
 * @param logDir Directory for comment-speller.log and its rotations
 * @param config Additional configuration options
 */
export function createLogger(
  logDir: string,
  config: Omit<LoggerConfig, 'logDir'> = {}
): Logger {
  loggerInstance = new FileLogger({
    level: getLogLevelFromEnv(),
    ...config,
    logDir,
  });
  return loggerInstance;
}

/**
 * Get the existing logger instance, or create a console-only logger if none exists
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    const level = getLogLevelFromEnv();
    loggerInstance = new FileLogger({ level });

    if (level === LogLevel.DEBUG) {
      loggerInstance.debug('logger', 'Debug logging enabled via environment variable');
    }
  }
  return loggerInstance;
}

/**
 * Reset the logger instance (mainly for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Default directory for file logs: ~/.comment-speller/logs/
 */
export function getDefaultLogDir(): string {
  return path.join(os.homedir(), '.comment-speller', 'logs');
}

/**
 * Parse a log level string to LogLevel enum
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.toUpperCase();
  switch (normalized) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
