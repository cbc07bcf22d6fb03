/**
 * Logger Module
 *
 * Leveled logger used by every component. Lines look like
 * `[timestamp] [LEVEL] [component] message {meta}` and go to the console,
 * or to a rotating log file when a log directory is configured.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

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
  /** Log directory path (console only when omitted) */
  logDir?: string;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize?: number;
  /** Number of rotated files to keep (default: 3) */
  maxFiles?: number;
  /** Initial log level (default: INFO) */
  level?: LogLevel;
  /** Log file name (default: docs-vector-sync.log) */
  fileName?: string;
}

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_FILES = 3;
export const DEFAULT_LOG_FILE_NAME = 'docs-vector-sync.log';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

/**
 * Console/file logger with size-based rotation
 */
class FileLogger implements Logger {
  private level: LogLevel;
  private logDir: string | null;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;
  private readonly fileName: string;
  private writeQueue: Promise<void> = Promise.resolve();
  private silentConsole = false;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.logDir = config.logDir ?? null;
    this.maxFileSize = config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFiles = config.maxFiles ?? DEFAULT_MAX_FILES;
    this.fileName = config.fileName ?? DEFAULT_LOG_FILE_NAME;

    if (this.logDir) {
      this.initializeLogDir(this.logDir);
    }
  }

  private initializeLogDir(logDir: string): void {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (err) {
      console.error(`[Logger] Failed to create log directory: ${logDir}`, err);
      this.logDir = null;
    }
  }

  private getLogFilePath(): string | null {
    if (!this.logDir) return null;
    return path.join(this.logDir, this.fileName);
  }

  private getRotatedFilePath(logDir: string, index: number): string {
    const baseName = path.basename(this.fileName, '.log');
    return path.join(logDir, `${baseName}.${index}.log`);
  }

  /**
   * Shift `name.log -> name.1.log -> name.2.log ...` once the active file
   * reaches the size limit
   */
  private rotateLogsIfNeeded(logDir: string, logFilePath: string): void {
    try {
      if (!fs.existsSync(logFilePath)) return;
      if (fs.statSync(logFilePath).size < this.maxFileSize) return;

      const oldestFile = this.getRotatedFilePath(logDir, this.maxFiles - 1);
      if (fs.existsSync(oldestFile)) {
        fs.unlinkSync(oldestFile);
      }

      for (let i = this.maxFiles - 2; i >= 0; i--) {
        const currentFile = i === 0 ? logFilePath : this.getRotatedFilePath(logDir, i);
        if (fs.existsSync(currentFile)) {
          fs.renameSync(currentFile, this.getRotatedFilePath(logDir, i + 1));
        }
      }
    } catch (err) {
      console.error('[Logger] Failed to rotate log files:', err);
    }
  }

  private formatLogEntry(
    level: LogLevel,
    component: string,
    message: string,
    meta?: object
  ): string {
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${LEVEL_NAMES[level]}] [${component}] ${message}`;

    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }

    return line;
  }

  private writeLog(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) return;

    const entry = this.formatLogEntry(level, component, message, meta);
    const logDir = this.logDir;
    const logFilePath = this.getLogFilePath();

    if (!logDir || !logFilePath) {
      this.writeToConsole(level, entry);
      return;
    }

    // Queued so lines land in order even when callers interleave
    this.writeQueue = this.writeQueue.then(() => {
      try {
        this.rotateLogsIfNeeded(logDir, logFilePath);
        fs.appendFileSync(logFilePath, entry + '\n');
      } catch (err) {
        console.error('[Logger] Failed to write to log file:', err);
        this.writeToConsole(level, entry);
      }
    });
  }

  private writeToConsole(level: LogLevel, line: string): void {
    if (this.silentConsole) return;

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.DEBUG:
        console.debug(line);
        break;
    }
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

  /**
   * Resolves once every queued file write has been flushed
   */
  flush(): Promise<void> {
    return this.writeQueue;
  }
}

let loggerInstance: FileLogger | null = null;

/**
 * Read the log level from the environment.
 * DEBUG=1 / DEBUG=true win over LOG_LEVEL.
 */
function getLogLevelFromEnv(): LogLevel {
  const debug = process.env.DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel) {
    return parseLogLevel(logLevel);
  }

  return LogLevel.INFO;
}

/**
 * Replace the process-wide logger with one writing to `logDir`
 */
export function createLogger(
  logDir: string,
  config: Omit<LoggerConfig, 'logDir'> = {}
): Logger {
  loggerInstance = new FileLogger({ level: getLogLevelFromEnv(), ...config, logDir });
  return loggerInstance;
}

/**
 * Get the process-wide logger, creating a console logger on first use.
 * Respects DEBUG and LOG_LEVEL.
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
 * Wait for pending file writes. Used before the process exits.
 */
export async function flushLogger(): Promise<void> {
  if (loggerInstance) {
    await loggerInstance.flush();
  }
}

/**
 * Reset the logger instance (mainly for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
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
