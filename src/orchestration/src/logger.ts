/**
 * Logger module for tracking ingestion and retrieval runs
 * Logs to both console and file with timestamps and log levels
 *
 * LOG_LEVEL sets the lowest level written (default INFO).
 * LOG_DIR sets the log directory (default ./logs); an empty value disables the file.
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? LogLevel.INFO;
}

export class Logger {
  private logDirectory: string;
  private logFilePath: string | null = null;
  private logStream: fs.WriteStream | null = null;
  private minLevel: LogLevel;

  constructor(logDirectory: string = './logs', minLevel: LogLevel = LogLevel.INFO) {
    this.logDirectory = logDirectory;
    this.minLevel = minLevel;
  }

  /**
   * The file is opened on the first line that passes the level filter
   */
  private stream(): fs.WriteStream | null {
    if (!this.logDirectory) {
      return null;
    }

    if (!this.logStream) {
      if (!fs.existsSync(this.logDirectory)) {
        fs.mkdirSync(this.logDirectory, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(this.logDirectory, `guideline-rag-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
    }

    return this.logStream;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /**
   * Main logging method
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}`;
    const file = this.stream();

    file?.write(logMessage + '\n');

    if (data !== undefined) {
      const dataString = typeof data === 'object'
        ? JSON.stringify(data, null, 2)
        : String(data);
      file?.write(`  Data: ${dataString}\n`);
    }

    console.log(`[${level}] ${message}`);

    if (data !== undefined) {
      console.log('  Data:', data);
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
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

  /**
   * Log errors, with the stack trace going to the file only
   */
  error(message: string, error?: unknown): void {
    const detail = error instanceof Error ? error.message : error;
    this.log(LogLevel.ERROR, message, detail);

    if (error instanceof Error && error.stack && this.enabled(LogLevel.ERROR)) {
      this.stream()?.write(`  Stack: ${error.stack}\n`);
    }
  }

  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log separator line for readability
   */
  separator(char: string = '=', length: number = 80): void {
    if (!this.enabled(LogLevel.INFO)) {
      return;
    }
    const line = char.repeat(length);
    this.stream()?.write(line + '\n');
    console.log(line);
  }

  /**
   * Log section header
   */
  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  close(): void {
    this.logStream?.end();
    this.logStream = null;
  }

  getLogFilePath(): string | null {
    return this.logFilePath;
  }
}

// Export singleton instance
export const logger = new Logger(
  process.env.LOG_DIR ?? './logs',
  parseLevel(process.env.LOG_LEVEL)
);
