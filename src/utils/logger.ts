/**
 * Simple logger with optional file output
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from '../types/index.js';

const LOG_LEVEL_WEIGHTS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/**
 * Logging surface the other modules depend on
 */
export interface LoggerLike {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Logger implements LoggerLike {
  constructor(
    private level: LogLevel = 'INFO',
    private logFile?: string
  ) {
    if (logFile) {
      const dir = dirname(logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_WEIGHTS[level] >= LOG_LEVEL_WEIGHTS[this.level];
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.format(level, message);
    if (level === 'ERROR') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }

    if (this.logFile) {
      appendFileSync(this.logFile, formatted + '\n');
    }
  }

  debug(message: string): void {
    this.write('DEBUG', message);
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      this.write('ERROR', `${message}: ${describeError(error)}`);
      if (error instanceof Error && error.stack) {
        this.write('DEBUG', error.stack);
      }
    } else {
      this.write('ERROR', message);
    }
  }
}

export function createLogger(level: LogLevel, logFile?: string): Logger {
  return new Logger(level, logFile);
}
