/**
 * Logging utility with levels and colors
 */

import { appendFileSync } from 'fs';
import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger class with configurable levels
 */
class Logger {
  private level: LogLevel = 'info';
  private quiet = false;
  private logFile?: string;

  /**
   * Set log level
   */
  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Set quiet mode
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Also append warnings and errors to a file; undefined disables it
   */
  setLogFile(path: string | undefined) {
    this.logFile = path;
  }

  /**
   * Check if level should be logged
   */
  private shouldLog(level: LogLevel): boolean {
    if (this.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  private writeFile(level: LogLevel, message: string, args: unknown[]) {
    if (!this.logFile || LEVELS[level] < LEVELS.warn) {
      return;
    }

    const extra = args.map((a) => (a instanceof Error ? a.message : String(a))).join(' ');
    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}${extra ? ` ${extra}` : ''}\n`;
    try {
      appendFileSync(this.logFile, line, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`[ERROR] Cannot write log file ${this.logFile}: ${reason}`));
      this.logFile = undefined;
    }
  }

  /**
   * Debug log
   */
  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Info log
   */
  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  /**
   * Warning log
   */
  warn(message: string, ...args: unknown[]) {
    this.writeFile('warn', message, args);
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  /**
   * Error log; written to the log file even in quiet mode
   */
  error(message: string, ...args: unknown[]) {
    this.writeFile('error', message, args);
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  /**
   * Success log (always info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`[✓] ${message}`), ...args);
    }
  }

  /**
   * Progress log (always info level)
   */
  progress(message: string, current: number, total: number) {
    if (this.shouldLog('info')) {
      const percentage = total > 0 ? Math.round((current / total) * 100) : 100;
      console.log(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`));
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
