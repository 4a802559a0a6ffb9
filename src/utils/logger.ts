/**
 * Logging utility with levels and colors
 */

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
  private toStderr = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Quiet mode drops everything, errors included
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Send every line to stderr, keeping stdout for machine-readable output
   */
  setStderr(toStderr: boolean) {
    this.toStderr = toStderr;
  }

  private out(line: string, args: unknown[]) {
    if (this.toStderr) {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  private stamp(): string {
    return chalk.dim(new Date().toTimeString().slice(0, 8));
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      this.out(`${this.stamp()} ${chalk.gray(`[DEBUG] ${message}`)}`, args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.out(`${this.stamp()} ${chalk.blue(`[INFO] ${message}`)}`, args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(`${this.stamp()} ${chalk.yellow(`[WARN] ${message}`)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(`${this.stamp()} ${chalk.red(`[ERROR] ${message}`)}`, ...args);
    }
  }

  /**
   * Success log (info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.out(`${this.stamp()} ${chalk.green(`[✓] ${message}`)}`, args);
    }
  }

  /**
   * Vulnerable finding (info level, so it survives the default threshold)
   */
  vuln(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.out(`${this.stamp()} ${chalk.red.bold(`[VULN] ${message}`)}`, args);
    }
  }

  progress(message: string, current: number, total: number) {
    if (this.shouldLog('info') && total > 0) {
      const percentage = Math.round((current / total) * 100);
      const line = chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`);
      this.out(`${this.stamp()} ${line}`, []);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
