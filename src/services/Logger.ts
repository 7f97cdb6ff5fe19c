/**
 * chain-confidence - Logger Service
 * Centralized logging with chalk styling and headless mode support
 */

import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
  level?: LogLevel;
  headless?: boolean;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'info';
  private headless: boolean = false;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = new Logger();
    }
    return this.instance;
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.headless !== undefined) this.headless = options.headless;
  }

  get currentLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.level === 'silent') return false;
    if (this.headless && level !== 'error') return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.white(message));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    if (!this.shouldLog('error')) return;
    console.log(chalk.red(message));
  }
}

export const logger = Logger.getInstance();
