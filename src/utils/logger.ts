import chalk from 'chalk';
import * as readline from 'readline';
import { LogLevelName } from '../types';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, value);
}

interface ProgressState {
  message: string;
  startTime: number;
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private progressState: ProgressState | null = null;
  private lastProgressLine = '';

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel | LogLevelName): void {
    this.logLevel = typeof level === 'string' ? LEVEL_NAMES[level] : level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  private clearProgressLine(): void {
    if (this.lastProgressLine && process.stdout.isTTY) {
      readline.clearLine(process.stdout, 0);
      readline.cursorTo(process.stdout, 0);
    }
    this.lastProgressLine = '';
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.clearProgressLine();
      console.log(chalk.gray(`${chalk.dim('●')} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.clearProgressLine();
      console.log(`${chalk.blue('ℹ')} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.clearProgressLine();
      console.log(`${chalk.yellow('⚠')} ${chalk.yellow(message)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.clearProgressLine();
      console.log(`${chalk.red('✖')} ${chalk.red(message)}`, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    this.clearProgressLine();
    console.log(`${chalk.green('✔')} ${chalk.green(message)}`, ...args);
  }

  /**
   * Redraws a single progress line in place. Only drawn on a TTY so piped
   * output and CI logs stay clean.
   */
  progress(message: string, current: number, total: number): void {
    if (!process.stdout.isTTY) {
      return;
    }

    if (!this.progressState || this.progressState.message !== message) {
      this.progressState = { message, startTime: Date.now() };
    }

    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;
    const barLength = 30;
    const filledLength = Math.floor((percentage / 100) * barLength);
    const bar = '█'.repeat(filledLength) + '░'.repeat(barLength - filledLength);

    const elapsed = Date.now() - this.progressState.startTime;
    const rate = current > 0 ? current / (elapsed / 1000) : 0;
    const eta = rate > 0 ? (total - current) / rate : 0;
    const etaStr = eta > 0 ? ` • ETA: ${formatDuration(eta)}` : '';
    const rateStr = rate > 0 ? ` • ${rate.toFixed(1)}/s` : '';

    readline.clearLine(process.stdout, 0);
    readline.cursorTo(process.stdout, 0);

    const progressLine = `${chalk.cyan(bar)} ${chalk.bold(`${percentage}%`)} ${chalk.dim(`(${current}/${total})`)} ${message}${rateStr}${etaStr}`;
    process.stdout.write(progressLine);
    this.lastProgressLine = progressLine;

    if (current >= total) {
      process.stdout.write('\n');
      this.lastProgressLine = '';
      this.progressState = null;
    }
  }

  header(title: string, char = '='): void {
    this.clearProgressLine();
    console.log(chalk.bold.cyan(`\n${title}`));
    console.log(chalk.dim(char.repeat(title.length)));
  }

  section(title: string): void {
    this.clearProgressLine();
    console.log(chalk.bold(`\n▶ ${title}`));
  }

  item(message: string, icon = '•'): void {
    this.clearProgressLine();
    console.log(`  ${chalk.dim(icon)} ${message}`);
  }

  stats(stats: Record<string, number | string>): void {
    this.clearProgressLine();
    const keys = Object.keys(stats);
    if (keys.length === 0) {
      return;
    }
    const maxKeyLength = Math.max(...keys.map(k => k.length));
    for (const [key, value] of Object.entries(stats)) {
      console.log(`  ${chalk.dim(key.padEnd(maxKeyLength))} : ${chalk.bold(value)}`);
    }
  }
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  } else if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}

export const logger = Logger.getInstance();
