import chalk from 'chalk';
import * as readline from 'readline';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

interface ProgressState {
  message: string;
  current: number;
  total: number;
  startTime: number;
}

/**
 * Console logger. Everything goes to stderr: stdout is reserved for the
 * generated mirrorlist so it can be piped or redirected.
 */
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

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  private clearProgressLine(): void {
    if (this.lastProgressLine) {
      readline.clearLine(process.stderr, 0);
      readline.cursorTo(process.stderr, 0);
      this.lastProgressLine = '';
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.clearProgressLine();
      console.error(chalk.gray(`${chalk.dim('●')} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.clearProgressLine();
      console.error(`${chalk.blue('ℹ')} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.clearProgressLine();
      console.error(`${chalk.yellow('⚠')} ${chalk.yellow(message)}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.clearProgressLine();
      console.error(`${chalk.red('✖')} ${chalk.red(message)}`, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.clearProgressLine();
      console.error(`${chalk.green('✔')} ${chalk.green(message)}`, ...args);
    }
  }

  progress(message: string, current: number, total: number): void {
    // A redrawn bar only makes sense on a terminal
    if (this.logLevel > LogLevel.INFO || !process.stderr.isTTY) {
      return;
    }

    if (!this.progressState || this.progressState.message !== message) {
      this.progressState = {
        message,
        current,
        total,
        startTime: Date.now(),
      };
    } else {
      this.progressState.current = current;
      this.progressState.total = total;
    }

    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;
    const barLength = 30;
    const filledLength = Math.floor((percentage / 100) * barLength);
    const bar = '█'.repeat(filledLength) + '░'.repeat(barLength - filledLength);

    const elapsed = Date.now() - this.progressState.startTime;
    const rate = current > 0 ? current / (elapsed / 1000) : 0;
    const remaining = total - current;
    const eta = rate > 0 ? remaining / rate : 0;
    const etaStr = eta > 0 ? ` • ETA: ${this.formatTime(eta)}` : '';

    readline.clearLine(process.stderr, 0);
    readline.cursorTo(process.stderr, 0);

    const progressLine = `${chalk.cyan(bar)} ${chalk.bold(`${percentage}%`)} ${chalk.dim(`(${current}/${total})`)} ${message}${etaStr}`;
    process.stderr.write(progressLine);
    this.lastProgressLine = progressLine;

    if (current >= total) {
      process.stderr.write('\n');
      this.lastProgressLine = '';
      this.progressState = null;
    }
  }

  private formatTime(seconds: number): string {
    if (seconds < 60) {
      return `${Math.round(seconds)}s`;
    }
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  }

  section(title: string): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.clearProgressLine();
      console.error(chalk.bold(`\n▶ ${title}`));
    }
  }

  stats(stats: Record<string, number | string>): void {
    if (this.logLevel > LogLevel.INFO) {
      return;
    }
    this.clearProgressLine();
    const maxKeyLength = Math.max(...Object.keys(stats).map(k => k.length));
    for (const [key, value] of Object.entries(stats)) {
      const paddedKey = key.padEnd(maxKeyLength);
      console.error(`  ${chalk.dim(paddedKey)} : ${chalk.bold(value)}`);
    }
  }

  table(headers: string[], rows: (string | number)[][]): void {
    if (this.logLevel > LogLevel.INFO) {
      return;
    }
    this.clearProgressLine();

    const columnWidths = headers.map((header, index) => {
      const maxRowWidth = Math.max(0, ...rows.map(row => String(row[index] ?? '').length));
      return Math.max(header.length, maxRowWidth) + 2;
    });

    console.error(chalk.gray(`┌${columnWidths.map(width => '─'.repeat(width)).join('┬')}┐`));

    const headerRow = `│${headers
      .map((header, index) => chalk.bold.cyan(` ${header} `.padEnd(columnWidths[index])))
      .join(chalk.gray('│'))}${chalk.gray('│')}`;
    console.error(headerRow);

    console.error(chalk.gray(`├${columnWidths.map(width => '─'.repeat(width)).join('┼')}┤`));

    rows.forEach(row => {
      const rowStr = `│${row
        .map((cell, index) => {
          const cellStr = ` ${cell} `.padEnd(columnWidths[index]);
          return typeof cell === 'number' ? chalk.yellow(cellStr) : cellStr;
        })
        .join(chalk.gray('│'))}${chalk.gray('│')}`;
      console.error(rowStr);
    });

    console.error(chalk.gray(`└${columnWidths.map(width => '─'.repeat(width)).join('┴')}┘`));
  }
}

export const logger = Logger.getInstance();
