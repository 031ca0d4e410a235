/**
 * Structured logging infrastructure.
 */
import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Verbosity names accepted on the command line. */
export type Verbosity = 'debug' | 'info' | 'warning' | 'error';

export const VERBOSITY_LEVELS: readonly Verbosity[] = ['info', 'debug', 'warning', 'error'];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function verbosityToLevel(verbosity: Verbosity): LogLevel {
  return verbosity === 'warning' ? 'warn' : verbosity;
}

/**
 * Simple structured logger for the ade CLI.
 * Children share the parent's level and file sink.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private logFile: string | null = null;
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.root().level = level;
  }

  getLevel(): LogLevel {
    return this.root().level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  /**
   * Mirror every emitted line (uncoloured) to a file. Pass null to stop.
   */
  setLogFile(filePath: string | null): void {
    this.root().logFile = filePath;
  }

  private root(): Logger {
    return this.parent ? this.parent.root() : this;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.root().level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private writeFile(line: string): void {
    const file = this.root().logFile;
    if (file) {
      appendFileSync(file, `${line}\n`, 'utf-8');
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    const line = `[DEBUG] ${this.formatMessage(message)}`;
    console.log(chalk.gray(line));
    this.writeFile(line);
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
      this.writeFile(JSON.stringify(data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    const line = `[INFO] ${this.formatMessage(message)}`;
    console.log(chalk.blue(line));
    this.writeFile(line);
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
      this.writeFile(JSON.stringify(data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    const line = `[WARN] ${this.formatMessage(message)}`;
    console.warn(chalk.yellow(line));
    this.writeFile(line);
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
      this.writeFile(JSON.stringify(data));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const line = `[ERROR] ${this.formatMessage(message)}`;
    console.error(chalk.red(line));
    this.writeFile(line);
    if (error) {
      const detail = error instanceof Error ? error.stack || error.message : JSON.stringify(error, null, 2);
      console.error(chalk.red(detail));
      this.writeFile(detail);
    }
  }

  /**
   * Log a success message (shown at info level).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
    this.writeFile(`✓ ${message}`);
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this.root();
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
