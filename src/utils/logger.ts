/**
 * Levelled logging for the engine and the CLI.
 *
 * Log lines go to stderr so that command output on stdout stays parseable.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  /** Children follow their parent's level unless given their own. */
  private parent: Logger | null = null;
  private ownLevel = false;

  setLevel(level: LogLevel): void {
    this.level = level;
    this.ownLevel = true;
  }

  getLevel(): LogLevel {
    if (!this.ownLevel && this.parent) {
      return this.parent.getLevel();
    }
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.error(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
