/**
 * Level-filtered console logger shared by the CLI and the checks.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = 'warn' | 'error';

/**
 * Simple structured logger for canon-check.
 * Diagnostics go to stderr so stdout carries only the report, which keeps
 * `--format json --verbose` parseable.
 * Child loggers read the level of their root, so `--verbose` applied after a
 * child was created still takes effect.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', 'error', chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', 'error', chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', 'warn', chalk.yellow, message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.withPrefix(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /** Green check line, hidden above info. */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /** Red cross line, hidden above info. */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this.parent ?? this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    level: Exclude<LogLevel, 'silent' | 'error'>,
    sink: Sink,
    color: ChalkInstance,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    console[sink](color(`[${level.toUpperCase()}] ${this.withPrefix(message)}`));
    if (data) {
      console[sink](color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
