/**
 * Leveled console logging for the loader and the CLI.
 */
import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = 'log' | 'warn' | 'error';

/**
 * Console logger with an optional colon-separated prefix.
 */
class Logger {
  private level: LogLevel | null = 'info';
  private parent: Logger | null = null;
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Child loggers follow their parent's level until given their own.
   */
  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', 'log', chalk.gray, `[DEBUG] ${this.withPrefix(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', 'log', chalk.blue, `[INFO] ${this.withPrefix(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', 'warn', chalk.yellow, `[WARN] ${this.withPrefix(message)}`, data);
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

  /**
   * Log a success line (shown at info level and below).
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure line (shown at info level and below).
   */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger that inherits this logger's level.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = null;
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(
    level: LogLevel,
    sink: Sink,
    color: (text: string) => string,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    console[sink](color(line));
    if (data) {
      console[sink](color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
