/**
 * Console logging for the CLI and the generation shell.
 * The resolver core never logs; everything it knows is in its return values.
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

type Sink = 'log' | 'warn' | 'error';
type Paint = (text: string) => string;

/**
 * Leveled logger. Child loggers read their level from the root, so a level
 * set by the CLI after modules have created their children still applies.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private parent?: Logger;

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

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', 'log', chalk.gray, `[DEBUG] ${this.format(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', 'log', chalk.blue, `[INFO] ${this.format(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', 'warn', chalk.yellow, `[WARN] ${this.format(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.format(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /** `✓ message` at info level. */
  success(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /** `✗ message` at info level. */
  fail(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this.parent ?? this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    level: LogLevel,
    sink: Sink,
    paint: Paint,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.enabled(level)) return;
    console[sink](paint(line));
    if (data) {
      console[sink](paint(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
