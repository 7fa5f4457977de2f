/**
 * Structured logging infrastructure.
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

type Sink = 'log' | 'warn' | 'error';

/**
 * Leveled console logger for the ablate CLI.
 *
 * Everything except `error` goes to stdout; `--json` runs switch the
 * level to `warn` so machine output on stdout stays parseable.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    sink: Sink,
    color: ChalkInstance,
    message: string,
    data?: unknown
  ): void {
    if (!this.isEnabled(level)) return;
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    console[sink](color(`[${level.toUpperCase()}] ${text}`));
    if (data === undefined) return;
    if (data instanceof Error) {
      console[sink](color(data.stack ?? data.message));
    } else {
      console[sink](color(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', 'log', chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', 'log', chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', 'warn', chalk.yellow, message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    this.emit('error', 'error', chalk.red, message, error);
  }

  /** Green check line, shown at info level. */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /** Red cross line, shown at info level. */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

/**
 * Map the shared CLI flags onto a log level.
 */
export function resolveLogLevel(flags: { verbose?: boolean; json?: boolean }): LogLevel {
  if (flags.json) return 'warn';
  if (flags.verbose) return 'debug';
  return 'info';
}

export const logger = new Logger();

export { Logger };
