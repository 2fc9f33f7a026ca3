/**
 * Levelled console logging with coloured output.
 *
 * Child loggers share their root's level, so a module may create its
 * child once and still follow a level set later by the CLI.
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

type Paint = (text: string) => string;

interface LevelState {
  level: LogLevel;
}

/**
 * Structured logger for docmeta.
 */
class Logger {
  private prefix: string;
  private readonly state: LevelState;

  constructor(prefix = '', state: LevelState = { level: 'info' }) {
    this.prefix = prefix;
    this.state = state;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', chalk.gray, console.log, `[DEBUG] ${this.format(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', chalk.blue, console.log, `[INFO] ${this.format(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', chalk.yellow, console.warn, `[WARN] ${this.format(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.write('error', chalk.red, console.error, `[ERROR] ${this.format(message)}`);
      if (this.isEnabled('error')) {
        console.error(chalk.red(error.stack || error.message));
      }
      return;
    }
    this.write('error', chalk.red, console.error, `[ERROR] ${this.format(message)}`, error);
  }

  /**
   * Log a success line (shown at info level and below).
   */
  success(message: string): void {
    this.write('info', chalk.green, console.log, `✓ ${message}`);
  }

  /**
   * Log a failure line (shown at info level and below).
   */
  fail(message: string): void {
    this.write('info', chalk.red, console.log, `✗ ${message}`);
  }

  /**
   * Create a child logger whose prefix extends this one's.
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.state);
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(
    level: LogLevel,
    paint: Paint,
    sink: (line: string) => void,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    sink(paint(line));
    if (data) {
      sink(paint(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
