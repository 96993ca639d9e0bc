/**
 * Leveled diagnostics logger.
 *
 * Everything goes to stderr (or the configured sink) so reports written to
 * stdout stay machine-readable. Child loggers share their parent's level.
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

/**
 * Where log lines are written.
 */
export interface LogSink {
  write(line: string): void;
}

const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

interface LevelState {
  level: LogLevel;
}

class Logger {
  private readonly state: LevelState;
  private readonly prefix: string;
  private readonly sink: LogSink;

  constructor(options: { level?: LogLevel; prefix?: string; sink?: LogSink } = {}, state?: LevelState) {
    this.state = state ?? { level: options.level ?? 'info' };
    this.prefix = options.prefix ?? '';
    this.sink = options.sink ?? stderrSink;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.state.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, `[DEBUG] ${this.formatMessage(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, `[INFO] ${this.formatMessage(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, `[WARN] ${this.formatMessage(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.emit('error', chalk.red, `[ERROR] ${this.formatMessage(message)}`);
      if (this.isEnabled('error')) this.sink.write(chalk.red(error.stack ?? error.message));
      return;
    }
    this.emit('error', chalk.red, `[ERROR] ${this.formatMessage(message)}`, error);
  }

  /**
   * Create a child logger with a nested prefix. The child follows level
   * changes made on the parent and vice versa.
   */
  child(prefix: string): Logger {
    return new Logger(
      { prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix, sink: this.sink },
      this.state
    );
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    level: Exclude<LogLevel, 'silent'>,
    color: (text: string) => string,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    this.sink.write(color(line));
    if (data) {
      this.sink.write(color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
