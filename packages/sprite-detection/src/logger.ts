import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export interface LoggerOptions {
  /** Children created with `child()` follow their parent's level unless set */
  level?: LogLevel;
  prefix?: string;
  format?: LogFormat;
  /** Defaults to stderr so stdout stays free for results */
  write?: (line: string) => void;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(levelPriority, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.SPRITECUT_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export class Logger {
  private level: LogLevel | undefined;
  private prefix: string;
  private format: LogFormat | undefined;
  private write: ((line: string) => void) | undefined;
  private parent: Logger | undefined;

  constructor(options: LoggerOptions = { level: 'info' }, parent?: Logger) {
    this.level = options.level;
    this.prefix = options.prefix ?? '';
    this.format = options.format;
    this.write = options.write;
    this.parent = parent;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  getFormat(): LogFormat {
    return this.format ?? this.parent?.getFormat() ?? 'pretty';
  }

  setWriter(write: ((line: string) => void) | undefined): void {
    this.write = write;
  }

  /**
   * Create a logger for a sub-component. Level, format and sink follow this
   * logger until overridden on the child.
   */
  child(prefix: string): Logger {
    return new Logger({ prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix }, this);
  }

  private emit(line: string): void {
    if (this.write) {
      this.write(line);
    } else if (this.parent) {
      this.parent.emit(line);
    } else {
      process.stderr.write(line + '\n');
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.getLevel()];
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    if (this.getFormat() === 'json') {
      this.emit(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          ...(this.prefix ? { component: this.prefix } : {}),
          message,
          ...(meta ? { meta } : {}),
        })
      );
      return;
    }

    const tag = levelColors[level](level.toUpperCase().padEnd(5));
    const prefix = this.prefix ? chalk.cyan(`[${this.prefix}] `) : '';
    const suffix = meta ? ' ' + chalk.gray(JSON.stringify(meta)) : '';
    this.emit(`${tag} ${prefix}${message}${suffix}`);
  }
}

/** Root logger; engine modules derive children from it */
export const logger = new Logger({ level: levelFromEnv(), prefix: 'spritecut' });
