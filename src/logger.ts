/**
 * tcpcraft — logger
 *
 * Level-gated console logger with per-category levels. The builder logs
 * through a category instance ('tcp'); callers tune it through the shared
 * `logger` singleton.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  setLevel(level: LogLevel | 'none'): void;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const COLORS: Readonly<Record<LogLevel | 'reset', string>> = {
  trace: '\x1b[1;35m',
  debug: '\x1b[1;36m',
  info:  '\x1b[1;32m',
  warn:  '\x1b[1;33m',
  error: '\x1b[1;31m',
  reset: '\x1b[0m',
};

export class Logger {
  private currentLevel: LogLevel = 'warn';
  private enabled = true;
  private useColors = false;
  private categoryLevels: Record<string, LogLevel | 'none'> = {};

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    this.categoryLevels[category] = level;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  setColors(on: boolean): void {
    this.useColors = on;
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;

    const category = context.logger;
    const threshold = category !== undefined ? this.categoryLevels[category] : undefined;
    if (threshold === 'none') return false;

    return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold ?? this.currentLevel);
  }

  /** `[LEVEL][category] message {"key":value}` */
  private format(level: LogLevel, message: string, context: LogContext): string {
    const { logger: category, ...rest } = context;

    let line = `[${level.toUpperCase()}]`;
    if (category !== undefined) line += `[${category}]`;
    line += ` ${message}`;
    if (Object.keys(rest).length > 0) line += ` ${JSON.stringify(rest)}`;

    return this.useColors ? `${COLORS[level]}${line}${COLORS.reset}` : line;
  }

  log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!this.shouldLog(level, context)) return;
    console[level](this.format(level, message, context));
  }

  /** Logger bound to a category; its level can be set independently. */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const at = (level: LogLevel) =>
      (message: string, context: LogContext = {}) =>
        this.log(level, message, { ...context, logger: name });

    return {
      trace:    at('trace'),
      debug:    at('debug'),
      info:     at('info'),
      warn:     at('warn'),
      error:    at('error'),
      setLevel: (level: LogLevel | 'none') => this.setLevelFor(name, level),
    };
  }
}

export const logger = new Logger();
