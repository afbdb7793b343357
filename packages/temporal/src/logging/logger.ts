/**
 * Logger
 *
 * Minimal logging contract shared by every service. Services take a
 * Logger at construction; the console logger is the default.
 *
 * @module logging/logger
 */

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger writing to the console, filtered by level.
 * Everything goes to stderr so stdout stays clean for command output.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly prefix = '[casetime]',
  ) {}

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const line = `${this.prefix} ${level.toUpperCase()} ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, JSON.stringify(context));
    } else {
      console.error(line);
    }
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
