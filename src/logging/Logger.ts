/**
 * Logger - leveled console logging
 *
 * Levels, from quiet to verbose: silent, errors, warnings, info, debug.
 *
 *   const logger = createLogger('info');
 *   logger.info('📊 Analyzed project', { files: 12 });
 */

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Append context as JSON; circular references become "[Circular]"
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  const seen = new WeakSet<object>();
  const json = JSON.stringify(context, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
  return `${message} ${json}`;
}

/**
 * Console-based Logger; methods below the threshold are no-ops
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel = 'info') {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.errors) return;
    console.error(formatMessage(message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.warnings) return;
    console.warn(formatMessage(message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.info) return;
    console.info(formatMessage(message, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.debug) return;
    console.debug(formatMessage(message, context));
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  return new ConsoleLogger(level);
}

/** Logger used by library entry points unless the caller passes one */
export const silentLogger: Logger = new ConsoleLogger('silent');
