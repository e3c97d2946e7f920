/**
 * Structured logger for hono-jsonapi.
 *
 * The default implementation writes to the console with a `[hono-jsonapi]`
 * prefix and drops `debug` output. Replace it to integrate with your own
 * logging infrastructure.
 *
 * @example
 * ```ts
 * import { setLogger } from 'hono-jsonapi';
 *
 * setLogger({
 *   debug(msg, ctx) { pino.debug(ctx, msg); },
 *   warn(msg, ctx) { pino.warn(ctx, msg); },
 *   error(msg, ctx) { pino.error(ctx, msg); },
 * });
 * ```
 */

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export interface ConsoleLoggerOptions {
  /** @default 'hono-jsonapi' */
  prefix?: string;
  /** Lowest level written. @default 'warn' */
  level?: LogLevel;
}

/**
 * Creates a logger backed by `console`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { prefix = 'hono-jsonapi', level = 'warn' } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (
    at: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    if (context && Object.keys(context).length > 0) {
      sink(`[${prefix}] ${message}`, context);
    } else {
      sink(`[${prefix}] ${message}`);
    }
  };

  return {
    debug: (message, context) => write('debug', console.debug, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
  };
}

let currentLogger: Logger = createConsoleLogger();

/** Replace the default logger with a custom implementation. */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** Get the current logger instance. */
export function getLogger(): Logger {
  return currentLogger;
}

/** Restore the default console logger. */
export function resetLogger(): void {
  currentLogger = createConsoleLogger();
}
