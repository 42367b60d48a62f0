export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

type LogMethod = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Anything with console's four methods can receive log lines.
export type LogSink = Pick<Console, LogMethod>;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  prefix?: string;
}

/**
 * Console-backed logger that drops messages below `level`.
 * Created once at startup and handed to every service.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? console;
  const prefix = options.prefix ? `[${options.prefix}] ` : '';

  const emit =
    (method: LogMethod) =>
    (message: string, ...meta: unknown[]): void => {
      if (LEVEL_ORDER[method] < threshold) return;
      sink[method](`${prefix}${message}`, ...meta);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/**
 * Derive a logger whose lines carry an extra prefix, e.g. a request id.
 */
export function childLogger(parent: Logger, prefix: string): Logger {
  return {
    debug: (message, ...meta) => parent.debug(`[${prefix}] ${message}`, ...meta),
    info: (message, ...meta) => parent.info(`[${prefix}] ${message}`, ...meta),
    warn: (message, ...meta) => parent.warn(`[${prefix}] ${message}`, ...meta),
    error: (message, ...meta) => parent.error(`[${prefix}] ${message}`, ...meta),
  };
}
