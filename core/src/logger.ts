export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Anything with console-shaped methods. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface CreateLoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a level-filtered logger that writes to the console by default.
 * Metadata is passed through as a second argument so structured fields stay inspectable.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? globalThis.console;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    if (meta && Object.keys(meta).length > 0) {
      sink[level](message, meta);
    } else {
      sink[level](message);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
