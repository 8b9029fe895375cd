import type { LogLevel } from '../schemas/config.schema.js';

/**
 * Minimal leveled logger. Every component receives one explicitly; there is
 * no module-level instance.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Where formatted lines go. Defaults to `console` (warn/error on stderr). */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  tag?: string;
  sink?: LogSink;
  /** Clock override for deterministic output in tests */
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Create a logger producing `<iso time> - LEVEL - [tag] message` lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  const prefix = options.tag ? `[${options.tag}] ` : '';

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const line = `${now().toISOString()} - ${level.toUpperCase()} - ${prefix}${message}`;
    if (level === 'warn' || level === 'error') {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'AbortError' ? 'request timed out' : err.message;
  }
  return String(err);
}
