import pino from 'pino';

/**
 * Logging utility backed by pino
 * Writes JSON lines to stdout, and to an append-mode file once configured
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

export interface LoggerOptions {
  level: LogLevel;
  // Empty or undefined disables file output
  file?: string;
}

type FileDestination = ReturnType<typeof pino.destination>;

interface BaseLogger {
  pino: pino.Logger;
  file: FileDestination | null;
}

function createBaseLogger(options: LoggerOptions): BaseLogger {
  // Streams accept everything; the logger level does the filtering
  const streams: pino.StreamEntry[] = [{ level: 'trace', stream: process.stdout }];

  const file = options.file
    ? pino.destination({ dest: options.file, append: true, sync: true, mkdir: true })
    : null;
  if (file) {
    streams.push({ level: 'trace', stream: file });
  }

  const instance = pino(
    {
      level: options.level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: {
        service: 'aro-availability-monitor',
      },
    },
    pino.multistream(streams, { dedupe: false })
  );

  return { pino: instance, file };
}

const envLevel = process.env.LOG_LEVEL;
let current = createBaseLogger({ level: envLevel && isLogLevel(envLevel) ? envLevel : 'info' });

/**
 * Replaces the underlying logger, e.g. to add the log file after config is loaded
 */
export function configureLogger(options: LoggerOptions): void {
  const previous = current;
  current = createBaseLogger(options);
  // sync destination, so nothing is buffered when it closes
  previous.file?.end();
}

function withError(error: unknown, metadata?: Record<string, unknown>): Record<string, unknown> {
  return error === undefined ? { ...metadata } : { ...metadata, err: error };
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    current.pino.debug(metadata ?? {}, message);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    current.pino.info(metadata ?? {}, message);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    current.pino.warn(metadata ?? {}, message);
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    current.pino.error(withError(error, metadata), message);
  },

  fatal(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    current.pino.fatal(withError(error, metadata), message);
  },
};
