import pino, { type Logger } from 'pino';
import type { LogLevel } from '../types/config.js';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** File path or file descriptor */
  destination?: string | number;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { name = 'disk-exporter', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: destination ?? 1,
        },
      }
    : undefined;

  const dest = !transport && destination !== undefined ? pino.destination(destination) : undefined;

  return pino(
    {
      name,
      level,
      transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    // stdout is reserved for the exposition written by `collect`
    defaultLogger = createLogger({ pretty: process.env.NODE_ENV !== 'production', destination: 2 });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}
