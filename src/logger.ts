/**
 * Logger factory
 *
 * Structured JSON logging through pino. Components take a child logger
 * bound to their name instead of creating their own.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions as PinoOptions } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;
  destination?: DestinationStream;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.METADATAD_LOG_LEVEL;
  const level = options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');

  const pinoOptions: PinoOptions = {
    name: options.name ?? 'metadatad',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err }
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Map CLI verbosity options to a log level
 */
export function getLogLevel(options: { verbose?: boolean; logLevel?: string }): LogLevel {
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.verbose) {
    return 'debug';
  }
  return 'info';
}
