import * as core from '@actions/core';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warning: () => undefined,
  error: () => undefined,
};

/**
 * Logger for the GitHub Action. Debug lines only show up when the
 * workflow runs with step debugging enabled.
 */
export function createActionsLogger(): Logger {
  return {
    debug: (message) => core.debug(message),
    info: (message) => core.info(message),
    warning: (message) => core.warning(message),
    error: (message) => core.error(message),
  };
}

/**
 * Logger for the command line. Everything goes to stderr so that JSON
 * reports on stdout can be piped.
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const logger = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.printf(({ timestamp, level: lvl, message }) => {
        return `${String(timestamp)} [${lvl}]: ${String(message)}`;
      })
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
    exitOnError: false,
  });

  return {
    debug: (message) => logger.debug(message),
    info: (message) => logger.info(message),
    warning: (message) => logger.warn(message),
    error: (message) => logger.error(message),
  };
}
