/* eslint-disable no-console */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

/**
 * Writes `[LEVEL] message` lines to stderr so stdout stays free for
 * rendered output. Debug lines only appear when verbose.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = (level: LogLevel, message: string): void => {
    console.error(`[${level.toUpperCase()}] ${message}`);
  };

  return {
    debug: (message) => {
      if (options.verbose === true) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
