/**
 * Diagnostic logger.
 *
 * Diagnostics go to stderr so stdout only ever carries the rendered report.
 * Without --verbose only errors are printed.
 */

import { Chalk, type ChalkInstance } from 'chalk';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/** Anything with a write(string) method: process.stderr, or a test sink */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  verbose: boolean;
  color: boolean;
  stream?: TextSink;
}

export function createLogger(options: LoggerOptions): Logger {
  const stream = options.stream ?? process.stderr;
  const paint: ChalkInstance = new Chalk({ level: options.color ? 1 : 0 });
  const emit = (line: string): void => {
    stream.write(`${line}\n`);
  };

  return {
    error: (message) => emit(`${paint.red('Error:')} ${message}`),
    warn: (message) => {
      if (options.verbose) emit(`${paint.yellow('Warning:')} ${message}`);
    },
    info: (message) => {
      if (options.verbose) emit(message);
    },
    debug: (message) => {
      if (options.verbose) emit(paint.gray(message));
    },
  };
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
