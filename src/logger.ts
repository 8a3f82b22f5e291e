/**
 * Simple logger interface for Ollama Relay.
 * @packageDocumentation
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean;
}

const PREFIX = '[ollama-relay]';

export function createLogger(opts: LoggerOptions = {}): Logger {
  const verbose = opts.verbose ?? false;
  return {
    debug: (msg, ...args) => {
      if (verbose) console.log(`${PREFIX} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${PREFIX} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${PREFIX} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${PREFIX} ${msg}`, ...args),
  };
}

export const defaultLogger: Logger = createLogger();

/** Logger that drops everything, for tests and embedding. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
