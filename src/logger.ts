/**
 * @module logger
 *
 * Minimal logging seam. Components accept a {@link Logger} through their
 * options and fall back to {@link consoleLogger}.
 */

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const PREFIX = '[tileset-client]';

/** Writes to the global `console`, prefixing every line. */
export const consoleLogger: Logger = {
  debug: (message, ...meta) => console.debug(`${PREFIX} ${message}`, ...meta),
  info: (message, ...meta) => console.info(`${PREFIX} ${message}`, ...meta),
  warn: (message, ...meta) => console.warn(`${PREFIX} ${message}`, ...meta),
  error: (message, ...meta) => console.error(`${PREFIX} ${message}`, ...meta),
};

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
