/**
 * Logger interface for parsing and resolution.
 * Keeps the library free of any particular logging backend: callers pass
 * their own implementation (or one of the two below) through options.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Simple console-based logger.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

/**
 * Logger that drops every message. Default for all library entry points.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};
