/**
 * Minimal logging surface used across the factory. Any object with these
 * four methods can be passed as the `logger` option.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Console-backed logger that prefixes every line with `[scope]`.
 */
export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, data) {
      if (data) console.debug(prefix, message, data);
      else console.debug(prefix, message);
    },
    info(message, data) {
      if (data) console.info(prefix, message, data);
      else console.info(prefix, message);
    },
    warn(message, data) {
      if (data) console.warn(prefix, message, data);
      else console.warn(prefix, message);
    },
    error(message, data) {
      if (data) console.error(prefix, message, data);
      else console.error(prefix, message);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
