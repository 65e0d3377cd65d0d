/**
 * Logger accepted by the solver. Compatible with `console` and most
 * structured loggers.
 *
 * @category Logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const noop = (): void => {};

/** Logger that discards everything. Used when none is configured. */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Wraps a logger so every message carries a fixed prefix.
 */
export function createPrefixedLogger(prefix: string, logger: Logger): Logger {
  return {
    debug: (message, context) => logger.debug(`[${prefix}] ${message}`, context),
    info: (message, context) => logger.info(`[${prefix}] ${message}`, context),
    warn: (message, context) => logger.warn(`[${prefix}] ${message}`, context),
    error: (message, context) => logger.error(`[${prefix}] ${message}`, context),
  };
}
