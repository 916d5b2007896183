/**
 * Logger interface for configurable logging
 */
export interface Logger {
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  info?(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

/**
 * Default console logger
 */
export const consoleLogger: Logger = {
  warn: (message: string, ...args: unknown[]) => console.warn(message, ...args),
  error: (message: string, ...args: unknown[]) => console.error(message, ...args),
  info: (message: string, ...args: unknown[]) => console.info(message, ...args),
  debug: (message: string, ...args: unknown[]) => console.debug(message, ...args),
};

/**
 * Silent logger (no output)
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Prefix every message with a component scope, e.g. `[cardinality-cache]`
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    warn: (message, ...args) => logger.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => logger.error(`${tag} ${message}`, ...args),
    info: (message, ...args) => logger.info?.(`${tag} ${message}`, ...args),
    debug: (message, ...args) => logger.debug?.(`${tag} ${message}`, ...args),
  };
}
