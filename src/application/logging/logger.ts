/**
 * @eagerwire/core - Logger
 *
 * Minimal logging port used by the container. Any object with these four
 * methods (console, pino, winston) can be passed as `ContainerOptions.logger`.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Discards everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Wrap a logger so every message starts with `[scope]`.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger('CONTAINER', consoleLogger);
 * logger.info('Scan completed'); // [INFO] [CONTAINER] Scan completed
 * ```
 */
export function createScopedLogger(scope: string, logger: ILogger): ILogger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...args) => logger.debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => logger.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => logger.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => logger.error(`${prefix} ${message}`, ...args),
  };
}
