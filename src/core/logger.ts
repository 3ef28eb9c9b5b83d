/**
 * Minimal scoped console logger.
 */

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Console logger that prefixes every line with `[scope]`. */
export function consoleLogger(scope: string): Logger {
  return {
    info: (message, ...args) => console.log(`[${scope}] ${message}`, ...args),
    warn: (message, ...args) => console.warn(`[${scope}] ${message}`, ...args),
    error: (message, ...args) => console.error(`[${scope}] ${message}`, ...args),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
