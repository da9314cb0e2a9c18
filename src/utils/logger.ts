/**
 * Logger Interface for Library Code
 *
 * Engine components (embedder, vector index, document store) accept a
 * Logger by injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() backed object.
 */

export interface Logger {
  /** Log a warning message (degraded-but-continuing conditions) */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
