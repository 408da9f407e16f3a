/**
 * Logger Interface for Library Code
 *
 * Library code (indexer, pipeline, agent loop) accepts a Logger via
 * dependency injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() spy.
 */

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Progress and outcome messages */
  info: (message: string) => void;
  /** Recoverable problems: skipped files, degraded reads */
  warn: (message: string) => void;
  /** Only shown with --verbose */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
