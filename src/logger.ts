/**
 * Transcript and diagnostics sink. `console` satisfies it directly.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Options for the console logger
 */
export interface ConsoleLoggerOptions {
  /** Print debug lines (private scalars, generator positions). Default false. */
  verbose?: boolean;
}

/**
 * Logger writing to the process console.
 * Debug lines are dropped unless verbose.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug: (message) => {
      if (options.verbose) {
        console.log(message);
      }
    },
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message, error) => {
      if (error === undefined) {
        console.error(message);
      } else {
        console.error(message, error);
      }
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
