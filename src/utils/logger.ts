/**
 * Console logging with a verbose switch.
 * Library code logs through this so only the CLI decides what is printed.
 */

export interface Logger {
  info(message: string): void;
  /** Printed only in verbose mode */
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(verbose: boolean = false): Logger {
  return {
    info: (message) => console.log(message),
    debug: (message) => {
      if (verbose) console.log(message);
    },
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}

/** Discards everything; the default for library calls */
export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};
