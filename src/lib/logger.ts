export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  success(message: string): void;
  verbose(message: string): void;
}

/**
 * Console-backed logger. Everything goes to stderr so that command output on
 * stdout stays machine-readable.
 */
export function createConsoleLogger(isVerbose = false): Logger {
  return {
    info: (message) => console.error(message),
    warn: (message) => console.error(`WARNING: ${message}`),
    success: (message) => console.error(message),
    verbose: (message) => {
      if (isVerbose) console.error(`VERBOSE: ${message}`);
    },
  };
}

export const nullLogger: Logger = {
  info: () => {},
  warn: () => {},
  success: () => {},
  verbose: () => {},
};
