export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
}

/**
 * Console logger prefixing every line with `[tag]`. Debug lines are only
 * printed in verbose mode.
 */
export function createLogger(tag: string, options: LoggerOptions): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message) {
      if (options.verbose) {
        console.log(`${prefix} ${message}`);
      }
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
