export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Default logger; debug output is dropped unless `verbose` is set. */
export function createConsoleLogger(opts: { verbose?: boolean } = {}): Logger {
  const verbose = opts.verbose ?? false;
  return {
    debug(message, ...details) {
      if (verbose) console.debug(message, ...details);
    },
    warn(message, ...details) {
      console.warn(message, ...details);
    },
    error(message, ...details) {
      console.error(message, ...details);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
