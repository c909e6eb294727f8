/**
 * Subsystem loggers.
 *
 * Components receive a `Logger` through their options; the default writes
 * `[driftwatch:<subsystem>]`-prefixed lines to the console.
 */

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggerOptions = {
  verbose?: boolean;
  /** Console methods to write to (tests and the CLI pass their own). */
  sink?: Pick<Console, "log" | "warn" | "error">;
};

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const out = options.sink ?? console;
  const prefix = `[driftwatch:${subsystem}]`;
  return {
    debug: (msg) => {
      if (options.verbose) out.log(`${prefix} ${msg}`);
    },
    info: (msg) => out.log(`${prefix} ${msg}`),
    warn: (msg) => out.warn(`${prefix} ${msg}`),
    error: (msg) => out.error(`${prefix} ${msg}`),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
