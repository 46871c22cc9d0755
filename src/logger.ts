export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function format(message: string, fields?: LogFields): string {
  if (!fields || Object.keys(fields).length === 0) return message;
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=${String(value)}`);
  return `${message} (${pairs.join(", ")})`;
}

/**
 * Logger that writes to stderr through console, so stdout stays free for row output.
 * Debug lines are only written when `verbose` is set.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug(message, fields) {
      if (verbose) console.error(`[debug] ${format(message, fields)}`);
    },
    info(message, fields) {
      console.error(`[info] ${format(message, fields)}`);
    },
    warn(message, fields) {
      console.warn(`[warn] ${format(message, fields)}`);
    },
    error(message, fields) {
      console.error(`[error] ${format(message, fields)}`);
    },
  };
}
