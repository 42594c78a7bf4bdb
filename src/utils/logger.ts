/** Minimal logger contract; `console` satisfies it. */
export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
};

/**
 * Picks the logger a client should write to: an explicit logger always wins,
 * `debug: true` falls back to `console`, otherwise nothing is logged.
 */
export function resolveLogger(logger?: Logger, debug?: boolean): Logger {
  if (logger) {
    return logger;
  }

  return debug ? console : silentLogger;
}
