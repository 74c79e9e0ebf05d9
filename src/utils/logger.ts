// src/utils/logger.ts
export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/** Console logger; `debug` lines only show with --verbose / QUIZ_VERBOSE. */
export function createLogger(verbose = false): Logger {
  return {
    debug: (...args) => {
      if (verbose) console.log("[DEBUG]", ...args);
    },
    info: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
