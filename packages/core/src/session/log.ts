/**
 * Session logging
 *
 * The session never prints on its own. It writes through a `Logger`,
 * which callers replace per session or per call. The CLI plugs in its
 * own levelled logger; library users get stderr output or nothing.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger that writes `[level] message` lines to stderr.
 * Messages below `level` are dropped.
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const emit = (messageLevel: LogLevel) => (message: string) => {
    if (LEVEL_PRIORITY[messageLevel] >= LEVEL_PRIORITY[level]) {
      console.error(`[${messageLevel}] ${message}`);
    }
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/** Logger that discards everything */
export const noopLogger: Logger = {
  debug: () => {
    /* discarded */
  },
  info: () => {
    /* discarded */
  },
  warn: () => {
    /* discarded */
  },
  error: () => {
    /* discarded */
  },
};
