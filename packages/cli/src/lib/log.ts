/**
 * CLI Logging
 *
 * Architecture:
 * - stdout: Results only (JSON, can be piped)
 * - stderr: Everything else (status, errors, debug, request traces)
 *
 * Log levels:
 * - error: Always shown
 * - warn: Always shown
 * - info: Default level (normal status messages)
 * - debug: Only with --verbose, --trace or PROPCTL_DEBUG=1
 *
 * The same levels back `sessionLogger`, which is handed to the API
 * session so retries and request traces show up under --verbose.
 */

import type { Logger } from "@propctl/core";
import { getErrorMessage } from "@/lib/errors";
import { ui } from "@/lib/ui";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = process.env.PROPCTL_DEBUG === "1" ? "debug" : "info";

/**
 * Debug output on or off. Messages below the level are suppressed.
 */
function setVerbose(verbose: boolean) {
  currentLevel = verbose ? "debug" : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

// =============================================================================
// Core logging functions
// =============================================================================

/**
 * Print raw output to stdout
 */
function print(message: string) {
  console.log(message);
}

function debug(message: string) {
  if (shouldLog("debug")) {
    console.error(ui.theme.dim(`[debug] ${message}`));
  }
}

function info(message: string) {
  if (shouldLog("info")) {
    console.error(message);
  }
}

function warn(message: string) {
  if (shouldLog("warn")) {
    console.error(ui.warning(message));
  }
}

/**
 * Error message (never suppressed)
 */
function error(message: string) {
  console.error(ui.error(message));
}

function success(message: string) {
  if (shouldLog("info")) {
    console.error(ui.success(message));
  }
}

/**
 * Logger for the API session. Session info lines are demoted to debug so
 * they stay out of normal output.
 */
const sessionLogger: Logger = {
  debug: (message) => debug(message),
  info: (message) => debug(message),
  warn: (message) => warn(message),
  error: (message) => error(message),
};

// =============================================================================
// Spinner
// =============================================================================

export type Spinner = {
  update: (message: string) => void;
  stop: () => void;
  success: (message: string) => void;
  fail: (message: string) => void;
};

let oraModule: typeof import("ora") | null = null;

async function getOra() {
  if (!oraModule) {
    oraModule = await import("ora");
  }
  return oraModule.default;
}

/**
 * Create a spinner for a running API call. Falls back to plain status
 * lines when ora cannot be loaded.
 */
async function spinner(message: string): Promise<Spinner> {
  try {
    const ora = await getOra();
    const s = ora({
      text: message,
      spinner: "dots",
      color: "cyan",
      // Debug output would tear through an animated spinner
      isEnabled: !shouldLog("debug") && process.stderr.isTTY,
    }).start();

    return {
      update: (msg: string) => {
        s.text = msg;
      },
      stop: () => {
        s.stop();
      },
      success: (msg: string) => {
        s.succeed(msg);
      },
      fail: (msg: string) => {
        s.fail(msg);
      },
    };
  } catch (err) {
    debug(`Spinner unavailable: ${getErrorMessage(err)}`);
    info(message);
    return {
      update: (msg: string) => info(msg),
      stop: () => undefined,
      success: (msg: string) => success(msg),
      fail: (msg: string) => error(msg),
    };
  }
}

// =============================================================================
// Export
// =============================================================================

export const log = {
  // Level control
  setVerbose,

  // Output
  print,
  debug,
  info,
  warn,
  error,
  success,

  // Session
  sessionLogger,

  // Spinner
  spinner,
};

export { ui } from "@/lib/ui";
