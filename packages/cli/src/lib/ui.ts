/**
 * CLI UI
 *
 * Styling for everything the CLI writes to stderr. Results on stdout are
 * plain JSON so they can be piped into other tools.
 */

import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  title: chalk.white.bold,
  muted: chalk.gray,
  dim: chalk.dim,

  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,

  code: chalk.cyan,
} as const;

// =============================================================================
// Symbols
// =============================================================================

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),
  info: theme.info("i"),
  bullet: theme.muted("•"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

/** Format an identifier or command */
export function code(text: string): string {
  return theme.code(text);
}

export function muted(text: string): string {
  return theme.muted(text);
}

/** Format a count in parens like (10) */
export function count(n: number): string {
  return theme.muted(`(${n})`);
}

/** Property id with its version, e.g. prp_1 v3 */
export function propertyVersion(propertyId: string, version: number): string {
  return `${code(propertyId)} ${theme.muted(`v${version}`)}`;
}

/**
 * Simple list with bullets
 */
export function list(items: string[]): string {
  return items.map((item) => `  ${symbols.bullet} ${item}`).join("\n");
}

/** Serialize a result for stdout */
export function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

// =============================================================================
// Status Messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

export function info(message: string): string {
  return `${symbols.info} ${message}`;
}

/** Format a hint/help text */
export function hint(text: string): string {
  return theme.dim(text);
}

// =============================================================================
// Export
// =============================================================================

export const ui = {
  theme,
  symbols,

  code,
  muted,
  count,
  propertyVersion,
  list,
  json,

  success,
  error,
  warning,
  info,
  hint,
};

export default ui;
