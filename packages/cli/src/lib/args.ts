/**
 * Argument parsers for commander options and arguments.
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a positive integer such as a property version or map id.
 */
export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}
