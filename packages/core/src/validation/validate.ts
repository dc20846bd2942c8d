/**
 * Request validation
 *
 * Endpoint inputs are checked with zod before anything is sent. Failures
 * are flattened into one `ValidationError` keyed by field path, so a
 * caller sees every problem at once.
 */

import type { z } from "zod";
import { findError } from "../errors/errors";

type IssuePath = (string | number)[];

/**
 * Format a zod issue path the way fields are reported:
 * `rules.children[0].variables[1].value`.
 */
export function formatFieldPath(path: IssuePath): string {
  let formatted = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted ? `.${segment}` : segment;
    }
  }
  return formatted || "(root)";
}

export class ValidationError extends Error {
  /** Field path to message, one entry per failing field */
  readonly fields: Readonly<Record<string, string>>;

  constructor(fields: Record<string, string>) {
    const lines = Object.keys(fields)
      .sort()
      .map((key) => `${key}: ${fields[key]}`);
    super(`struct validation:\n${lines.join("\n")}`);
    this.name = "ValidationError";
    this.fields = fields;
  }
}

/**
 * Validate `value` against `schema`.
 * Returns undefined when valid, otherwise a ValidationError listing each
 * failing field. Several messages on one field are joined with "; ".
 */
export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown
): ValidationError | undefined {
  const result = schema.safeParse(value);
  if (result.success) {
    return undefined;
  }

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const key = formatFieldPath(issue.path);
    const existing = fields[key];
    fields[key] = existing ? `${existing}; ${issue.message}` : issue.message;
  }
  return new ValidationError(fields);
}

export function isValidationError(error: unknown): boolean {
  return findError(error, ValidationError) !== undefined;
}
