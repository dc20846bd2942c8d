/**
 * Reusable field rules for request schemas.
 */

import { z } from "zod";

export const VALIDATION_MESSAGES = {
  blank: "cannot be blank",
  required: "is required",
  invalidValue: "must be a valid value",
  invalidFormat: "must be in a valid format",
} as const;

// =============================================================================
// Presence
// =============================================================================

/** Non-empty string */
export function requiredString() {
  return z
    .string({
      required_error: VALIDATION_MESSAGES.blank,
      invalid_type_error: "must be a string",
    })
    .min(1, VALIDATION_MESSAGES.blank);
}

/** Non-zero integer (ids and version numbers) */
export function requiredInt() {
  return z
    .number({
      required_error: VALIDATION_MESSAGES.blank,
      invalid_type_error: "must be a number",
    })
    .int("must be an integer")
    .refine((value) => value !== 0, VALIDATION_MESSAGES.blank);
}

/** Present string; empty is allowed but null and missing are not */
export function presentString() {
  return z.string({
    required_error: VALIDATION_MESSAGES.required,
    invalid_type_error: VALIDATION_MESSAGES.required,
  });
}

// =============================================================================
// Values
// =============================================================================

/** One of a fixed set of string values */
export function oneOf<T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values, {
    errorMap: () => ({ message: VALIDATION_MESSAGES.invalidValue }),
  });
}

/** String matching `pattern` */
export function matching(pattern: RegExp) {
  return z
    .string({ invalid_type_error: VALIDATION_MESSAGES.invalidFormat })
    .regex(pattern, VALIDATION_MESSAGES.invalidFormat);
}
