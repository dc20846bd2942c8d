/**
 * API errors
 *
 * Non-success responses are decoded into an `ApiError` carrying the
 * problem-details fields the API returns. Fields are decoded one by one;
 * when the body is not a JSON object, only the status code is kept.
 */

import { z } from "zod";
import { decodeUtf8 } from "../utils/encoding";
import { findError } from "./errors";

// A field of the wrong type is dropped on its own; the rest still decode
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);
const optionalList = z.array(z.unknown()).optional().catch(undefined);

const apiErrorBodySchema = z.object({
  type: optionalString,
  title: optionalString,
  detail: optionalString,
  instance: optionalString,
  behaviorName: optionalString,
  errorLocation: optionalString,
  limitKey: optionalString,
  limit: optionalNumber,
  remaining: optionalNumber,
  errors: optionalList,
  warnings: optionalList,
});

export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;

export type ApiErrorInit = ApiErrorBody & { statusCode: number };

export class ApiError extends Error {
  readonly type: string;
  readonly title: string;
  readonly detail: string;
  readonly statusCode: number;
  readonly instance?: string;
  readonly behaviorName?: string;
  readonly errorLocation?: string;
  readonly limitKey?: string;
  readonly limit?: number;
  readonly remaining?: number;
  readonly errors?: unknown[];
  readonly warnings?: unknown[];

  constructor(init: ApiErrorInit) {
    const fields = toFields(init);
    super(`API error:\n${JSON.stringify(fields, null, 2)}`);
    this.name = "ApiError";
    this.type = init.type ?? "";
    this.title = init.title ?? "";
    this.detail = init.detail ?? "";
    this.statusCode = init.statusCode;
    this.instance = init.instance;
    this.behaviorName = init.behaviorName;
    this.errorLocation = init.errorLocation;
    this.limitKey = init.limitKey;
    this.limit = init.limit;
    this.remaining = init.remaining;
    this.errors = init.errors;
    this.warnings = init.warnings;
  }

  /**
   * Same problem as `other`: type, title, detail and status code match.
   */
  is(other: ApiError): boolean {
    return (
      this.type === other.type &&
      this.title === other.title &&
      this.detail === other.detail &&
      this.statusCode === other.statusCode
    );
  }

  toJSON(): ApiErrorInit {
    return toFields(this);
  }
}

function toFields(init: ApiErrorInit): ApiErrorInit {
  return {
    type: init.type ?? "",
    title: init.title ?? "",
    detail: init.detail ?? "",
    ...(init.instance !== undefined && { instance: init.instance }),
    ...(init.behaviorName !== undefined && { behaviorName: init.behaviorName }),
    ...(init.errorLocation !== undefined && {
      errorLocation: init.errorLocation,
    }),
    ...(init.limitKey !== undefined && { limitKey: init.limitKey }),
    ...(init.limit !== undefined && { limit: init.limit }),
    ...(init.remaining !== undefined && { remaining: init.remaining }),
    ...(init.errors !== undefined && { errors: init.errors }),
    ...(init.warnings !== undefined && { warnings: init.warnings }),
    statusCode: init.statusCode,
  };
}

/**
 * Build an ApiError from a raw response body and status code.
 */
export function newApiError(
  body: Uint8Array | string,
  statusCode: number
): ApiError {
  const text = typeof body === "string" ? body : decodeUtf8(body);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return new ApiError({ statusCode });
  }

  const result = apiErrorBodySchema.safeParse(parsed);
  if (!result.success) {
    return new ApiError({ statusCode });
  }
  return new ApiError({ ...result.data, statusCode });
}

/**
 * True when `error` (or anything in its cause chain) is an ApiError,
 * optionally one that `is` the expected problem.
 */
export function isApiError(error: unknown, expected?: ApiErrorInit): boolean {
  const found = findError(error, ApiError);
  if (!found) {
    return false;
  }
  return expected ? found.is(new ApiError(expected)) : true;
}

export function isNotFoundError(error: unknown): boolean {
  return findError(error, ApiError)?.statusCode === 404;
}
