/**
 * Local error types
 *
 * Everything the library raises before or after talking to the API.
 * Server-side failures are `ApiError` (see ./api-error).
 */

import type { SessionResponse } from "../session/response";

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Walk the `cause` chain and return the first error of the given class.
 */
export function findError<T extends Error>(
  error: unknown,
  type: ErrorClass<T>
): T | undefined {
  const seen = new Set<unknown>();
  let current = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** The request body could not be serialized to JSON */
export class MarshalingError extends Error {
  constructor(cause: unknown) {
    super(`marshaling input: ${getErrorMessage(cause)}`, { cause });
    this.name = "MarshalingError";
  }
}

/** A 2xx response body did not decode into the expected shape */
export class UnmarshalingError extends Error {
  readonly response: SessionResponse;

  constructor(response: SessionResponse, cause: unknown) {
    super(`unmarshaling output: ${getErrorMessage(cause)}`, { cause });
    this.name = "UnmarshalingError";
    this.response = response;
  }
}

export class SigningError extends Error {
  constructor(cause: unknown) {
    super(`signing request: ${getErrorMessage(cause)}`, { cause });
    this.name = "SigningError";
  }
}

/** Invalid session options, collected rather than reported one at a time */
export class SessionConfigError extends AggregateError {
  constructor(errors: Error[]) {
    super(
      errors,
      `invalid session configuration:\n${errors.map((e) => `  ${e.message}`).join("\n")}`
    );
    this.name = "SessionConfigError";
  }
}

/** Prefixes an endpoint failure with the operation that produced it */
export class OperationError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation}: ${getErrorMessage(cause)}`, { cause });
    this.name = "OperationError";
    this.operation = operation;
  }
}

/**
 * Run an endpoint body, wrapping anything it throws in an OperationError.
 */
export async function withOperation<T>(
  operation: string,
  run: () => Promise<T>
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new OperationError(operation, error);
  }
}
