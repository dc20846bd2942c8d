/**
 * Retry policy and backoff
 *
 * The policy decides whether a finished attempt is tried again; the
 * backoff decides how long to wait first. Both start from general HTTP
 * rules and are then overridden for this API:
 * - cancelled calls, excluded endpoints and non-GET requests never retry
 * - a GET that failed before any response goes to the base policy
 * - 429 on /papi/ paths and 409 are always retried
 * - 429 responses wait until X-RateLimit-Next when the server sends it
 */

import { HEADERS, RATE_LIMITED_PATH_PREFIX } from "../constants";
import { getErrorMessage } from "../errors/errors";
import { compileGlob } from "./glob";
import { parseHttpDate, parseRfc3339 } from "./http-date";
import type { Logger } from "./log";
import type { OutgoingRequest } from "./request";

export type RetryConfig = {
  /** Retries after the first attempt */
  maxRetries: number;
  minWaitMs: number;
  maxWaitMs: number;
  /** Path globs that are never retried */
  excludedEndpoints: string[];
};

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 10,
  minWaitMs: 1_000,
  maxWaitMs: 30_000,
  excludedEndpoints: [],
};

export function newRetryConfig(overrides: Partial<RetryConfig> = {}): RetryConfig {
  return {
    ...DEFAULT_RETRY_CONFIG,
    excludedEndpoints: [...DEFAULT_RETRY_CONFIG.excludedEndpoints],
    ...overrides,
  };
}

export class RetryConfigError extends AggregateError {
  constructor(errors: Error[]) {
    super(
      errors,
      `retry configuration failed:\n${errors.map((e) => `  ${e.message}`).join("\n")}`
    );
    this.name = "RetryConfigError";
  }
}

/**
 * Every problem with `config`, in a fixed order. Empty when valid.
 */
export function validateRetryConfig(config: RetryConfig): Error[] {
  const errors: Error[] = [];
  // NaN and Infinity fail these checks too; they would never end the loop
  if (!(Number.isInteger(config.maxRetries) && config.maxRetries >= 0)) {
    errors.push(new Error("maximum number of retries cannot be negative"));
  }
  const minValid = Number.isFinite(config.minWaitMs) && config.minWaitMs >= 0;
  if (!minValid) {
    errors.push(new Error("minimum retry wait time cannot be negative"));
  }
  const maxValid = Number.isFinite(config.maxWaitMs) && config.maxWaitMs >= 0;
  if (!maxValid) {
    errors.push(new Error("maximum retry wait time cannot be negative"));
  }
  if (config.maxWaitMs < config.minWaitMs) {
    errors.push(
      new Error(
        "maximum retry wait time cannot be shorter than minimum retry wait time"
      )
    );
  }
  for (const pattern of config.excludedEndpoints) {
    try {
      compileGlob(pattern);
    } catch (error) {
      errors.push(
        new Error(
          `malformed exclude endpoint pattern: ${getErrorMessage(error)}: ${pattern}`,
          { cause: error }
        )
      );
    }
  }
  return errors;
}

export function assertRetryConfig(config: RetryConfig): void {
  const errors = validateRetryConfig(config);
  if (errors.length > 0) {
    throw new RetryConfigError(errors);
  }
}

// =============================================================================
// Policy
// =============================================================================

export type AttemptOutcome = {
  request: OutgoingRequest;
  response?: Response;
  error?: unknown;
  signal?: AbortSignal;
};

/**
 * True to retry. Throwing stops the loop and surfaces the thrown value.
 */
export type CheckRetry = (outcome: AttemptOutcome) => boolean | Promise<boolean>;

const NON_RETRYABLE_ERRORS = new Set([
  "AbortError",
  "TimeoutError",
  "TooManyRedirectsError",
]);

/**
 * General HTTP policy: transport failures, 429 and 5xx (except 501).
 */
export const defaultRetryPolicy: CheckRetry = ({ response, error }) => {
  if (error !== undefined) {
    return !(error instanceof Error && NON_RETRYABLE_ERRORS.has(error.name));
  }
  if (!response) {
    return false;
  }
  if (response.status === 429) {
    return true;
  }
  return response.status >= 500 && response.status !== 501;
};

/**
 * Wrap `base` with the API-specific rules, checked in order.
 */
export function overrideRetryPolicy(
  base: CheckRetry,
  excludedEndpoints: string[]
): CheckRetry {
  const excluded = excludedEndpoints.map((pattern) => compileGlob(pattern));

  return (outcome) => {
    const { request, response, signal } = outcome;
    if (signal?.aborted) {
      throw signal.reason;
    }

    const isGet = request.method === "GET";
    if (!response) {
      return isGet ? base(outcome) : false;
    }
    if (
      !isGet ||
      excluded.some((pattern) => pattern.test(request.url.pathname))
    ) {
      return false;
    }

    // Rate-limited PAPI reads wait for the next slot, see rateLimitBackoff
    if (
      response.status === 429 &&
      request.url.pathname.startsWith(RATE_LIMITED_PATH_PREFIX)
    ) {
      return true;
    }
    if (response.status === 409) {
      return true;
    }
    return base(outcome);
  };
}

// =============================================================================
// Backoff
// =============================================================================

export type Backoff = (
  minWaitMs: number,
  maxWaitMs: number,
  attempt: number,
  response?: Response
) => number;

/**
 * Retry-After seconds on 429/503, otherwise min * 2^attempt capped at max.
 */
export const defaultBackoff: Backoff = (minWaitMs, maxWaitMs, attempt, response) => {
  if (response && (response.status === 429 || response.status === 503)) {
    const retryAfter = response.headers.get(HEADERS.retryAfter);
    if (retryAfter && /^\d+$/.test(retryAfter)) {
      return Number(retryAfter) * 1_000;
    }
  }
  const wait = minWaitMs * 2 ** attempt;
  return Number.isFinite(wait) && wait < maxWaitMs ? wait : maxWaitMs;
};

/**
 * Milliseconds until `X-RateLimit-Next`, measured against the server's
 * `Date` header. Undefined when either header is missing, unparsable, or
 * the next slot is already in the past.
 */
export function rateLimitBackoff(
  headers: Headers,
  logger?: Logger
): number | undefined {
  const nextHeader = headers.get(HEADERS.rateLimitNext);
  if (!nextHeader) {
    return undefined;
  }
  const next = parseRfc3339(nextHeader);
  if (next === undefined) {
    logger?.error(`could not parse ${HEADERS.rateLimitNext} header: ${nextHeader}`);
    return undefined;
  }

  const dateHeader = headers.get(HEADERS.date);
  if (!dateHeader) {
    logger?.warn(`${HEADERS.date} header missing from rate-limited response`);
    return undefined;
  }
  const date = parseHttpDate(dateHeader);
  if (date === undefined) {
    logger?.error(`could not parse ${HEADERS.date} header: ${dateHeader}`);
    return undefined;
  }

  if (next < date) {
    logger?.warn(
      `${HEADERS.rateLimitNext} (${nextHeader}) is before ${HEADERS.date} (${dateHeader})`
    );
    return undefined;
  }
  return next - date;
}

/**
 * Wrap `base` so 429 responses honour X-RateLimit-Next.
 */
export function overrideBackoff(base: Backoff, logger?: Logger): Backoff {
  return (minWaitMs, maxWaitMs, attempt, response) => {
    if (response?.status === 429) {
      const wait = rateLimitBackoff(response.headers, logger);
      if (wait !== undefined) {
        return wait;
      }
    }
    return base(minWaitMs, maxWaitMs, attempt, response);
  };
}
