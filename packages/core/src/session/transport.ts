/**
 * HTTP transport
 *
 * A transport sends one OutgoingRequest and resolves with the raw
 * Response. The fetch transport follows redirects itself so every hop
 * is signed again; `withRetries` layers the retry loop on top.
 */

import { HEADERS } from "../constants";
import type { Logger } from "./log";
import { cloneRequest, type OutgoingRequest } from "./request";
import {
  assertRetryConfig,
  type Backoff,
  type CheckRetry,
  defaultBackoff,
  defaultRetryPolicy,
  overrideBackoff,
  overrideRetryPolicy,
  type RetryConfig,
} from "./retry";
import { type SleepFn, sleep } from "./sleep";
import { dumpRequest, dumpResponse } from "./trace";

export type FetchFn = (input: URL | string, init?: RequestInit) => Promise<Response>;

export type SignFn = (request: OutgoingRequest) => Promise<void>;

export type Transport = {
  /** With `trace`, every hop's request and response is dumped at debug level */
  send: (
    request: OutgoingRequest,
    signal?: AbortSignal,
    trace?: Logger
  ) => Promise<Response>;
};

export const MAX_REDIRECTS = 10;

export class TooManyRedirectsError extends Error {
  constructor(limit: number) {
    super(`stopped after ${limit} redirects`);
    this.name = "TooManyRedirectsError";
  }
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Read and drop a body so the connection can be reused.
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.arrayBuffer();
  }
}

function redirectRequest(
  request: OutgoingRequest,
  status: number,
  location: URL
): OutgoingRequest {
  const next = cloneRequest(request);
  next.url = location;
  next.headers.delete(HEADERS.authorization);
  if (status === 301 || status === 302 || status === 303) {
    if (next.method !== "HEAD") {
      next.method = "GET";
    }
    delete next.body;
  }
  return next;
}

export type FetchTransportOptions = {
  fetch: FetchFn;
  /** Signs each redirect hop */
  sign: SignFn;
  maxRedirects?: number;
};

export function createFetchTransport(options: FetchTransportOptions): Transport {
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;

  return {
    async send(request, signal, trace) {
      let current = request;
      for (let hop = 0; ; hop++) {
        trace?.debug(dumpRequest(current));
        const response = await options.fetch(current.url, {
          method: current.method,
          headers: current.headers,
          body: current.body,
          redirect: "manual",
          signal,
        });
        if (trace) {
          trace.debug(await dumpResponse(response, current.url));
        }

        const location = response.headers.get(HEADERS.location);
        if (!REDIRECT_STATUSES.has(response.status) || !location) {
          return response;
        }
        await discardBody(response);
        if (hop >= maxRedirects) {
          throw new TooManyRedirectsError(maxRedirects);
        }
        current = redirectRequest(current, response.status, new URL(location, current.url));
        await options.sign(current);
      }
    },
  };
}

export type RetryTransportOptions = {
  config: RetryConfig;
  /** Re-signs each retry so the timestamp and nonce are fresh */
  sign: SignFn;
  logger: Logger;
  checkRetry?: CheckRetry;
  backoff?: Backoff;
  sleep?: SleepFn;
};

/**
 * Retry failed attempts per the policy. Makes at most maxRetries + 1
 * attempts; when they run out, the last response or error is returned
 * unchanged.
 */
export function withRetries(
  transport: Transport,
  options: RetryTransportOptions
): Transport {
  const { config, sign, logger } = options;
  assertRetryConfig(config);
  const checkRetry =
    options.checkRetry ??
    overrideRetryPolicy(defaultRetryPolicy, config.excludedEndpoints);
  const backoff = options.backoff ?? overrideBackoff(defaultBackoff, logger);
  const wait = options.sleep ?? sleep;

  return {
    async send(request, signal, trace) {
      for (let attempt = 0; ; attempt++) {
        const current = attempt === 0 ? request : cloneRequest(request);
        if (attempt > 0) {
          await sign(current);
        }

        let response: Response | undefined;
        let error: unknown;
        try {
          response = await transport.send(current, signal, trace);
        } catch (sendError) {
          error = sendError;
        }

        let retry: boolean;
        try {
          retry = await checkRetry({ request: current, response, error, signal });
        } catch (policyError) {
          if (response) {
            await discardBody(response);
          }
          throw policyError;
        }

        if (!retry || attempt >= config.maxRetries) {
          if (response) {
            return response;
          }
          throw error;
        }

        const delay = backoff(config.minWaitMs, config.maxWaitMs, attempt, response);
        const reason = response ? `status ${response.status}` : "transport error";
        logger.debug(
          `${current.method} ${current.url.pathname}: ${reason}, retrying in ${delay}ms (${config.maxRetries - attempt} left)`
        );
        if (response) {
          await discardBody(response);
        }
        await wait(delay, signal);
      }
    },
  };
}
