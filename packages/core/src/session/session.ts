/**
 * Session
 *
 * One Session is built per set of credentials and shared by every
 * endpoint client. `execute` runs the whole request pipeline: URL and
 * header assembly, body serialization, rate limiting, signing, dispatch
 * (with redirects and optional retries), buffering and decoding.
 */

import type { z } from "zod";
import { DEFAULT_USER_AGENT } from "../constants";
import { EdgeGridSigner } from "../edgegrid/signer";
import {
  getErrorMessage,
  InvalidArgumentError,
  MarshalingError,
  SessionConfigError,
  SigningError,
  UnmarshalingError,
} from "../errors/errors";
import { type Logger, noopLogger } from "./log";
import { RequestRateLimiter } from "./rate-limit";
import {
  buildHeaders,
  buildUrl,
  type CallOptions,
  type OutgoingRequest,
  type RequestDescriptor,
} from "./request";
import { expectsBody, SessionResponse } from "./response";
import {
  type Backoff,
  type CheckRetry,
  type RetryConfig,
  validateRetryConfig,
} from "./retry";
import type { Signer } from "./signer";
import type { SleepFn } from "./sleep";
import {
  createFetchTransport,
  type FetchFn,
  type Transport,
  withRetries,
} from "./transport";

/** Schema used to decode a 2xx body; input is whatever JSON.parse gave */
export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type SessionOptions = {
  /** Defaults to an EdgeGrid signer built from the environment */
  signer?: Signer;
  /** Host for relative paths; defaults to the signer's host */
  host?: string;
  /** Defaults to the global fetch, looked up on each call */
  fetch?: FetchFn;
  logger?: Logger;
  userAgent?: string;
  /** Maximum requests per second; 0 or undefined means unlimited */
  requestLimit?: number;
  /** Dump every request and response at debug level, redirects and retries included */
  trace?: boolean;
  /** Retry GET requests per this configuration; off when omitted */
  retries?: RetryConfig;
  checkRetry?: CheckRetry;
  backoff?: Backoff;
  sleep?: SleepFn;
};

type ResolvedSessionOptions = SessionOptions & {
  signer: Signer;
  userAgent: string;
  logger: Logger;
};

export class Session {
  private readonly signer: Signer;
  private readonly host?: string;
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly trace: boolean;
  private readonly limiter?: RequestRateLimiter;
  private readonly transport: Transport;

  constructor(options: ResolvedSessionOptions) {
    this.signer = options.signer;
    this.host = options.host ?? options.signer.host;
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.trace = options.trace ?? false;
    if (options.requestLimit) {
      this.limiter = new RequestRateLimiter(options.requestLimit);
    }

    const fetchFn: FetchFn =
      options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    const sign = (request: OutgoingRequest) => this.sign(request);
    const base = createFetchTransport({ fetch: fetchFn, sign });
    this.transport = options.retries
      ? withRetries(base, {
          config: options.retries,
          sign,
          logger: this.logger,
          checkRetry: options.checkRetry,
          backoff: options.backoff,
          sleep: options.sleep,
        })
      : base;
  }

  /**
   * Send `request`, optionally with one JSON `input` body, and decode a
   * 2xx body with `output`. Non-2xx responses are returned as-is.
   */
  async execute<T = unknown>(
    request: RequestDescriptor,
    output?: OutputSchema<T>,
    ...input: unknown[]
  ): Promise<SessionResponse<T>> {
    if (input.length > 1) {
      throw new InvalidArgumentError(
        `expected at most one input value, got ${input.length}`
      );
    }

    const outgoing: OutgoingRequest = {
      method: request.method,
      url: buildUrl(request.path, this.host, request.query),
      headers: buildHeaders(request, this.userAgent),
    };
    if (input.length === 1) {
      outgoing.body = marshal(input[0]);
    }

    const signal = request.options?.signal;
    const logger = this.log(request.options);
    if (this.limiter) {
      await this.limiter.acquire(signal);
    }
    await this.sign(outgoing);

    const raw = await this.transport.send(
      outgoing,
      signal,
      this.trace ? logger : undefined
    );
    const response = new SessionResponse<T>({
      status: raw.status,
      statusText: raw.statusText,
      headers: raw.headers,
      url: raw.url || outgoing.url.toString(),
      body: new Uint8Array(await raw.arrayBuffer()),
    });

    if (!output || !expectsBody(response.status)) {
      return response;
    }
    return response.withData(decode(response, output));
  }

  /**
   * Sign `request` in place.
   */
  async sign(request: OutgoingRequest): Promise<void> {
    try {
      await this.signer.sign(request);
    } catch (error) {
      throw new SigningError(error);
    }
  }

  /**
   * The per-call logger when one is given, otherwise the session's.
   */
  log(options?: CallOptions): Logger {
    return options?.logger ?? this.logger;
  }
}

function marshal(value: unknown): string {
  let body: string | undefined;
  try {
    body = JSON.stringify(value);
  } catch (error) {
    throw new MarshalingError(error);
  }
  if (body === undefined) {
    throw new MarshalingError(`${typeof value} has no JSON representation`);
  }
  return body;
}

function decode<T>(response: SessionResponse, output: OutputSchema<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(response.text());
  } catch (error) {
    throw new UnmarshalingError(response, error);
  }
  const result = output.safeParse(parsed);
  if (!result.success) {
    throw new UnmarshalingError(response, result.error);
  }
  return result.data;
}

/**
 * The decoded body, or UnmarshalingError when there is none.
 */
export function expectData<T>(response: SessionResponse<T>): T {
  if (response.data === undefined) {
    throw new UnmarshalingError(response, "response carried no decoded body");
  }
  return response.data;
}

/**
 * Build a Session, reporting every invalid option at once.
 */
export function createSession(options: SessionOptions = {}): Session {
  const errors: Error[] = [];

  if (options.userAgent !== undefined && options.userAgent.trim() === "") {
    errors.push(new Error("user agent cannot be empty"));
  }
  if (
    options.requestLimit !== undefined &&
    (!Number.isFinite(options.requestLimit) || options.requestLimit < 0)
  ) {
    errors.push(new Error("request limit cannot be negative"));
  }
  if (options.retries) {
    for (const error of validateRetryConfig(options.retries)) {
      errors.push(
        new Error(`retry configuration failed: ${error.message}`, { cause: error })
      );
    }
  }

  let signer = options.signer;
  if (!signer) {
    try {
      signer = EdgeGridSigner.fromEnv();
    } catch (error) {
      errors.push(
        new Error(`loading credentials: ${getErrorMessage(error)}`, { cause: error })
      );
    }
  }

  if (errors.length > 0 || !signer) {
    throw new SessionConfigError(errors);
  }

  return new Session({
    ...options,
    signer,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    logger: options.logger ?? noopLogger,
  });
}
