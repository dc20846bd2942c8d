/**
 * Request descriptors and the outgoing request the transport sends.
 */

import { DEFAULT_USER_AGENT, HEADERS, JSON_MEDIA_TYPE } from "../constants";
import { InvalidArgumentError } from "../errors/errors";
import type { Logger } from "./log";

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

/**
 * Per-call options. When given, they replace the session's ambient
 * logger and add headers the request itself does not set.
 */
export type CallOptions = {
  signal?: AbortSignal;
  logger?: Logger;
  headers?: Record<string, string>;
};

export type RequestDescriptor = {
  method: HttpMethod;
  /** Absolute URL, or a path resolved against the session host */
  path: string;
  /** Undefined values are skipped */
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  options?: CallOptions;
};

/** A request as it goes on the wire; the signer mutates its headers */
export type OutgoingRequest = {
  method: string;
  url: URL;
  headers: Headers;
  body?: string;
};

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Resolve a descriptor path into a URL with a canonical query string.
 */
export function buildUrl(
  path: string,
  host: string | undefined,
  query?: Record<string, QueryValue>
): URL {
  let url: URL;
  if (ABSOLUTE_URL.test(path)) {
    url = new URL(path);
  } else if (host) {
    url = new URL(path, `https://${host}`);
  } else {
    throw new InvalidArgumentError(
      `cannot resolve ${path}: no host configured`
    );
  }

  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      url.searchParams.append(key, String(value));
    }
  }
  canonicalizeQuery(url);
  return url;
}

/**
 * Re-encode the query string form-style with keys in sorted order,
 * so `param1=some param` goes out as `param1=some+param`.
 */
export function canonicalizeQuery(url: URL): void {
  const params = new URLSearchParams(url.search);
  params.sort();
  url.search = params.toString();
}

/**
 * Headers in precedence order: the descriptor's own, then per-call
 * headers it does not set, then defaults for anything still missing.
 */
export function buildHeaders(
  request: RequestDescriptor,
  userAgent: string = DEFAULT_USER_AGENT
): Headers {
  const headers = new Headers(request.headers);
  for (const [name, value] of Object.entries(request.options?.headers ?? {})) {
    if (!headers.has(name)) {
      headers.set(name, value);
    }
  }
  if (!headers.has(HEADERS.userAgent)) {
    headers.set(HEADERS.userAgent, userAgent);
  }
  if (!headers.has(HEADERS.contentType)) {
    headers.set(HEADERS.contentType, JSON_MEDIA_TYPE);
  }
  if (!headers.has(HEADERS.accept)) {
    headers.set(HEADERS.accept, JSON_MEDIA_TYPE);
  }
  return headers;
}

export function cloneRequest(request: OutgoingRequest): OutgoingRequest {
  return {
    method: request.method,
    url: new URL(request.url),
    headers: new Headers(request.headers),
    ...(request.body !== undefined && { body: request.body }),
  };
}
