/**
 * Request/response dumps for --trace style debugging. The transport
 * writes one pair per hop, so redirects and retries each show up.
 */

import { HEADERS } from "../constants";
import type { OutgoingRequest } from "./request";

const REDACTED = "[redacted]";

function formatHeaders(headers: Headers): string[] {
  const lines: string[] = [];
  headers.forEach((value, name) => {
    const shown = name === HEADERS.authorization.toLowerCase() ? REDACTED : value;
    lines.push(`${name}: ${shown}`);
  });
  return lines;
}

export function dumpRequest(request: OutgoingRequest): string {
  const lines = [`--> ${request.method} ${request.url.toString()}`, ...formatHeaders(request.headers)];
  if (request.body !== undefined) {
    lines.push("", request.body);
  }
  return lines.join("\n");
}

/**
 * Reads a clone of the body, leaving `response` unread for the caller.
 */
export async function dumpResponse(response: Response, requestUrl: URL): Promise<string> {
  const url = response.url || requestUrl.toString();
  const lines = [`<-- ${response.status} ${url}`, ...formatHeaders(response.headers)];
  const body = await response.clone().text();
  if (body.length > 0) {
    lines.push("", body);
  }
  return lines.join("\n");
}
