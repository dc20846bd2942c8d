import type { FetchFn } from "../session/transport";

export type RecordedCall = {
  method: string;
  url: string;
  headers: Headers;
  body?: string;
};

/** A canned response, a thrown transport error, or a handler */
export type MockReply =
  | Response
  | Error
  | ((call: RecordedCall) => Response | Promise<Response>);

export function formatFetchCall(call: RecordedCall): string {
  return `${call.method} ${call.url}`;
}

export function jsonResponse(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): Response {
  const payload =
    body === undefined ? null : typeof body === "string" ? body : JSON.stringify(body);
  return new Response(payload, {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Fetch stand-in that answers calls with `replies` in order and records
 * each request. Calls beyond the scripted replies fail loudly.
 */
export function createMockFetch(replies: MockReply[] = []) {
  const queue = [...replies];
  const calls: RecordedCall[] = [];

  const fetch: FetchFn = async (input, init) => {
    const call: RecordedCall = {
      method: init?.method ?? "GET",
      url: String(input),
      headers: new Headers(init?.headers),
      ...(typeof init?.body === "string" && { body: init.body }),
    };
    calls.push(call);
    init?.signal?.throwIfAborted();

    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`Unmocked fetch: ${formatFetchCall(call)}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(call) : reply;
  };

  return { fetch, calls };
}
