import type { FetchFn } from "@propctl/core";

export type RecordedRequest = {
  method: string;
  url: URL;
  headers: Headers;
  body?: string;
};

/** One canned API endpoint, matched on method and path */
export type MockRoute = {
  method: string;
  path: string;
  status?: number;
  response?: unknown;
};

export function formatFetchCall(request: RecordedRequest): string {
  return `${request.method} ${request.url.toString()}`;
}

/**
 * Fetch stand-in serving `routes`. Each route answers every matching call
 * with a fresh JSON response; anything else fails the call.
 */
export function createRouteFetch(routes: MockRoute[]) {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url: new URL(String(input)),
      headers: new Headers(init?.headers),
      ...(typeof init?.body === "string" && { body: init.body }),
    };
    requests.push(request);

    const route = routes.find(
      (candidate) =>
        candidate.method === request.method &&
        candidate.path === request.url.pathname
    );
    if (!route) {
      throw new Error(`Unmocked fetch: ${formatFetchCall(request)}`);
    }

    return new Response(
      route.response === undefined ? null : JSON.stringify(route.response),
      {
        status: route.status ?? 200,
        headers: { "Content-Type": "application/json" },
      }
    );
  };

  return { fetch, requests };
}
