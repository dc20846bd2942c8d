import { z } from "zod";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  InvalidArgumentError,
  MarshalingError,
  SessionConfigError,
  SigningError,
  UnmarshalingError,
} from "../errors";
import { createMockFetch, jsonResponse } from "../test-utils/fetch";
import { createCountingSigner, TEST_HOST } from "../test-utils/signer";
import type { Logger } from "./log";
import { newRetryConfig } from "./retry";
import { createSession, expectData } from "./session";

const itemSchema = z.object({ id: z.string(), count: z.number() });

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    debug: (message) => lines.push(message),
    info: (message) => lines.push(message),
    warn: (message) => lines.push(message),
    error: (message) => lines.push(message),
  };
  return { logger, lines };
}

describe("Session.execute", () => {
  it("builds, signs and sends the request", async () => {
    const { fetch, calls } = createMockFetch([jsonResponse(200, { id: "a", count: 1 })]);
    const { signer } = createCountingSigner();
    const session = createSession({ signer, fetch, userAgent: "test-agent/1.0" });

    const response = await session.execute(
      { method: "GET", path: "/test/path?param1=some param", query: { b: "2" } },
      itemSchema
    );

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ id: "a", count: 1 });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(`https://${TEST_HOST}/test/path?b=2&param1=some+param`);
    expect(calls[0]?.headers.get("Authorization")).toBe("test-signature-1");
    expect(calls[0]?.headers.get("User-Agent")).toBe("test-agent/1.0");
    expect(calls[0]?.headers.get("Accept")).toBe("application/json");
  });

  it("serializes the input as the JSON body", async () => {
    const { fetch, calls } = createMockFetch([jsonResponse(200, { id: "b", count: 2 })]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    await session.execute({ method: "POST", path: "/items" }, itemSchema, {
      name: "new",
      tags: ["x"],
    });

    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.body).toBe('{"name":"new","tags":["x"]}');
  });

  it("rejects more than one input without sending", async () => {
    const { fetch, calls } = createMockFetch();
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    await expect(
      session.execute({ method: "POST", path: "/items" }, itemSchema, { a: 1 }, { b: 2 })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(calls).toHaveLength(0);
  });

  it("fails to marshal values JSON cannot carry", async () => {
    const { fetch, calls } = createMockFetch();
    const session = createSession({ signer: createCountingSigner().signer, fetch });
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    await expect(
      session.execute({ method: "POST", path: "/items" }, undefined, circular)
    ).rejects.toBeInstanceOf(MarshalingError);
    await expect(
      session.execute({ method: "POST", path: "/items" }, undefined, 10n)
    ).rejects.toBeInstanceOf(MarshalingError);
    await expect(
      session.execute({ method: "POST", path: "/items" }, undefined, undefined)
    ).rejects.toBeInstanceOf(MarshalingError);
    expect(calls).toHaveLength(0);
  });

  it("reports undecodable bodies with the response attached", async () => {
    const { fetch } = createMockFetch([
      new Response("not json", { status: 200 }),
      jsonResponse(200, { id: 5 }),
    ]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    const syntax = await session
      .execute({ method: "GET", path: "/items/1" }, itemSchema)
      .catch((error: unknown) => error);
    expect(syntax).toBeInstanceOf(UnmarshalingError);
    if (syntax instanceof UnmarshalingError) {
      expect(syntax.response.status).toBe(200);
      expect(syntax.response.text()).toBe("not json");
    }

    await expect(
      session.execute({ method: "GET", path: "/items/1" }, itemSchema)
    ).rejects.toBeInstanceOf(UnmarshalingError);
  });

  it("does not decode bodies of 204 or error responses", async () => {
    const { fetch } = createMockFetch([
      new Response(null, { status: 204 }),
      jsonResponse(404, { title: "Not Found" }),
    ]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    const empty = await session.execute({ method: "DELETE", path: "/items/1" }, itemSchema);
    expect(empty.status).toBe(204);
    expect(empty.data).toBeUndefined();

    const missing = await session.execute({ method: "GET", path: "/items/2" }, itemSchema);
    expect(missing.status).toBe(404);
    expect(missing.data).toBeUndefined();
    expect(JSON.parse(missing.text())).toEqual({ title: "Not Found" });
  });

  it("passes transport errors through unwrapped", async () => {
    const failure = new TypeError("fetch failed");
    const { fetch } = createMockFetch([failure]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });

    await expect(session.execute({ method: "GET", path: "/p" })).rejects.toBe(failure);
  });

  it("wraps signer failures", async () => {
    const { fetch, calls } = createMockFetch();
    const session = createSession({
      signer: {
        host: TEST_HOST,
        sign: () => {
          throw new Error("bad key");
        },
      },
      fetch,
    });

    const error = await session.execute({ method: "GET", path: "/p" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SigningError);
    expect(error instanceof Error && error.message).toBe("signing request: bad key");
    expect(calls).toHaveLength(0);
  });

  it("retries through the configured policy", async () => {
    const { fetch, calls } = createMockFetch([
      jsonResponse(500, {}),
      jsonResponse(200, { id: "c", count: 3 }),
    ]);
    const counting = createCountingSigner();
    const session = createSession({
      signer: counting.signer,
      fetch,
      retries: newRetryConfig({ maxRetries: 1 }),
      sleep: async () => {
        /* instant */
      },
    });

    const response = await session.execute({ method: "GET", path: "/items/3" }, itemSchema);

    expect(response.data).toEqual({ id: "c", count: 3 });
    expect(calls).toHaveLength(2);
    expect(counting.count).toBe(2);
  });

  it("dumps traffic to the per-call logger with the signature redacted", async () => {
    const { fetch } = createMockFetch([jsonResponse(200, { id: "d", count: 4 })]);
    const session = createSession({
      signer: createCountingSigner().signer,
      fetch,
      trace: true,
      userAgent: "test-agent/1.0",
    });
    const { logger, lines } = recordingLogger();

    await session.execute({ method: "GET", path: "/items/4", options: { logger } }, itemSchema);

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(
      [
        `--> GET https://${TEST_HOST}/items/4`,
        "accept: application/json",
        "authorization: [redacted]",
        "content-type: application/json",
        "user-agent: test-agent/1.0",
      ].join("\n")
    );
    expect(lines[1]).toContain('{"id":"d","count":4}');
  });

  it("stops when the call is cancelled", async () => {
    const { fetch } = createMockFetch([jsonResponse(200, {})]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });
    const controller = new AbortController();
    const reason = new Error("cancelled");
    controller.abort(reason);

    await expect(
      session.execute({ method: "GET", path: "/p", options: { signal: controller.signal } })
    ).rejects.toBe(reason);
  });
});

describe("Session.log", () => {
  it("prefers the per-call logger", () => {
    const { logger: ambient } = recordingLogger();
    const { logger: perCall } = recordingLogger();
    const session = createSession({ signer: createCountingSigner().signer, logger: ambient });

    expect(session.log()).toBe(ambient);
    expect(session.log({ logger: perCall })).toBe(perCall);
  });
});

describe("expectData", () => {
  it("throws when nothing was decoded", async () => {
    const { fetch } = createMockFetch([jsonResponse(200, {})]);
    const session = createSession({ signer: createCountingSigner().signer, fetch });
    const response = await session.execute({ method: "GET", path: "/p" });

    expect(() => expectData(response)).toThrow(UnmarshalingError);
  });
});

describe("createSession", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reports every invalid option at once", () => {
    let caught: unknown;
    try {
      createSession({
        signer: createCountingSigner().signer,
        userAgent: " ",
        requestLimit: -1,
        retries: newRetryConfig({ maxRetries: -1, minWaitMs: -5 }),
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SessionConfigError);
    if (caught instanceof SessionConfigError) {
      expect(caught.errors.map((e: Error) => e.message)).toEqual([
        "user agent cannot be empty",
        "request limit cannot be negative",
        "retry configuration failed: maximum number of retries cannot be negative",
        "retry configuration failed: minimum retry wait time cannot be negative",
      ]);
    }
  });

  it("reports missing credentials when no signer is given", () => {
    for (const name of ["HOST", "CLIENT_TOKEN", "CLIENT_SECRET", "ACCESS_TOKEN"]) {
      vi.stubEnv(`EDGEGRID_${name}`, "");
    }

    expect(() => createSession()).toThrow(
      "loading credentials: required environment variables missing: " +
        "EDGEGRID_HOST, EDGEGRID_CLIENT_TOKEN, EDGEGRID_CLIENT_SECRET, EDGEGRID_ACCESS_TOKEN"
    );
  });

  it("builds an EdgeGrid signer from the environment", async () => {
    vi.stubEnv("EDGEGRID_HOST", "env.example.test");
    vi.stubEnv("EDGEGRID_CLIENT_TOKEN", "test-client-token");
    vi.stubEnv("EDGEGRID_CLIENT_SECRET", "test-secret");
    vi.stubEnv("EDGEGRID_ACCESS_TOKEN", "test-access-token");
    const { fetch, calls } = createMockFetch([jsonResponse(200, {})]);

    const session = createSession({ fetch });
    await session.execute({ method: "GET", path: "/p" });

    expect(calls[0]?.url).toBe("https://env.example.test/p");
    expect(calls[0]?.headers.get("Authorization")).toMatch(
      /^EG1-HMAC-SHA256 client_token=test-client-token;access_token=test-access-token;/
    );
  });
});
