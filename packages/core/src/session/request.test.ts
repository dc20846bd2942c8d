import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors";
import { buildHeaders, buildUrl, cloneRequest } from "./request";

describe("buildUrl", () => {
  it("resolves paths against the host over https", () => {
    const url = buildUrl("/test/path", "test.host");
    expect(url.toString()).toBe("https://test.host/test/path");
  });

  it("form-encodes the query string", () => {
    const url = buildUrl("/test/path?param1=some param", "test.host");
    expect(url.toString()).toBe("https://test.host/test/path?param1=some+param");
  });

  it("sorts keys and keeps values of repeated keys in order", () => {
    const url = buildUrl("/p?b=2&a=1&b=1", "test.host", { c: "3" });
    expect(url.search).toBe("?a=1&b=2&b=1&c=3");
  });

  it("adds query values and skips undefined ones", () => {
    const url = buildUrl("/p", "test.host", {
      groupId: "grp_1",
      contractId: undefined,
      validateRules: false,
      version: 3,
    });
    expect(url.search).toBe("?groupId=grp_1&validateRules=false&version=3");
  });

  it("keeps absolute URLs", () => {
    const url = buildUrl("http://other.test/x?z=1", "test.host");
    expect(url.toString()).toBe("http://other.test/x?z=1");
  });

  it("drops an empty query string", () => {
    expect(buildUrl("/p?", "test.host").toString()).toBe("https://test.host/p");
  });

  it("rejects relative paths without a host", () => {
    expect(() => buildUrl("/p", undefined)).toThrow(InvalidArgumentError);
  });
});

describe("buildHeaders", () => {
  it("fills defaults for missing headers", () => {
    const headers = buildHeaders({ method: "GET", path: "/p" }, "test-agent/1.0");
    expect(headers.get("User-Agent")).toBe("test-agent/1.0");
    expect(headers.get("Content-Type")).toBe("application/json");
    expect(headers.get("Accept")).toBe("application/json");
  });

  it("prefers request headers over per-call headers", () => {
    const headers = buildHeaders(
      {
        method: "GET",
        path: "/p",
        headers: { Accept: "application/vnd.test+json" },
        options: { headers: { accept: "text/plain", "X-Trace": "abc" } },
      },
      "test-agent/1.0"
    );
    expect(headers.get("Accept")).toBe("application/vnd.test+json");
    expect(headers.get("X-Trace")).toBe("abc");
  });

  it("lets per-call headers replace defaults", () => {
    const headers = buildHeaders(
      {
        method: "GET",
        path: "/p",
        options: { headers: { "User-Agent": "custom" } },
      },
      "test-agent/1.0"
    );
    expect(headers.get("User-Agent")).toBe("custom");
  });

  it("does not mutate the descriptor", () => {
    const descriptor = {
      method: "GET" as const,
      path: "/p",
      headers: { "X-One": "1" },
    };
    buildHeaders(descriptor, "test-agent/1.0");
    expect(descriptor.headers).toEqual({ "X-One": "1" });
  });
});

describe("cloneRequest", () => {
  it("copies headers so signing a clone leaves the original alone", () => {
    const original = {
      method: "GET",
      url: new URL("https://test.host/p"),
      headers: new Headers({ Authorization: "first" }),
    };
    const copy = cloneRequest(original);
    copy.headers.set("Authorization", "second");

    expect(original.headers.get("Authorization")).toBe("first");
    expect(copy.url.toString()).toBe("https://test.host/p");
  });
});
