import { describe, expect, it } from "vitest";
import { encodeUtf8 } from "../utils/encoding";
import { ApiError, isApiError, isNotFoundError, newApiError } from "./api-error";
import { OperationError } from "./errors";

const problem = {
  type: "https://problems.example.test/not-found",
  title: "Not Found",
  detail: "Property prp_1 was not found",
  instance: "/papi/v1/properties/prp_1",
};

describe("newApiError", () => {
  it("decodes problem details from the body", () => {
    const error = newApiError(encodeUtf8(JSON.stringify(problem)), 404);

    expect(error.type).toBe(problem.type);
    expect(error.title).toBe("Not Found");
    expect(error.detail).toBe(problem.detail);
    expect(error.instance).toBe(problem.instance);
    expect(error.statusCode).toBe(404);
  });

  it("keeps only the status code when the body is not JSON", () => {
    const error = newApiError("<html>bad gateway</html>", 502);

    expect(error.statusCode).toBe(502);
    expect(error.title).toBe("");
    expect(error.type).toBe("");
    expect(error.detail).toBe("");
  });

  it("drops only the fields that have the wrong type", () => {
    const nullDetail = newApiError(
      JSON.stringify({ type: "not_found", title: "Not Found", detail: null }),
      404
    );
    expect(nullDetail.type).toBe("not_found");
    expect(nullDetail.title).toBe("Not Found");
    expect(nullDetail.detail).toBe("");

    const stringLimit = newApiError(
      JSON.stringify({ type: "rate", title: "Too Many", detail: "d", limit: "10" }),
      429
    );
    const expected = new ApiError({
      type: "rate",
      title: "Too Many",
      detail: "d",
      statusCode: 429,
    });
    expect(stringLimit.is(expected)).toBe(true);
    expect(stringLimit.limit).toBeUndefined();
  });

  it("keeps only the status code when the body is not an object", () => {
    const error = newApiError(JSON.stringify(["not", "an", "object"]), 400);
    expect(error.title).toBe("");
    expect(error.statusCode).toBe(400);
  });

  it("keeps rate-limit and nested error fields", () => {
    const error = newApiError(
      JSON.stringify({
        title: "Too Many Requests",
        limitKey: "DEFAULT",
        remaining: 0,
        errors: [{ title: "inner" }],
      }),
      429
    );
    expect(error.limitKey).toBe("DEFAULT");
    expect(error.remaining).toBe(0);
    expect(error.errors).toEqual([{ title: "inner" }]);
  });
});

describe("ApiError", () => {
  it("renders its fields in the message", () => {
    const error = new ApiError({ title: "Conflict", statusCode: 409 });
    expect(error.message).toBe(
      'API error:\n{\n  "type": "",\n  "title": "Conflict",\n  "detail": "",\n  "statusCode": 409\n}'
    );
  });

  it("compares type, title, detail and status", () => {
    const a = new ApiError({ ...problem, statusCode: 404 });
    const b = new ApiError({ ...problem, instance: "/other", statusCode: 404 });
    const c = new ApiError({ ...problem, statusCode: 410 });

    expect(a.is(b)).toBe(true);
    expect(a.is(c)).toBe(false);
  });
});

describe("isApiError", () => {
  it("finds an API error through wrappers", () => {
    const wrapped = new OperationError(
      "fetching rule tree",
      new ApiError({ ...problem, statusCode: 404 })
    );

    expect(isApiError(wrapped)).toBe(true);
    expect(isApiError(wrapped, { ...problem, statusCode: 404 })).toBe(true);
    expect(isApiError(wrapped, { title: "Other", statusCode: 404 })).toBe(false);
    expect(isApiError(new Error("plain"))).toBe(false);
  });
});

describe("isNotFoundError", () => {
  it("is true for 404 only", () => {
    expect(isNotFoundError(new OperationError("op", new ApiError({ statusCode: 404 })))).toBe(
      true
    );
    expect(isNotFoundError(new ApiError({ statusCode: 403 }))).toBe(false);
    expect(isNotFoundError(undefined)).toBe(false);
  });
});
