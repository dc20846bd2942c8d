import { describe, expect, it } from "vitest";
import { parseHttpDate, parseRfc3339 } from "./http-date";

describe("parseRfc3339", () => {
  it("parses UTC timestamps with milliseconds", () => {
    expect(parseRfc3339("2024-03-05T10:20:30.125Z")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30, 125)
    );
  });

  it("parses timestamps without a fraction", () => {
    expect(parseRfc3339("2024-03-05T10:20:30Z")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30)
    );
  });

  it("truncates sub-millisecond precision", () => {
    expect(parseRfc3339("2024-03-05T10:20:30.123456789Z")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30, 123)
    );
  });

  it("applies numeric offsets", () => {
    expect(parseRfc3339("2024-03-05T12:20:30+02:00")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30)
    );
    expect(parseRfc3339("2024-03-05T05:20:30-05:00")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30)
    );
  });

  it.each([
    "not a date",
    "2024-13-01T00:00:00Z",
    "2023-02-29T00:00:00Z",
    "2024-03-05T24:00:00Z",
    "2024-03-05 10:20:30Z",
    "2024-03-05T10:20:30",
    "Tue, 05 Mar 2024 10:20:30 GMT",
  ])("rejects %s", (value) => {
    expect(parseRfc3339(value)).toBeUndefined();
  });
});

describe("parseHttpDate", () => {
  it("parses GMT dates", () => {
    expect(parseHttpDate("Tue, 05 Mar 2024 10:20:30 GMT")).toBe(
      Date.UTC(2024, 2, 5, 10, 20, 30)
    );
  });

  it.each([
    "2024-03-05T10:20:30Z",
    "Tue, 5 Mar 2024 10:20:30 GMT",
    "Tue, 31 Feb 2024 10:20:30 GMT",
    "Tue, 05 Mar 2024 10:20:30 +0000",
  ])("rejects %s", (value) => {
    expect(parseHttpDate(value)).toBeUndefined();
  });
});
