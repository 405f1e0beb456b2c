import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { ListTasksQuerySchema, ServeOptionsSchema, SubmitOptionsSchema, parseOrThrow } from "../src/schemas.js";

function failure(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.message;
    throw err;
  }
  throw new Error("expected a validation error");
}

describe("ServeOptionsSchema", () => {
  it("turns numeric flags into numbers", () => {
    expect(parseOrThrow(ServeOptionsSchema, { port: "8080", simulateDelay: " 250 " })).toEqual({
      port: 8080,
      simulateDelay: 250,
    });
  });

  it("leaves absent flags undefined and drops the others", () => {
    expect(parseOrThrow(ServeOptionsSchema, { host: "0.0.0.0", simulate: true })).toEqual({});
  });

  it("rejects a port that is not a number", () => {
    expect(failure(() => parseOrThrow(ServeOptionsSchema, { port: "abc" }))).toBe("--port must be a number");
  });

  it("rejects a port out of range", () => {
    expect(failure(() => parseOrThrow(ServeOptionsSchema, { port: "70000" }))).toBe(
      "--port must be at most 65535",
    );
  });

  it("rejects a fractional or empty delay", () => {
    expect(failure(() => parseOrThrow(ServeOptionsSchema, { simulateDelay: "1.5" }))).toBe(
      "--simulate-delay must be an integer",
    );
    expect(failure(() => parseOrThrow(ServeOptionsSchema, { simulateDelay: "" }))).toBe(
      "--simulate-delay must not be empty",
    );
  });
});

describe("SubmitOptionsSchema", () => {
  it("requires a positive interval", () => {
    expect(parseOrThrow(SubmitOptionsSchema, { url: "http://127.0.0.1:3000", interval: "500" })).toEqual({
      interval: 500,
    });
    expect(failure(() => parseOrThrow(SubmitOptionsSchema, { interval: "0" }))).toBe(
      "--interval must be at least 1",
    );
  });
});

describe("ListTasksQuerySchema", () => {
  it("bounds the limit", () => {
    expect(parseOrThrow(ListTasksQuerySchema, { limit: "10" })).toEqual({ limit: 10 });
    expect(parseOrThrow(ListTasksQuerySchema, {})).toEqual({});
    expect(failure(() => parseOrThrow(ListTasksQuerySchema, { limit: "501" }))).toBe("limit must be at most 500");
  });
});
