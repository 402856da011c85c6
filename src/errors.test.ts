/**
 * Scope Audit — Error Taxonomy Tests
 */

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  MalformedDataError,
  PermanentRemoteError,
  TransientRemoteError,
  classifyRemoteError,
  formatErrorMessage,
} from "./errors.js";
import { createAbortError } from "./retry.js";

describe("classifyRemoteError", () => {
  it("maps taxonomy errors", () => {
    expect(classifyRemoteError(new PermanentRemoteError("NotFound", "gone"))).toBe("NotFound");
    expect(classifyRemoteError(new PermanentRemoteError("AccessDenied", "no"))).toBe("AccessDenied");
    expect(classifyRemoteError(new TransientRemoteError("busy"))).toBe("Transient");
    expect(classifyRemoteError(createAbortError())).toBe("Cancelled");
  });

  it("maps SDK error codes", () => {
    expect(classifyRemoteError({ code: "AuthorizationFailed", statusCode: 403 })).toBe("AccessDenied");
    expect(classifyRemoteError({ code: "ManagementGroupNotFound" })).toBe("NotFound");
  });

  it("maps status codes", () => {
    expect(classifyRemoteError({ statusCode: 404 })).toBe("NotFound");
    expect(classifyRemoteError({ statusCode: 401 })).toBe("AccessDenied");
    expect(classifyRemoteError({ status: 403 })).toBe("AccessDenied");
    expect(classifyRemoteError({ statusCode: 429 })).toBe("Transient");
    expect(classifyRemoteError({ statusCode: 502 })).toBe("Transient");
  });

  it("falls back to Unknown", () => {
    expect(classifyRemoteError(new Error("boom"))).toBe("Unknown");
    expect(classifyRemoteError("boom")).toBe("Unknown");
    expect(classifyRemoteError(undefined)).toBe("Unknown");
  });
});

describe("formatErrorMessage", () => {
  it("includes code and status", () => {
    expect(formatErrorMessage({ code: "AuthorizationFailed", statusCode: 403, message: "no access" })).toBe(
      "[AuthorizationFailed] (HTTP 403) no access",
    );
  });

  it("handles plain values", () => {
    expect(formatErrorMessage(null)).toBe("Unknown error");
    expect(formatErrorMessage("plain")).toBe("plain");
    expect(formatErrorMessage(42)).toBe("42");
    expect(formatErrorMessage(new Error("boom"))).toBe("boom");
    expect(formatErrorMessage({})).toBe("Unknown error");
  });
});

describe("error classes", () => {
  it("carry their details", () => {
    const cause = new Error("socket closed");
    const transient = new TransientRemoteError("busy", "/subscriptions/s1", cause);
    expect(transient.name).toBe("TransientRemoteError");
    expect(transient.scopeId).toBe("/subscriptions/s1");
    expect(transient.cause).toBe(cause);

    expect(new MalformedDataError("endTime", "tomorrow").message).toBe('Malformed endTime: "tomorrow"');

    const config = new ConfigurationError("bad", ["a", "b"]);
    expect(config.errors).toEqual(["a", "b"]);
    expect(config).toBeInstanceOf(Error);
  });
});
