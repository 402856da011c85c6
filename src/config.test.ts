/**
 * Scope Audit — Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { assertRunnable, getDefaultConfig, resolveConfig, toRunOptions, validateRootId } from "./config.js";
import { ConfigurationError } from "./errors.js";

function configErrorOf(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("validateRootId", () => {
  it("accepts management group names and scope paths", () => {
    expect(validateRootId("contoso-root")).toBeNull();
    expect(validateRootId("/providers/Microsoft.Management/managementGroups/contoso-root")).toBeNull();
    expect(validateRootId("/subscriptions/sub-1/resourceGroups/rg_app(1)")).toBeNull();
  });

  it("rejects empty, whitespace and malformed ids", () => {
    expect(validateRootId("  ")).toBe("root id is empty");
    expect(validateRootId("contoso root")).toBe('root id "contoso root" contains unsupported characters');
    expect(validateRootId("/subscriptions//rg")).toBe('root id "/subscriptions//rg" contains an empty path segment');
  });
});

describe("assertRunnable", () => {
  it("collects every problem into one error", () => {
    const error = configErrorOf(() => assertRunnable([], { includeResourceGroups: true }));
    expect(error.errors).toEqual([
      "at least one root scope is required",
      "includeResourceGroups requires includeSubscriptions",
    ]);
    expect(error.message).toBe(
      "Invalid audit configuration: at least one root scope is required; includeResourceGroups requires includeSubscriptions",
    );
  });

  it("rejects runs with nothing to collect", () => {
    const error = configErrorOf(() => assertRunnable(["a"], { includeRbac: false }));
    expect(error.errors).toEqual(["nothing to collect: includeRbac is false and includePolicyDomain is not set"]);
  });

  it("rejects eligible grants without RBAC", () => {
    const error = configErrorOf(() =>
      assertRunnable(["a"], { includeRbac: false, includePolicyDomain: true, includeEligibleGrants: true }),
    );
    expect(error.errors).toEqual(["includeEligibleGrants requires includeRbac"]);
  });

  it("accepts a valid combination", () => {
    expect(() =>
      assertRunnable(["a", "/subscriptions/sub-1"], { includeSubscriptions: true, includeResourceGroups: true }),
    ).not.toThrow();
  });
});

describe("resolveConfig", () => {
  it("merges defaults", () => {
    expect(resolveConfig({ roots: ["contoso-root"] }, {})).toEqual({ ...getDefaultConfig(), roots: ["contoso-root"] });
  });

  it("falls back to environment variables", () => {
    const config = resolveConfig(
      {},
      {
        SCOPE_AUDIT_ROOTS: "a, b,",
        SCOPE_AUDIT_CONCURRENCY: "8",
        AZURE_SUBSCRIPTION_ID: "sub-1",
        AZURE_TENANT_ID: "tenant-1",
      },
    );

    expect(config.roots).toEqual(["a", "b"]);
    expect(config.concurrency).toBe(8);
    expect(config.defaultSubscription).toBe("sub-1");
    expect(config.defaultTenantId).toBe("tenant-1");
  });

  it("prefers explicit values over the environment", () => {
    const config = resolveConfig({ roots: ["x"], concurrency: 2 }, { SCOPE_AUDIT_ROOTS: "y", SCOPE_AUDIT_CONCURRENCY: "8" });
    expect(config.roots).toEqual(["x"]);
    expect(config.concurrency).toBe(2);
  });

  it("ignores undefined inputs", () => {
    const config = resolveConfig({ roots: ["x"], includeRbac: undefined, concurrency: undefined }, {});
    expect(config.includeRbac).toBe(true);
    expect(config.concurrency).toBe(4);
  });

  it("merges partial retry settings", () => {
    const config = resolveConfig({ roots: ["x"], retry: { maxAttempts: 5 } }, {});
    expect(config.retry).toEqual({ maxAttempts: 5, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 });
  });

  it("rejects values outside the schema", () => {
    const error = configErrorOf(() => resolveConfig({ roots: ["x"], concurrency: 0 }, {}));
    expect(error.errors.some((e) => e.startsWith("/concurrency: "))).toBe(true);

    expect(() => resolveConfig({ roots: ["x"], logLevel: "loud" }, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({}, { SCOPE_AUDIT_ROOTS: "x", SCOPE_AUDIT_CONCURRENCY: "many" })).toThrow(
      ConfigurationError,
    );
    expect(() => resolveConfig(null, {})).toThrow(ConfigurationError);
  });

  it("rejects conflicting options after merging", () => {
    expect(() => resolveConfig({ roots: ["x"], includeResourceGroups: true }, {})).toThrow(
      "includeResourceGroups requires includeSubscriptions",
    );
  });
});

describe("toRunOptions", () => {
  it("projects the config onto engine options", () => {
    const config = resolveConfig({ roots: ["x"], includePolicyDomain: true, timeoutMs: 60_000 }, {});
    expect(toRunOptions(config)).toEqual({
      includeSubscriptions: false,
      includeResourceGroups: false,
      includeEligibleGrants: false,
      includePolicyDomain: true,
      includeRbac: true,
      concurrency: 4,
      timeoutMs: 60_000,
      retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 },
    });
  });
});
