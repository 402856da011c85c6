/**
 * Scope audit configuration schema (TypeBox), defaults and validation.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "./errors.js";
import type { AuditRunOptions, AuditScopeOptions } from "./types.js";

export const configSchema = Type.Object({
  roots: Type.Array(Type.String({ description: "Root scope id (management group name or scope path)" })),
  includeSubscriptions: Type.Optional(Type.Boolean({ description: "Expand subscriptions into resource groups" })),
  includeResourceGroups: Type.Optional(Type.Boolean({ description: "Expand resource groups into resources" })),
  includeEligibleGrants: Type.Optional(Type.Boolean({ description: "Collect eligible (time-bound) role grants" })),
  includePolicyDomain: Type.Optional(Type.Boolean({ description: "Collect policy assignments" })),
  includeRbac: Type.Optional(Type.Boolean({ description: "Collect RBAC role grants" })),
  concurrency: Type.Optional(Type.Integer({ minimum: 1, maximum: 64 })),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ]),
  ),
  credentialMethod: Type.Optional(
    Type.Union([
      Type.Literal("default"),
      Type.Literal("cli"),
      Type.Literal("service-principal"),
      Type.Literal("managed-identity"),
    ]),
  ),
  defaultSubscription: Type.Optional(Type.String({ description: "Subscription used for tenant-level API clients" })),
  defaultTenantId: Type.Optional(Type.String()),
  retry: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
      minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      jitterFactor: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
    }),
  ),
  diagnostics: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
    }),
  ),
});

export type ScopeAuditConfig = Static<typeof configSchema>;

export function getDefaultConfig(): Omit<ScopeAuditConfig, "roots"> {
  return {
    includeSubscriptions: false,
    includeResourceGroups: false,
    includeEligibleGrants: false,
    includePolicyDomain: false,
    includeRbac: true,
    concurrency: 4,
    timeoutMs: 0,
    logLevel: "info",
    credentialMethod: "default",
    retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 },
    diagnostics: { enabled: false },
  };
}

const ROOT_ID_PATTERN = /^[A-Za-z0-9_\-.()/]+$/;

/**
 * Returns a reason when the root id is unusable, otherwise null.
 */
export function validateRootId(rootId: string): string | null {
  if (rootId.trim().length === 0) return "root id is empty";
  if (!ROOT_ID_PATTERN.test(rootId)) return `root id "${rootId}" contains unsupported characters`;
  if (rootId.includes("//")) return `root id "${rootId}" contains an empty path segment`;
  return null;
}

/**
 * Reject root lists and option combinations the engine cannot run with.
 * Runs before any remote call is issued.
 */
export function assertRunnable(roots: readonly string[], options: AuditScopeOptions): void {
  const errors: string[] = [];

  if (roots.length === 0) errors.push("at least one root scope is required");
  for (const root of roots) {
    const problem = validateRootId(root);
    if (problem) errors.push(problem);
  }

  if (options.includeResourceGroups && !options.includeSubscriptions) {
    errors.push("includeResourceGroups requires includeSubscriptions");
  }
  if (options.includeRbac === false && !options.includePolicyDomain) {
    errors.push("nothing to collect: includeRbac is false and includePolicyDomain is not set");
  }
  if (options.includeRbac === false && options.includeEligibleGrants) {
    errors.push("includeEligibleGrants requires includeRbac");
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid audit configuration: ${errors.join("; ")}`, errors);
  }
}

/**
 * Validate raw config input against the schema, merge defaults and environment
 * fallbacks, and check option consistency.
 */
export function resolveConfig(
  input: unknown,
  env: Record<string, string | undefined> = process.env,
): ScopeAuditConfig {
  const defaults = getDefaultConfig();
  const candidate = mergeEnv(input, env);

  if (!Value.Check(configSchema, candidate)) {
    const errors = [...Value.Errors(configSchema, candidate)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigurationError(`Invalid audit configuration: ${errors.join("; ")}`, errors);
  }

  const config: ScopeAuditConfig = {
    ...defaults,
    ...candidate,
    retry: { ...defaults.retry, ...candidate.retry },
    diagnostics: { ...defaults.diagnostics, ...candidate.diagnostics },
  };

  assertRunnable(config.roots, config);
  return config;
}

function mergeEnv(input: unknown, env: Record<string, string | undefined>): unknown {
  if (input === null || typeof input !== "object" || Array.isArray(input)) return input;

  const merged: Record<string, unknown> = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
  if (merged.roots === undefined && env.SCOPE_AUDIT_ROOTS) {
    merged.roots = env.SCOPE_AUDIT_ROOTS.split(",").map((r) => r.trim()).filter(Boolean);
  }
  if (merged.concurrency === undefined && env.SCOPE_AUDIT_CONCURRENCY) {
    merged.concurrency = Number(env.SCOPE_AUDIT_CONCURRENCY);
  }
  if (merged.defaultSubscription === undefined && env.AZURE_SUBSCRIPTION_ID) {
    merged.defaultSubscription = env.AZURE_SUBSCRIPTION_ID;
  }
  if (merged.defaultTenantId === undefined && env.AZURE_TENANT_ID) {
    merged.defaultTenantId = env.AZURE_TENANT_ID;
  }
  return merged;
}

/**
 * Project a resolved config onto the engine's run options.
 */
export function toRunOptions(config: ScopeAuditConfig): AuditRunOptions {
  return {
    includeSubscriptions: config.includeSubscriptions,
    includeResourceGroups: config.includeResourceGroups,
    includeEligibleGrants: config.includeEligibleGrants,
    includePolicyDomain: config.includePolicyDomain,
    includeRbac: config.includeRbac,
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
  };
}
