/**
 * Scope Audit — Error Taxonomy
 *
 * Remote failures are split into transient (retried) and permanent (branch or
 * scope skipped). Configuration errors fail the run before any remote call.
 */

import type { SkipReason } from "./types.js";
import { shouldRetryAuditError } from "./retry.js";

export type PermanentReason = "NotFound" | "AccessDenied";

export class TransientRemoteError extends Error {
  constructor(
    message: string,
    public readonly scopeId?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "TransientRemoteError";
  }
}

export class PermanentRemoteError extends Error {
  constructor(
    public readonly reason: PermanentReason,
    message: string,
    public readonly scopeId?: string,
  ) {
    super(message);
    this.name = "PermanentRemoteError";
  }
}

/** Unparseable temporal or identity fields. Recorded on the record, never thrown out of classification. */
export class MalformedDataError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(`Malformed ${field}: ${JSON.stringify(value)}`);
    this.name = "MalformedDataError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly errors: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const NOT_FOUND_CODES = new Set([
  "NotFound",
  "ResourceNotFound",
  "ResourceGroupNotFound",
  "SubscriptionNotFound",
  "ManagementGroupNotFound",
  "ParentResourceNotFound",
]);

const ACCESS_DENIED_CODES = new Set([
  "AccessDenied",
  "AuthorizationFailed",
  "Forbidden",
  "Unauthorized",
  "InvalidAuthenticationToken",
  "LinkedAuthorizationFailed",
]);

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Map any error raised by a directory call onto a skip reason.
 */
export function classifyRemoteError(error: unknown): SkipReason {
  if (error instanceof PermanentRemoteError) return error.reason;
  if (error instanceof TransientRemoteError) return "Transient";
  if (error instanceof Error && error.name === "AbortError") return "Cancelled";
  if (error === null || typeof error !== "object") return "Unknown";

  const code = readField(error, "code");
  if (typeof code === "string") {
    if (NOT_FOUND_CODES.has(code)) return "NotFound";
    if (ACCESS_DENIED_CODES.has(code)) return "AccessDenied";
  }

  const statusCode = readField(error, "statusCode") ?? readField(error, "status");
  if (statusCode === 404) return "NotFound";
  if (statusCode === 401 || statusCode === 403) return "AccessDenied";

  if (shouldRetryAuditError(error)) return "Transient";
  return "Unknown";
}

/**
 * Format an error into a one-line message for logs and skip entries.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (typeof error !== "object") return String(error);

  const code = readField(error, "code");
  const message = readField(error, "message");
  const statusCode = readField(error, "statusCode");

  const parts: string[] = [];
  if (typeof code === "string" && code) parts.push(`[${code}]`);
  if (typeof statusCode === "number" || (typeof statusCode === "string" && statusCode)) {
    parts.push(`(HTTP ${statusCode})`);
  }
  parts.push(typeof message === "string" && message ? message : "Unknown error");

  return parts.join(" ");
}
