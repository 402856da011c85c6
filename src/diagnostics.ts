/**
 * Scope Audit — Diagnostics
 *
 * Traces directory API calls. Tracing is on while at least one listener is
 * subscribed; with none, `instrumentedCall` runs the call untouched.
 */

import { formatErrorMessage } from "./errors.js";

export type AuditDiagnosticEvent = {
  type: "audit.api.call" | "audit.api.error";
  timestamp: number;
  service: string;
  operation: string;
  scopeId?: string;
  durationMs: number;
  statusCode?: number;
  error?: string;
  metadata?: Record<string, unknown>;
};

export type AuditDiagnosticListener = (event: AuditDiagnosticEvent) => void;

const listeners = new Set<AuditDiagnosticListener>();

/** Subscribe to call events. Returns an unsubscribe function. */
export function onAuditDiagnosticEvent(listener: AuditDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

function emit(event: AuditDiagnosticEvent): void {
  for (const listener of listeners) {
    try {
      listener(event);
    } catch (error) {
      process.emitWarning(`Diagnostics listener failed: ${formatErrorMessage(error)}`);
    }
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (error === null || typeof error !== "object") return undefined;
  const status = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : undefined;
}

/**
 * Run a directory API call, reporting its duration and outcome to listeners.
 */
export async function instrumentedCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  options?: {
    scopeId?: string;
    metadata?: Record<string, unknown>;
  },
): Promise<T> {
  if (listeners.size === 0) return fn();

  const start = Date.now();
  const base = { service, operation, scopeId: options?.scopeId, metadata: options?.metadata };

  try {
    const result = await fn();
    emit({ ...base, type: "audit.api.call", timestamp: Date.now(), durationMs: Date.now() - start });
    return result;
  } catch (error) {
    emit({
      ...base,
      type: "audit.api.error",
      timestamp: Date.now(),
      durationMs: Date.now() - start,
      statusCode: statusCodeOf(error),
      error: formatErrorMessage(error),
    });
    throw error;
  }
}

export function resetAuditDiagnosticsForTest(): void {
  listeners.clear();
}
