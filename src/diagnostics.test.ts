/**
 * Scope Audit — Diagnostics Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  instrumentedCall,
  onAuditDiagnosticEvent,
  resetAuditDiagnosticsForTest,
  type AuditDiagnosticEvent,
} from "./diagnostics.js";

beforeEach(() => {
  resetAuditDiagnosticsForTest();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("instrumentedCall", () => {
  it("runs the call untouched without listeners", async () => {
    await expect(instrumentedCall("policy", "list", async () => 7)).resolves.toBe(7);
  });

  it("emits a call event with scope and duration", async () => {
    const events: AuditDiagnosticEvent[] = [];
    onAuditDiagnosticEvent((e) => events.push(e));

    await instrumentedCall("resources", "resourceGroups.list", async () => [], {
      scopeId: "/subscriptions/sub-1",
      metadata: { kind: "Subscription" },
    });

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "audit.api.call",
      service: "resources",
      operation: "resourceGroups.list",
      scopeId: "/subscriptions/sub-1",
      metadata: { kind: "Subscription" },
    });
    expect(events[0].durationMs).toBeGreaterThanOrEqual(0);
    expect(events[0].timestamp).toBeGreaterThan(0);
  });

  it("emits an error event and rethrows", async () => {
    const events: AuditDiagnosticEvent[] = [];
    onAuditDiagnosticEvent((e) => events.push(e));
    const failure = { statusCode: 403, code: "AuthorizationFailed", message: "no access" };

    await expect(
      instrumentedCall("authorization", "roleAssignments.listForScope", () => Promise.reject(failure)),
    ).rejects.toBe(failure);

    expect(events[0]).toMatchObject({
      type: "audit.api.error",
      statusCode: 403,
      error: "[AuthorizationFailed] (HTTP 403) no access",
    });
  });

  it("stops emitting after unsubscribe", async () => {
    const listener = vi.fn();
    const off = onAuditDiagnosticEvent(listener);
    off();

    await instrumentedCall("policy", "list", async () => []);

    expect(listener).not.toHaveBeenCalled();
  });

  it("reports a failing listener as a process warning", async () => {
    const warn = vi.spyOn(process, "emitWarning").mockImplementation(() => undefined);
    const other = vi.fn();
    onAuditDiagnosticEvent(() => {
      throw new Error("listener broke");
    });
    onAuditDiagnosticEvent(other);

    await instrumentedCall("policy", "list", async () => []);

    expect(warn).toHaveBeenCalledWith("Diagnostics listener failed: listener broke");
    expect(other).toHaveBeenCalledTimes(1);
  });
});
