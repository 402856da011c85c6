/**
 * Audit Engine — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AuditEngine, createAuditEngine } from "./engine.js";
import { anySignal, runPool } from "./pool.js";
import { FakeScopeDirectory } from "../directory/fake-directory.js";
import type { ScopeDirectoryClient } from "../directory/types.js";
import { ConfigurationError, PermanentRemoteError } from "../errors.js";
import { createAuditLogger, MemoryTransport } from "../logging/index.js";
import type { ProviderRecord } from "../types.js";

const NOW = new Date("2025-06-15T12:00:00Z");
const NO_DELAY = { maxAttempts: 2, minDelayMs: 0, maxDelayMs: 0 };

function contoso(): FakeScopeDirectory {
  return new FakeScopeDirectory({
    scopes: [
      { id: "contoso-root", children: ["it-div", "finance"] },
      { id: "it-div", children: ["/subscriptions/sub-it"] },
      { id: "finance" },
      { id: "/subscriptions/sub-it" },
    ],
  })
    .addAssignment("it-div", "StandingGrant", {
      name: "ra-alice",
      scope: "it-div",
      principalId: "alice",
      principalType: "User",
      roleDefinitionId: "reader",
      roleDefinitionName: "Reader",
    })
    .addAssignment("contoso-root", "StandingGrant", {
      name: "ra-ops",
      scope: "contoso-root",
      principalId: "ops",
      principalType: "Group",
      roleDefinitionId: "owner",
      roleDefinitionName: "Owner",
    });
}

class SlowDirectory extends FakeScopeDirectory {
  active = 0;
  maxActive = 0;

  async getStandingGrants(scopeId: string): Promise<ProviderRecord[]> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.active--;
    return super.getStandingGrants(scopeId);
  }
}

describe("runPool", () => {
  it("never runs more than the limit at once", async () => {
    let active = 0;
    let maxActive = 0;
    const seen: number[] = [];

    await runPool([1, 2, 3, 4, 5], 2, async (n) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      seen.push(n);
      active--;
    });

    expect(maxActive).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("returns items not started once the signal fires", async () => {
    const controller = new AbortController();
    const result = await runPool(["a", "b", "c"], 1, async (item) => {
      if (item === "a") controller.abort();
    }, controller.signal);

    expect(result.notStarted).toEqual(["b", "c"]);
  });
});

describe("anySignal", () => {
  it("aborts when any input aborts", () => {
    const a = new AbortController();
    const b = new AbortController();
    const { signal } = anySignal([a.signal, b.signal]);

    expect(signal.aborted).toBe(false);
    b.abort("stop");
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe("stop");
  });

  it("is already aborted when an input is", () => {
    const a = new AbortController();
    a.abort();
    expect(anySignal([a.signal]).signal.aborted).toBe(true);
  });

  it("stops following the inputs once disposed", () => {
    const a = new AbortController();
    const removed = vi.spyOn(a.signal, "removeEventListener");
    const combined = anySignal([a.signal]);

    combined.dispose();
    a.abort();

    expect(removed).toHaveBeenCalledTimes(1);
    expect(combined.signal.aborted).toBe(false);
  });
});

describe("AuditEngine", () => {
  let directory: FakeScopeDirectory;

  beforeEach(() => {
    directory = contoso();
  });

  it("reports a grant bound at the reporting scope as Direct", async () => {
    const report = await createAuditEngine(directory).run(["contoso-root"], { now: NOW });

    const alice = report.records.find((r) => r.principal.id === "alice" && r.scopeId === "it-div");
    expect(alice).toMatchObject({
      scopeId: "it-div",
      inheritance: "Direct",
      lifecycleState: "Active",
      principal: { id: "alice", kind: "User" },
    });
    expect(report.nodes.map((n) => n.id)).toEqual(["contoso-root", "finance", "it-div", "/subscriptions/sub-it"]);
    expect(report.incomplete).toBe(false);
    expect(report.evaluatedAt).toBe("2025-06-15T12:00:00.000Z");
  });

  it("reports an ancestor's grant as Inherited when walking from a lower root", async () => {
    const report = await createAuditEngine(directory).run(["it-div"], { now: NOW });

    expect(report.records.map((r) => [r.scopeId, r.principal.id, r.inheritance])).toEqual([
      ["it-div", "ops", "Inherited"],
      ["it-div", "alice", "Direct"],
      ["/subscriptions/sub-it", "ops", "Inherited"],
      ["/subscriptions/sub-it", "alice", "Inherited"],
    ]);
    expect(report.summaries.byScopeKind).toEqual({ ManagementGroup: 2, Subscription: 2 });
  });

  it("completes when a branch is access-denied and lists the skipped scope", async () => {
    directory.failOn("getChildren", "it-div", new PermanentRemoteError("AccessDenied", "denied", "it-div"));

    const report = await createAuditEngine(directory).run(["contoso-root"], { now: NOW, retry: NO_DELAY });

    expect(report.incomplete).toBe(false);
    expect(report.nodes.map((n) => n.id)).toEqual(["contoso-root", "finance", "it-div"]);
    expect(report.skipped).toEqual([
      { scopeId: "it-div", stage: "expand", reason: "AccessDenied", message: "denied" },
    ]);
    expect(report.stats.skippedCount).toBe(1);
  });

  it("does not duplicate records when roots overlap", async () => {
    const report = await createAuditEngine(directory).run(["contoso-root", "it-div"], { now: NOW });

    const keys = report.records.map((r) => `${r.scopeId}|${r.principal.id}`);
    expect(new Set(keys).size).toBe(keys.length);
    expect(report.nodes.find((n) => n.id === "it-div")?.reachableFrom).toEqual(["contoso-root", "it-div"]);
    expect(directory.callsTo("getStandingGrants").filter((id) => id === "it-div")).toHaveLength(1);
  });

  it("collects every requested category", async () => {
    directory.addAssignment("contoso-root", "PolicyAssignment", {
      name: "pa-tags",
      scope: "/providers/Microsoft.Management/managementGroups/contoso-root",
      policyDefinitionId: "/providers/Microsoft.Authorization/policyDefinitions/require-tags",
    });

    const report = await createAuditEngine(directory).run(["contoso-root"], {
      now: NOW,
      includePolicyDomain: true,
      includeEligibleGrants: true,
    });

    expect(directory.callsTo("getEligibleGrants")).toHaveLength(4);
    expect(report.summaries.byCategory).toEqual({ StandingGrant: 6, PolicyAssignment: 4 });
    const policyOnSub = report.records.find(
      (r) => r.category === "PolicyAssignment" && r.scopeId === "/subscriptions/sub-it",
    );
    expect(policyOnSub?.inheritance).toBe("Inherited");
  });

  it("rejects invalid configuration before any remote call", async () => {
    const engine = new AuditEngine(directory);

    await expect(engine.run([])).rejects.toBeInstanceOf(ConfigurationError);
    await expect(engine.run(["contoso-root"], { includeResourceGroups: true })).rejects.toThrow(
      "includeResourceGroups requires includeSubscriptions",
    );
    await expect(engine.run(["contoso-root"], { concurrency: 0 })).rejects.toThrow(
      "concurrency must be a positive integer, got 0",
    );
    await expect(engine.run(["bad root"])).rejects.toThrow('root id "bad root" contains unsupported characters');
    expect(directory.calls).toEqual([]);
  });

  it("rethrows a configuration error raised while collecting", async () => {
    directory.failOn("getStandingGrants", "it-div", new ConfigurationError("A default subscription is required"));

    await expect(createAuditEngine(directory).run(["contoso-root"], { now: NOW, concurrency: 1 })).rejects.toThrow(
      "A default subscription is required",
    );
    expect(directory.callsTo("getStandingGrants")).toEqual(["contoso-root", "it-div"]);
  });

  it("rethrows a configuration error raised while walking", async () => {
    directory.failOn("getChildren", "it-div", new ConfigurationError("bad scope"));

    await expect(createAuditEngine(directory).run(["contoso-root"], { now: NOW })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(directory.callsTo("getStandingGrants")).toEqual([]);
  });

  it("asks the directory to validate roots before any remote call", async () => {
    const validating = Object.assign(contoso(), {
      validateRoots: (roots: readonly string[]) => {
        throw new ConfigurationError(`cannot query ${roots.join(", ")}`);
      },
    });

    await expect(createAuditEngine(validating).run(["contoso-root"])).rejects.toThrow("cannot query contoso-root");
    expect(validating.calls).toEqual([]);
  });

  it("removes its listeners from the caller's signal", async () => {
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, "addEventListener");
    const removed = vi.spyOn(controller.signal, "removeEventListener");

    await createAuditEngine(directory).run(["it-div"], { now: NOW, signal: controller.signal });

    expect(added).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledTimes(1);
  });

  it("bounds the number of scopes collected at once", async () => {
    const slow = new SlowDirectory({
      scopes: [
        { id: "root", children: ["m1", "m2", "m3", "m4", "m5"] },
        { id: "m1" },
        { id: "m2" },
        { id: "m3" },
        { id: "m4" },
        { id: "m5" },
      ],
    });

    const report = await createAuditEngine(slow).run(["root"], { now: NOW, concurrency: 2 });

    expect(slow.maxActive).toBe(2);
    expect(report.stats.scopesCollected).toBe(6);
  });

  it("returns a partial report flagged incomplete when cancelled", async () => {
    const controller = new AbortController();
    directory.onCall((method, scopeId) => {
      if (method === "getStandingGrants" && scopeId === "contoso-root") controller.abort();
    });

    const report = await createAuditEngine(directory).run(["contoso-root"], {
      now: NOW,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(report.incomplete).toBe(true);
    expect(report.stats.scopesCollected).toBe(1);
    expect(report.skipped).toEqual([
      { scopeId: "it-div", stage: "collect", reason: "Cancelled", message: "Run cancelled before scope was collected" },
      { scopeId: "finance", stage: "collect", reason: "Cancelled", message: "Run cancelled before scope was collected" },
      {
        scopeId: "/subscriptions/sub-it",
        stage: "collect",
        reason: "Cancelled",
        message: "Run cancelled before scope was collected",
      },
    ]);
    expect(report.records.map((r) => r.principal.id)).toEqual(["ops"]);
  });

  it("flags the report incomplete when the deadline passes", async () => {
    const slow: ScopeDirectoryClient = {
      getChildren: async () => [],
      getStandingGrants: () => new Promise((resolve) => setTimeout(() => resolve([]), 30)),
      getEligibleGrants: async () => [],
      getPolicyAssignments: async () => [],
    };

    const report = await createAuditEngine(slow).run(["root"], { now: NOW, timeoutMs: 5 });

    expect(report.incomplete).toBe(true);
    expect(report.nodes.map((n) => n.id)).toEqual(["root"]);
  });

  it("logs the run with a shared run id", async () => {
    const memory = new MemoryTransport();
    const logger = createAuditLogger("engine", { transports: [memory] });

    await createAuditEngine(directory, { logger }).run(["it-div"], { now: NOW });

    expect(memory.messages("info")).toEqual([
      "Starting audit of 1 root(s)",
      "Discovered 2 scope(s) from 1 root(s)",
      "Audit finished: 2 scope(s), 4 record(s)",
    ]);
    const runIds = new Set(memory.entries.map((e) => e.runId));
    expect(runIds.size).toBe(1);
    expect([...runIds][0]).toMatch(/^[0-9a-f-]{36}$/);
    expect(memory.entries[1].subsystem).toBe("scope-audit/engine/walker");
  });
});
