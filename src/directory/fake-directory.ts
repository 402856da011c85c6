/**
 * In-memory Scope Directory
 *
 * Serves a fixed hierarchy and assignment set from memory. Used for tests and
 * offline dry runs. Assignment lookups return the records registered on the
 * scope and on every ancestor, the way the remote service reports effective grants.
 */

import { PermanentRemoteError } from "../errors.js";
import { inferScopeKind, lastSegment } from "../scopes.js";
import type { AssignmentCategory, ProviderRecord, ScopeChild, ScopeKind } from "../types.js";
import type { ScopeDirectoryClient } from "./types.js";

export type FakeDirectoryMethod =
  | "getChildren"
  | "getStandingGrants"
  | "getEligibleGrants"
  | "getPolicyAssignments"
  | "resolveRoot";

export type FakeScope = {
  id: string;
  displayName?: string;
  kind?: ScopeKind;
  children?: string[];
};

export type FakeScopeDirectoryData = {
  scopes: FakeScope[];
  assignments?: Array<{ scopeId: string; category: AssignmentCategory; record: ProviderRecord }>;
};

type Failure = {
  error: unknown;
  /** Number of calls that fail before the call starts succeeding. Omitted: always fails. */
  remaining?: number;
};

const CATEGORY_METHOD: Record<AssignmentCategory, FakeDirectoryMethod> = {
  StandingGrant: "getStandingGrants",
  EligibleGrant: "getEligibleGrants",
  PolicyAssignment: "getPolicyAssignments",
};

export class FakeScopeDirectory implements ScopeDirectoryClient {
  readonly calls: Array<{ method: FakeDirectoryMethod; scopeId: string }> = [];
  private scopes = new Map<string, FakeScope>();
  private assignments = new Map<string, ProviderRecord[]>();
  private failures = new Map<string, Failure>();
  private hooks: Array<(method: FakeDirectoryMethod, scopeId: string) => void> = [];
  private rootResolution = false;

  constructor(data?: FakeScopeDirectoryData) {
    for (const scope of data?.scopes ?? []) this.addScope(scope);
    for (const a of data?.assignments ?? []) this.addAssignment(a.scopeId, a.category, a.record);
  }

  addScope(scope: FakeScope): this {
    this.scopes.set(scope.id, scope);
    return this;
  }

  addAssignment(scopeId: string, category: AssignmentCategory, record: ProviderRecord): this {
    const key = `${category}:${scopeId}`;
    const list = this.assignments.get(key) ?? [];
    list.push(record);
    this.assignments.set(key, list);
    return this;
  }

  /** Make `method` fail for `scopeId`, optionally only for the first `times` calls. */
  failOn(method: FakeDirectoryMethod, scopeId: string, error: unknown, times?: number): this {
    this.failures.set(`${method}:${scopeId}`, { error, remaining: times });
    return this;
  }

  /** Run `hook` at the start of every call. */
  onCall(hook: (method: FakeDirectoryMethod, scopeId: string) => void): this {
    this.hooks.push(hook);
    return this;
  }

  /** Expose `resolveRoot` so the walker asks for root details instead of inferring them. */
  enableRootResolution(): this {
    this.rootResolution = true;
    return this;
  }

  callsTo(method: FakeDirectoryMethod): string[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.scopeId);
  }

  async getChildren(scopeId: string): Promise<ScopeChild[]> {
    const scope = await this.enter("getChildren", scopeId);
    return (scope.children ?? []).map((id) => this.describe(id));
  }

  async getStandingGrants(scopeId: string): Promise<ProviderRecord[]> {
    await this.enter(CATEGORY_METHOD.StandingGrant, scopeId);
    return this.effectiveAssignments("StandingGrant", scopeId);
  }

  async getEligibleGrants(scopeId: string): Promise<ProviderRecord[]> {
    await this.enter(CATEGORY_METHOD.EligibleGrant, scopeId);
    return this.effectiveAssignments("EligibleGrant", scopeId);
  }

  async getPolicyAssignments(scopeId: string): Promise<ProviderRecord[]> {
    await this.enter(CATEGORY_METHOD.PolicyAssignment, scopeId);
    return this.effectiveAssignments("PolicyAssignment", scopeId);
  }

  get resolveRoot(): ((rootId: string) => Promise<ScopeChild>) | undefined {
    if (!this.rootResolution) return undefined;
    return async (rootId: string) => {
      await this.enter("resolveRoot", rootId);
      return this.describe(rootId);
    };
  }

  private describe(id: string): ScopeChild {
    const scope = this.scopes.get(id);
    return {
      id,
      displayName: scope?.displayName ?? lastSegment(id),
      kind: scope?.kind ?? inferScopeKind(id),
    };
  }

  private async enter(method: FakeDirectoryMethod, scopeId: string): Promise<FakeScope> {
    this.calls.push({ method, scopeId });
    for (const hook of this.hooks) hook(method, scopeId);

    // Yield so concurrent callers interleave as they would against a remote service.
    await Promise.resolve();

    const failure = this.failures.get(`${method}:${scopeId}`);
    if (failure && (failure.remaining === undefined || failure.remaining > 0)) {
      if (failure.remaining !== undefined) failure.remaining--;
      throw failure.error;
    }

    const scope = this.scopes.get(scopeId);
    if (!scope) throw new PermanentRemoteError("NotFound", `Scope ${scopeId} not found`, scopeId);
    return scope;
  }

  private effectiveAssignments(category: AssignmentCategory, scopeId: string): ProviderRecord[] {
    const results: ProviderRecord[] = [];
    for (const id of this.selfAndAncestors(scopeId)) {
      results.push(...(this.assignments.get(`${category}:${id}`) ?? []));
    }
    return results.map((r) => structuredClone(r));
  }

  /** The scope followed by its ancestors, nearest first. */
  private selfAndAncestors(scopeId: string): string[] {
    const order: string[] = [];
    const seen = new Set<string>();
    const queue = [scopeId];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      order.push(id);
      for (const [parentId, scope] of this.scopes) {
        if (scope.children?.includes(id)) queue.push(parentId);
      }
    }
    return order;
  }
}
