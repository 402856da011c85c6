/**
 * Scope Directory Client — Type Definitions
 *
 * The remote directory the engine reads from. All calls are idempotent reads and
 * may fail independently; callers retry transient failures.
 */

import type { ProviderRecord, ScopeChild } from "../types.js";

export interface ScopeDirectoryClient {
  /** Immediate children of a scope. Fails with NotFound or AccessDenied. */
  getChildren(scopeId: string): Promise<ScopeChild[]>;
  /** Standing role grants effective at or above the scope. */
  getStandingGrants(scopeId: string): Promise<ProviderRecord[]>;
  /** Eligible (time-bound, activation-required) role grants effective at or above the scope. */
  getEligibleGrants(scopeId: string): Promise<ProviderRecord[]>;
  /** Policy assignments effective at or above the scope. */
  getPolicyAssignments(scopeId: string): Promise<ProviderRecord[]>;
  /**
   * Canonical id, display name and kind of a root the caller named.
   * When absent the walker infers the kind from the id shape.
   */
  resolveRoot?(rootId: string): Promise<ScopeChild>;
  /**
   * Throws ConfigurationError when the directory cannot serve these roots.
   * Called once per run, before any remote call.
   */
  validateRoots?(roots: readonly string[]): void;
}
