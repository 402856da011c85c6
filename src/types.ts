/**
 * Scope Audit — Shared Types
 *
 * Core type definitions used across the walker, collector, classifier and aggregator.
 */

// =============================================================================
// Scopes
// =============================================================================

export type ScopeKind = "ManagementGroup" | "Subscription" | "ResourceGroup" | "Resource";

/** Hierarchy order, used for presentation sorting. */
export const SCOPE_KIND_ORDER: Record<ScopeKind, number> = {
  ManagementGroup: 0,
  Subscription: 1,
  ResourceGroup: 2,
  Resource: 3,
};

/** A child entry as returned by the directory service. */
export type ScopeChild = {
  id: string;
  displayName: string;
  kind: ScopeKind;
};

/**
 * A node in the scope hierarchy, created by the walker and never mutated afterwards.
 * `rootId` is the first root that reached the node; `reachableFrom` lists every root
 * that did, in discovery order.
 */
export type ScopeNode = {
  readonly id: string;
  readonly displayName: string;
  readonly kind: ScopeKind;
  readonly parentId: string | null;
  readonly rootId: string;
  readonly reachableFrom: readonly string[];
  readonly depth: number;
};

// =============================================================================
// Assignments
// =============================================================================

export type AssignmentCategory = "StandingGrant" | "EligibleGrant" | "PolicyAssignment";

export const ALL_CATEGORIES: readonly AssignmentCategory[] = [
  "StandingGrant",
  "EligibleGrant",
  "PolicyAssignment",
];

/** Provider payload for one assignment, before normalization. Field layout varies by API. */
export type ProviderRecord = Record<string, unknown>;

export type KnownIdentityKind = "User" | "Group" | "ServicePrincipal" | "ManagedIdentity" | "Unknown";

/** Known kinds, or a provider value passed through unchanged. */
export type IdentityKind = KnownIdentityKind | (string & {});

export type InheritanceStatus = "Direct" | "Inherited";

export type LifecycleState = "Active" | "Expired" | "NotYetActive" | "Conditional" | "Unknown";

export type TemporalFields = {
  startTime?: string;
  endTime?: string;
  createdOn?: string;
};

export type DefinitionRef = {
  id: string;
  displayName: string;
};

/** Canonical, unclassified assignment as produced by the collector. */
export type RawAssignment = {
  category: AssignmentCategory;
  assignmentId: string;
  name: string;
  /** Literal scope the grant is bound to, or "Unknown" when it could not be resolved. */
  scopePath: string;
  principal: {
    id: string;
    displayName: string;
    type?: string;
  };
  roleOrPolicyRef: DefinitionRef;
  temporal?: TemporalFields;
  condition?: string;
  conditionVersion?: string;
  policy?: {
    enforcementMode?: string;
    notScopes?: string[];
  };
  eligibility?: {
    memberType?: string;
    status?: string;
  };
};

export type AssignmentRecord = {
  readonly scopeId: string;
  readonly scopePath: string;
  readonly category: AssignmentCategory;
  readonly assignmentId: string;
  readonly principal: {
    readonly id: string;
    readonly displayName: string;
    readonly kind: IdentityKind;
  };
  readonly roleOrPolicyRef: Readonly<DefinitionRef>;
  readonly temporal: Readonly<TemporalFields>;
  readonly conditional: {
    readonly isConditional: boolean;
    readonly expression?: string;
  };
  readonly inheritance: InheritanceStatus;
  readonly lifecycleState: LifecycleState;
  /** Single human-readable state, e.g. "Expired (Conditional)". */
  readonly lifecycleLabel: string;
  readonly warnings: readonly string[];
};

// =============================================================================
// Run Options
// =============================================================================

export type AuditRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AuditScopeOptions = {
  /** Expand subscription-kind nodes instead of treating them as leaves. */
  includeSubscriptions?: boolean;
  /** Expand resource-group-kind nodes. Requires `includeSubscriptions`. */
  includeResourceGroups?: boolean;
  /** Collect time-bound (eligible) grants in addition to standing grants. */
  includeEligibleGrants?: boolean;
  /** Collect policy assignments. */
  includePolicyDomain?: boolean;
  /** Collect RBAC grants. Defaults to true. */
  includeRbac?: boolean;
};

export type AuditRunOptions = AuditScopeOptions & {
  /** Max scopes collected at once. Default: 4. */
  concurrency?: number;
  /** Deadline for the whole run. 0 or omitted means none. */
  timeoutMs?: number;
  /** External cancellation. */
  signal?: AbortSignal;
  /** Evaluation time for lifecycle classification. Default: run start. */
  now?: Date;
  retry?: AuditRetryOptions;
};

// =============================================================================
// Report
// =============================================================================

export type SkipReason = "NotFound" | "AccessDenied" | "Transient" | "Cancelled" | "Unknown";

export type SkippedScope = {
  scopeId: string;
  stage: "expand" | "collect";
  category?: AssignmentCategory;
  reason: SkipReason;
  message: string;
};

export type ReportSummaries = Record<string, Record<string, number>>;

export type ReportStats = {
  scopesDiscovered: number;
  scopesCollected: number;
  recordsCollected: number;
  duplicateRecords: number;
  droppedRecords: number;
  cyclesDetected: number;
  skippedCount: number;
};

export type Report = {
  nodes: ScopeNode[];
  records: AssignmentRecord[];
  summaries: ReportSummaries;
  skipped: SkippedScope[];
  /** True when cancellation or the deadline cut the run short. */
  incomplete: boolean;
  stats: ReportStats;
  evaluatedAt: string;
  startedAt: string;
  completedAt: string;
};
