/**
 * Assignment Classifier
 *
 * Derives inheritance, identity kind and lifecycle state for a collected
 * assignment relative to the scope it is reported on. Pure: the same input and
 * evaluation time always produce an equal record.
 */

import { MalformedDataError } from "../errors.js";
import { inferScopeKind, isManagementGroupPath, normalizeScopePath } from "../scopes.js";
import type {
  AssignmentRecord,
  IdentityKind,
  InheritanceStatus,
  LifecycleState,
  RawAssignment,
  ScopeNode,
  TemporalFields,
} from "../types.js";

export type ClassifyOptions = {
  /** Evaluation time. */
  now: Date;
};

/** Label used when every supplied temporal bound was unreadable. */
export const TIME_BOUND_LABEL = "Time-bound";

// =============================================================================
// Identity kind
// =============================================================================

/** Provider principal types, keyed lower-case. */
const IDENTITY_KINDS: ReadonlyMap<string, IdentityKind> = new Map<string, IdentityKind>([
  ["user", "User"],
  ["group", "Group"],
  ["foreigngroup", "Group"],
  ["serviceprincipal", "ServicePrincipal"],
  ["application", "ServicePrincipal"],
  ["managedidentity", "ManagedIdentity"],
  ["msi", "ManagedIdentity"],
]);

/**
 * Known types map through the table; unknown values pass through unchanged.
 */
export function resolveIdentityKind(principalType: string | undefined): IdentityKind {
  const trimmed = principalType?.trim();
  if (!trimmed) return "Unknown";
  return IDENTITY_KINDS.get(trimmed.toLowerCase()) ?? trimmed;
}

// =============================================================================
// Inheritance
// =============================================================================

/**
 * RBAC grants are Direct only when bound to exactly the reporting scope.
 *
 * Policy assignments follow their own rule: paths compare case-insensitively,
 * and anything assigned at a management group is Inherited for a subscription
 * or anything below it, whatever the paths say.
 */
export function resolveInheritance(assignment: RawAssignment, reportingScope: ScopeNode): InheritanceStatus {
  if (assignment.category !== "PolicyAssignment") {
    return assignment.scopePath === reportingScope.id ? "Direct" : "Inherited";
  }

  if (reportingScope.kind !== "ManagementGroup" && boundAtManagementGroup(assignment.scopePath)) {
    return "Inherited";
  }
  return normalizeScopePath(assignment.scopePath) === normalizeScopePath(reportingScope.id) ? "Direct" : "Inherited";
}

function boundAtManagementGroup(scopePath: string): boolean {
  if (isManagementGroupPath(scopePath)) return true;
  // Bare names are management group names; "/" is the tenant root.
  return scopePath !== "/" && !scopePath.startsWith("/") && inferScopeKind(scopePath) === "ManagementGroup";
}

// =============================================================================
// Lifecycle
// =============================================================================

type ParsedTime = { value?: number; error?: MalformedDataError };

function parseTime(fieldName: string, raw: string | undefined): ParsedTime {
  if (raw === undefined) return {};
  const value = Date.parse(raw);
  if (Number.isNaN(value)) return { error: new MalformedDataError(fieldName, raw) };
  return { value };
}

export type LifecycleResult = {
  state: LifecycleState;
  label: string;
  warnings: string[];
};

/**
 * First match wins:
 *   1. no start/end time            → Active
 *   2. end time at or before now    → Expired
 *   3. start time after now         → NotYetActive
 *   4. condition present            → Conditional
 *   5. otherwise                    → Active
 * A condition on a record that lands in another state is appended to the label.
 */
export function resolveLifecycle(
  temporal: TemporalFields | undefined,
  condition: string | undefined,
  now: Date,
): LifecycleResult {
  const conditional = condition !== undefined && condition.length > 0;
  const warnings: string[] = [];

  const withQualifier = (state: LifecycleState, label: string = state): LifecycleResult => ({
    state,
    label: conditional && state !== "Conditional" ? `${label} (Conditional)` : label,
    warnings,
  });

  const hasStart = temporal?.startTime !== undefined;
  const hasEnd = temporal?.endTime !== undefined;
  if (!hasStart && !hasEnd) return withQualifier("Active");

  const start = parseTime("startTime", temporal?.startTime);
  const end = parseTime("endTime", temporal?.endTime);
  for (const parsed of [start, end]) {
    if (parsed.error) warnings.push(parsed.error.message);
  }

  if (start.value === undefined && end.value === undefined) {
    return withQualifier("Unknown", TIME_BOUND_LABEL);
  }

  const nowMs = now.getTime();
  if (end.value !== undefined && end.value <= nowMs) return withQualifier("Expired");
  if (start.value !== undefined && start.value > nowMs) return withQualifier("NotYetActive");
  if (conditional) return withQualifier("Conditional");
  return withQualifier("Active");
}

// =============================================================================
// Classifier
// =============================================================================

export function classify(
  assignment: RawAssignment,
  reportingScope: ScopeNode,
  options: ClassifyOptions,
): AssignmentRecord {
  const lifecycle = resolveLifecycle(assignment.temporal, assignment.condition, options.now);

  const temporal: TemporalFields = {};
  if (assignment.temporal?.startTime !== undefined) temporal.startTime = assignment.temporal.startTime;
  if (assignment.temporal?.endTime !== undefined) temporal.endTime = assignment.temporal.endTime;
  if (assignment.temporal?.createdOn !== undefined) temporal.createdOn = assignment.temporal.createdOn;

  const record: AssignmentRecord = {
    scopeId: reportingScope.id,
    scopePath: assignment.scopePath,
    category: assignment.category,
    assignmentId: assignment.assignmentId,
    principal: Object.freeze({
      id: assignment.principal.id,
      displayName: assignment.principal.displayName,
      kind: resolveIdentityKind(assignment.principal.type),
    }),
    roleOrPolicyRef: Object.freeze({ ...assignment.roleOrPolicyRef }),
    temporal: Object.freeze(temporal),
    conditional: Object.freeze(
      assignment.condition
        ? { isConditional: true, expression: assignment.condition }
        : { isConditional: false },
    ),
    inheritance: resolveInheritance(assignment, reportingScope),
    lifecycleState: lifecycle.state,
    lifecycleLabel: lifecycle.label,
    warnings: Object.freeze(lifecycle.warnings),
  };

  return Object.freeze(record);
}
