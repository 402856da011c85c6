/**
 * Provider field fallbacks.
 *
 * Providers spell the same value under different keys depending on the API
 * (flat SDK models, nested `properties`, `expandedProperties` on schedule
 * instances, PowerShell-style casing). Each canonical field is resolved from an
 * ordered accessor list; the first accessor that yields a non-empty value wins.
 */

import { lastSegment } from "../scopes.js";
import type { AssignmentCategory, ProviderRecord } from "../types.js";

export type FieldAccessor = (record: ProviderRecord) => unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Accessor for a dotted path such as `expandedProperties.principal.displayName`. */
export function field(path: string): FieldAccessor {
  const keys = path.split(".");
  return (record) => {
    let current: unknown = record;
    for (const key of keys) {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
    return current;
  };
}

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Evaluate accessors in order and return the first non-empty string value.
 */
export function firstNonEmpty(record: ProviderRecord, accessors: readonly FieldAccessor[]): string | undefined {
  for (const accessor of accessors) {
    const value = asNonEmptyString(accessor(record));
    if (value !== undefined) return value;
  }
  return undefined;
}

export function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((v): v is string => typeof v === "string" && v.length > 0);
  return items.length > 0 ? items : undefined;
}

const AUTHORIZATION_PROVIDER_SEGMENT = "/providers/microsoft.authorization/";

/**
 * Derive the bound scope from an assignment id by trimming the trailing
 * `/providers/Microsoft.Authorization/{type}/{name}` (or, for ids without that
 * suffix, the trailing path segment).
 */
export function deriveScopeFromId(id: unknown): string | undefined {
  if (typeof id !== "string" || id.length === 0) return undefined;

  const idx = id.toLowerCase().lastIndexOf(AUTHORIZATION_PROVIDER_SEGMENT);
  if (idx === 0) return "/";
  if (idx > 0) return id.slice(0, idx);

  const slash = id.replace(/\/+$/, "").lastIndexOf("/");
  return slash > 0 ? id.slice(0, slash) : undefined;
}

// =============================================================================
// Accessor lists
// =============================================================================

export const SCOPE_PATH_FIELDS: readonly FieldAccessor[] = [
  field("scope"),
  field("properties.scope"),
  field("expandedProperties.scope.id"),
  field("Scope"),
  (record) => deriveScopeFromId(record.id),
];

export const ASSIGNMENT_ID_FIELDS: readonly FieldAccessor[] = [
  field("id"),
  field("RoleAssignmentId"),
  field("PolicyAssignmentId"),
];

export const ASSIGNMENT_NAME_FIELDS: readonly FieldAccessor[] = [
  field("name"),
  field("RoleAssignmentName"),
  (record) => (typeof record.id === "string" ? lastSegment(record.id) : undefined),
];

export const PRINCIPAL_ID_FIELDS: Record<AssignmentCategory, readonly FieldAccessor[]> = {
  StandingGrant: [field("principalId"), field("properties.principalId"), field("ObjectId")],
  EligibleGrant: [
    field("principalId"),
    field("properties.principalId"),
    field("expandedProperties.principal.id"),
    field("ObjectId"),
  ],
  PolicyAssignment: [field("identity.principalId"), field("properties.identity.principalId")],
};

export const PRINCIPAL_NAME_FIELDS: Record<AssignmentCategory, readonly FieldAccessor[]> = {
  StandingGrant: [
    field("principalDisplayName"),
    field("properties.principalDisplayName"),
    field("displayName"),
    field("DisplayName"),
    field("signInName"),
    field("SignInName"),
  ],
  EligibleGrant: [
    field("principalDisplayName"),
    field("properties.principalDisplayName"),
    field("expandedProperties.principal.displayName"),
    field("expandedProperties.principal.email"),
    field("DisplayName"),
  ],
  PolicyAssignment: [field("identity.displayName"), field("properties.identity.displayName")],
};

export const PRINCIPAL_TYPE_FIELDS: Record<AssignmentCategory, readonly FieldAccessor[]> = {
  StandingGrant: [field("principalType"), field("properties.principalType"), field("ObjectType")],
  EligibleGrant: [
    field("principalType"),
    field("properties.principalType"),
    field("expandedProperties.principal.type"),
    field("ObjectType"),
  ],
  // Policy assignments only carry a principal when they have a managed identity.
  PolicyAssignment: [
    (record) => (firstNonEmpty(record, [field("identity.principalId"), field("properties.identity.principalId")])
      ? "ManagedIdentity"
      : undefined),
  ],
};

export const DEFINITION_ID_FIELDS: Record<AssignmentCategory, readonly FieldAccessor[]> = {
  StandingGrant: [field("roleDefinitionId"), field("properties.roleDefinitionId"), field("RoleDefinitionId")],
  EligibleGrant: [
    field("roleDefinitionId"),
    field("properties.roleDefinitionId"),
    field("expandedProperties.roleDefinition.id"),
  ],
  PolicyAssignment: [field("policyDefinitionId"), field("properties.policyDefinitionId")],
};

export const DEFINITION_NAME_FIELDS: Record<AssignmentCategory, readonly FieldAccessor[]> = {
  StandingGrant: [
    field("roleDefinitionName"),
    field("properties.roleDefinitionName"),
    field("RoleDefinitionName"),
  ],
  EligibleGrant: [
    field("roleDefinitionName"),
    field("properties.roleDefinitionName"),
    field("expandedProperties.roleDefinition.displayName"),
  ],
  PolicyAssignment: [
    field("policyDefinitionDisplayName"),
    field("displayName"),
    field("properties.displayName"),
  ],
};

export const START_TIME_FIELDS: readonly FieldAccessor[] = [
  field("startDateTime"),
  field("properties.startDateTime"),
  field("startTime"),
  field("scheduleInfo.startDateTime"),
];

export const END_TIME_FIELDS: readonly FieldAccessor[] = [
  field("endDateTime"),
  field("properties.endDateTime"),
  field("endTime"),
  field("scheduleInfo.expiration.endDateTime"),
];

export const CREATED_ON_FIELDS: readonly FieldAccessor[] = [
  field("createdOn"),
  field("properties.createdOn"),
  field("metadata.createdOn"),
];

export const CONDITION_FIELDS: readonly FieldAccessor[] = [field("condition"), field("properties.condition"), field("Condition")];

export const CONDITION_VERSION_FIELDS: readonly FieldAccessor[] = [
  field("conditionVersion"),
  field("properties.conditionVersion"),
];
