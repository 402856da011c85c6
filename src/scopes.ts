/**
 * Scope path helpers.
 *
 * Scope ids follow the Resource Manager layout:
 *   /providers/Microsoft.Management/managementGroups/{name}
 *   /subscriptions/{subscriptionId}
 *   /subscriptions/{subscriptionId}/resourceGroups/{resourceGroup}
 *   /subscriptions/{subscriptionId}/resourceGroups/{resourceGroup}/providers/{namespace}/{type}/{name}[/...]
 * A bare name (no leading slash) is taken as a management group name.
 */

import type { ScopeKind } from "./types.js";

export const MANAGEMENT_GROUP_PREFIX = "/providers/Microsoft.Management/managementGroups/";

export type ParsedResourceId = {
  subscriptionId: string;
  resourceGroup: string;
  providerNamespace: string;
  parentResourcePath: string;
  resourceType: string;
  resourceName: string;
};

function segmentsOf(scopeId: string): string[] {
  return scopeId.split("/").filter((s) => s.length > 0);
}

export function inferScopeKind(scopeId: string): ScopeKind {
  const segments = segmentsOf(scopeId);
  if (segments[0]?.toLowerCase() !== "subscriptions") return "ManagementGroup";
  if (segments.length <= 2) return "Subscription";
  if (segments.length === 4 && segments[2].toLowerCase() === "resourcegroups") return "ResourceGroup";
  return "Resource";
}

/** Lower-cased, trailing-slash-free form for case-insensitive comparison. */
export function normalizeScopePath(scopePath: string): string {
  return scopePath.replace(/\/+$/, "").toLowerCase();
}

export function isManagementGroupPath(scopePath: string): boolean {
  return normalizeScopePath(scopePath).startsWith(MANAGEMENT_GROUP_PREFIX.toLowerCase());
}

/** Management group name for either a bare name or a full management group path. */
export function managementGroupName(scopeId: string): string {
  if (isManagementGroupPath(scopeId)) {
    return scopeId.slice(MANAGEMENT_GROUP_PREFIX.length).replace(/\/+$/, "");
  }
  return scopeId.replace(/^\/+|\/+$/g, "");
}

export function managementGroupPath(name: string): string {
  return `${MANAGEMENT_GROUP_PREFIX}${name}`;
}

export function subscriptionIdOf(scopeId: string): string | undefined {
  const segments = segmentsOf(scopeId);
  return segments[0]?.toLowerCase() === "subscriptions" ? segments[1] : undefined;
}

export function resourceGroupOf(scopeId: string): string | undefined {
  const segments = segmentsOf(scopeId);
  if (segments[0]?.toLowerCase() !== "subscriptions") return undefined;
  return segments[2]?.toLowerCase() === "resourcegroups" ? segments[3] : undefined;
}

/**
 * Split a resource id into the parts the policy APIs take. Returns null for
 * anything that is not a resource under a resource group.
 */
export function parseResourceId(resourceId: string): ParsedResourceId | null {
  const segments = segmentsOf(resourceId);
  if (segments.length < 8) return null;
  if (segments[0].toLowerCase() !== "subscriptions") return null;
  if (segments[2].toLowerCase() !== "resourcegroups") return null;
  if (segments[4].toLowerCase() !== "providers") return null;

  // After the namespace: type/name pairs; the last pair is the resource itself.
  const typed = segments.slice(6);
  if (typed.length % 2 !== 0) return null;

  const resourceType = typed[typed.length - 2];
  const resourceName = typed[typed.length - 1];
  return {
    subscriptionId: segments[1],
    resourceGroup: segments[3],
    providerNamespace: segments[5],
    parentResourcePath: typed.slice(0, -2).join("/"),
    resourceType,
    resourceName,
  };
}

/** Last path segment, or the whole string when it has none. */
export function lastSegment(value: string): string {
  const segments = segmentsOf(value);
  return segments[segments.length - 1] ?? value;
}
