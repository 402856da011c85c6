/**
 * Azure Scope Directory
 *
 * Scope Directory Client backed by Azure Resource Manager:
 * - hierarchy via @azure/arm-managementgroups and @azure/arm-resources
 * - root lookup via @azure/arm-subscriptions
 * - role assignments and eligibility schedules via @azure/arm-authorization
 * - policy assignments via @azure/arm-policy
 *
 * Every list call uses the `atScope()` filter, which returns what is assigned at
 * the scope or inherited from above it. No retries here; the walker and the
 * collector retry around each call.
 */

import type { CredentialsManager } from "../credentials/index.js";
import { instrumentedCall } from "../diagnostics.js";
import { ConfigurationError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type AuditLogger } from "../logging/index.js";
import {
  inferScopeKind,
  lastSegment,
  managementGroupName,
  managementGroupPath,
  parseResourceId,
  resourceGroupOf,
  subscriptionIdOf,
} from "../scopes.js";
import type { ProviderRecord, ScopeChild } from "../types.js";
import type { ScopeDirectoryClient } from "./types.js";

const AT_SCOPE = { filter: "atScope()" };

export type AzureScopeDirectoryOptions = {
  /** Subscription used to construct clients for management-group scopes. */
  defaultSubscription?: string;
  logger?: AuditLogger;
};

function toIso(value: Date | undefined): string | undefined {
  return value ? value.toISOString() : undefined;
}

function createdOnFromMetadata(metadata: unknown): string | undefined {
  if (metadata === null || typeof metadata !== "object") return undefined;
  const createdOn: unknown = "createdOn" in metadata ? metadata.createdOn : undefined;
  return typeof createdOn === "string" ? createdOn : undefined;
}

export class AzureScopeDirectory implements ScopeDirectoryClient {
  private readonly defaultSubscription?: string;
  private readonly log: AuditLogger;
  /** Role definition id → role name, for the lifetime of this directory (one run). */
  private readonly roleNames = new Map<string, Promise<string | undefined>>();

  constructor(
    private readonly credentials: CredentialsManager,
    options: AzureScopeDirectoryOptions = {},
  ) {
    this.defaultSubscription = options.defaultSubscription ?? credentials.getSubscriptionId();
    this.log = options.logger ?? createSilentLogger();
  }

  // ===========================================================================
  // Clients
  // ===========================================================================

  private async getManagementGroupsClient() {
    const { ManagementGroupsAPI } = await import("@azure/arm-managementgroups");
    const { credential } = await this.credentials.getCredential();
    return new ManagementGroupsAPI(credential);
  }

  private async getSubscriptionClient() {
    const { SubscriptionClient } = await import("@azure/arm-subscriptions");
    const { credential } = await this.credentials.getCredential();
    return new SubscriptionClient(credential);
  }

  private async getResourceClient(subscriptionId: string) {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentials.getCredential();
    return new ResourceManagementClient(credential, subscriptionId);
  }

  private async getAuthClient(scopeId: string) {
    const { AuthorizationManagementClient } = await import("@azure/arm-authorization");
    const { credential } = await this.credentials.getCredential();
    return new AuthorizationManagementClient(credential, this.subscriptionFor(scopeId));
  }

  private async getPolicyClient(scopeId: string) {
    const { PolicyClient } = await import("@azure/arm-policy");
    const { credential } = await this.credentials.getCredential();
    return new PolicyClient(credential, this.subscriptionFor(scopeId));
  }

  validateRoots(roots: readonly string[]): void {
    if (this.defaultSubscription) return;
    const unscoped = roots.filter((root) => subscriptionIdOf(root) === undefined);
    if (unscoped.length > 0) {
      throw new ConfigurationError(
        `A default subscription is required to query ${unscoped.join(", ")}; set defaultSubscription or AZURE_SUBSCRIPTION_ID`,
      );
    }
  }

  private subscriptionFor(scopeId: string): string {
    const subscriptionId = subscriptionIdOf(scopeId) ?? this.defaultSubscription;
    if (!subscriptionId) {
      throw new ConfigurationError(
        `A default subscription is required to query ${scopeId}; set defaultSubscription or AZURE_SUBSCRIPTION_ID`,
      );
    }
    return subscriptionId;
  }

  // ===========================================================================
  // Hierarchy
  // ===========================================================================

  async resolveRoot(rootId: string): Promise<ScopeChild> {
    const kind = inferScopeKind(rootId);

    switch (kind) {
      case "ManagementGroup": {
        const name = managementGroupName(rootId);
        const client = await this.getManagementGroupsClient();
        const group = await instrumentedCall("managementgroups", "managementGroups.get", () =>
          client.managementGroups.get(name), { scopeId: rootId });
        return { id: group.id ?? managementGroupPath(name), displayName: group.displayName ?? name, kind };
      }

      case "Subscription": {
        const subscriptionId = this.subscriptionFor(rootId);
        const client = await this.getSubscriptionClient();
        const subscription = await instrumentedCall("subscriptions", "subscriptions.get", () =>
          client.subscriptions.get(subscriptionId), { scopeId: rootId });
        return {
          id: subscription.id ?? `/subscriptions/${subscription.subscriptionId ?? subscriptionId}`,
          displayName: subscription.displayName ?? subscriptionId,
          kind,
        };
      }

      case "ResourceGroup": {
        const name = resourceGroupOf(rootId) ?? lastSegment(rootId);
        const client = await this.getResourceClient(this.subscriptionFor(rootId));
        const group = await instrumentedCall("resources", "resourceGroups.get", () =>
          client.resourceGroups.get(name), { scopeId: rootId });
        return { id: group.id ?? rootId, displayName: group.name ?? name, kind };
      }

      case "Resource":
        return { id: rootId, displayName: lastSegment(rootId), kind };
    }
  }

  async getChildren(scopeId: string): Promise<ScopeChild[]> {
    switch (inferScopeKind(scopeId)) {
      case "ManagementGroup":
        return this.listManagementGroupChildren(scopeId);
      case "Subscription":
        return this.listResourceGroups(scopeId);
      case "ResourceGroup":
        return this.listResources(scopeId);
      case "Resource":
        return [];
    }
  }

  private async listManagementGroupChildren(scopeId: string): Promise<ScopeChild[]> {
    const name = managementGroupName(scopeId);
    const client = await this.getManagementGroupsClient();
    const group = await instrumentedCall("managementgroups", "managementGroups.get", () =>
      client.managementGroups.get(name, { expand: "children" }), { scopeId });

    const children: ScopeChild[] = [];
    for (const child of group.children ?? []) {
      const childName = child.name ?? (child.id ? lastSegment(child.id) : "");
      if (!childName) continue;
      const type = (child.type ?? "").toLowerCase();
      if (type === "/subscriptions") {
        children.push({
          id: `/subscriptions/${childName}`,
          displayName: child.displayName ?? childName,
          kind: "Subscription",
        });
      } else if (type === "microsoft.management/managementgroups") {
        children.push({
          id: child.id ?? managementGroupPath(childName),
          displayName: child.displayName ?? childName,
          kind: "ManagementGroup",
        });
      } else {
        this.log.debug(`Ignoring child ${childName} of ${scopeId} with unsupported type "${child.type ?? ""}"`);
      }
    }
    return children;
  }

  private async listResourceGroups(scopeId: string): Promise<ScopeChild[]> {
    const subscriptionId = this.subscriptionFor(scopeId);
    const client = await this.getResourceClient(subscriptionId);
    return instrumentedCall("resources", "resourceGroups.list", async () => {
      const children: ScopeChild[] = [];
      for await (const rg of client.resourceGroups.list()) {
        if (!rg.name) continue;
        children.push({
          id: rg.id ?? `/subscriptions/${subscriptionId}/resourceGroups/${rg.name}`,
          displayName: rg.name,
          kind: "ResourceGroup",
        });
      }
      return children;
    }, { scopeId });
  }

  private async listResources(scopeId: string): Promise<ScopeChild[]> {
    const resourceGroup = resourceGroupOf(scopeId);
    if (!resourceGroup) return [];
    const client = await this.getResourceClient(this.subscriptionFor(scopeId));
    return instrumentedCall("resources", "resources.listByResourceGroup", async () => {
      const children: ScopeChild[] = [];
      for await (const resource of client.resources.listByResourceGroup(resourceGroup)) {
        if (!resource.id) continue;
        children.push({
          id: resource.id,
          displayName: resource.name ?? lastSegment(resource.id),
          kind: "Resource",
        });
      }
      return children;
    }, { scopeId });
  }

  // ===========================================================================
  // Assignments
  // ===========================================================================

  async getStandingGrants(scopeId: string): Promise<ProviderRecord[]> {
    const client = await this.getAuthClient(scopeId);
    return instrumentedCall("authorization", "roleAssignments.listForScope", async () => {
      const results: ProviderRecord[] = [];
      for await (const ra of client.roleAssignments.listForScope(scopeId, AT_SCOPE)) {
        results.push({
          id: ra.id,
          name: ra.name,
          scope: ra.scope,
          principalId: ra.principalId,
          principalType: ra.principalType,
          roleDefinitionId: ra.roleDefinitionId,
          roleDefinitionName: ra.roleDefinitionId ? await this.roleName(ra.roleDefinitionId, scopeId) : undefined,
          description: ra.description,
          condition: ra.condition,
          conditionVersion: ra.conditionVersion,
          createdOn: toIso(ra.createdOn),
        });
      }
      return results;
    }, { scopeId });
  }

  async getEligibleGrants(scopeId: string): Promise<ProviderRecord[]> {
    const client = await this.getAuthClient(scopeId);
    return instrumentedCall("authorization", "roleEligibilityScheduleInstances.listForScope", async () => {
      const results: ProviderRecord[] = [];
      for await (const inst of client.roleEligibilityScheduleInstances.listForScope(scopeId, AT_SCOPE)) {
        const expanded = inst.expandedProperties;
        results.push({
          id: inst.id,
          name: inst.name,
          scope: inst.scope,
          principalId: inst.principalId,
          principalType: inst.principalType,
          roleDefinitionId: inst.roleDefinitionId,
          startDateTime: toIso(inst.startDateTime),
          endDateTime: toIso(inst.endDateTime),
          createdOn: toIso(inst.createdOn),
          condition: inst.condition,
          conditionVersion: inst.conditionVersion,
          memberType: inst.memberType,
          status: inst.status,
          expandedProperties: expanded
            ? {
                principal: {
                  id: expanded.principal?.id,
                  displayName: expanded.principal?.displayName,
                  email: expanded.principal?.email,
                  type: expanded.principal?.type,
                },
                roleDefinition: {
                  id: expanded.roleDefinition?.id,
                  displayName: expanded.roleDefinition?.displayName,
                },
                scope: {
                  id: expanded.scope?.id,
                  displayName: expanded.scope?.displayName,
                },
              }
            : undefined,
        });
      }
      return results;
    }, { scopeId });
  }

  async getPolicyAssignments(scopeId: string): Promise<ProviderRecord[]> {
    const client = await this.getPolicyClient(scopeId);
    const kind = inferScopeKind(scopeId);

    const iterator = () => {
      switch (kind) {
        case "ManagementGroup":
          return client.policyAssignments.listForManagementGroup(managementGroupName(scopeId), AT_SCOPE);
        case "Subscription":
          return client.policyAssignments.list(AT_SCOPE);
        case "ResourceGroup":
          return client.policyAssignments.listForResourceGroup(resourceGroupOf(scopeId) ?? "", AT_SCOPE);
        case "Resource": {
          const parsed = parseResourceId(scopeId);
          if (!parsed) return null;
          return client.policyAssignments.listForResource(
            parsed.resourceGroup,
            parsed.providerNamespace,
            parsed.parentResourcePath,
            parsed.resourceType,
            parsed.resourceName,
            AT_SCOPE,
          );
        }
      }
    };

    return instrumentedCall("policy", "policyAssignments.list", async () => {
      const results: ProviderRecord[] = [];
      const iter = iterator();
      if (!iter) return results;
      for await (const pa of iter) {
        results.push({
          id: pa.id,
          name: pa.name,
          displayName: pa.displayName,
          description: pa.description,
          policyDefinitionId: pa.policyDefinitionId,
          scope: pa.scope,
          notScopes: pa.notScopes,
          enforcementMode: pa.enforcementMode,
          identity: pa.identity?.principalId
            ? { principalId: pa.identity.principalId, type: pa.identity.type }
            : undefined,
          createdOn: createdOnFromMetadata(pa.metadata),
        });
      }
      return results;
    }, { scopeId, metadata: { kind } });
  }

  /**
   * Role name for a definition id; undefined when the definition cannot be read,
   * in which case the collector falls back to the definition's technical name.
   */
  private roleName(roleDefinitionId: string, scopeId: string): Promise<string | undefined> {
    let pending = this.roleNames.get(roleDefinitionId);
    if (!pending) {
      pending = this.lookupRoleName(roleDefinitionId, scopeId);
      this.roleNames.set(roleDefinitionId, pending);
    }
    return pending;
  }

  private async lookupRoleName(roleDefinitionId: string, scopeId: string): Promise<string | undefined> {
    try {
      const client = await this.getAuthClient(scopeId);
      const definition = await instrumentedCall("authorization", "roleDefinitions.getById", () =>
        client.roleDefinitions.getById(roleDefinitionId), { scopeId });
      return definition.roleName;
    } catch (error) {
      this.log.debug(`Could not resolve role name for ${roleDefinitionId}`, { error: formatErrorMessage(error) });
      return undefined;
    }
  }
}

export function createAzureScopeDirectory(
  credentials: CredentialsManager,
  options?: AzureScopeDirectoryOptions,
): AzureScopeDirectory {
  return new AzureScopeDirectory(credentials, options);
}
