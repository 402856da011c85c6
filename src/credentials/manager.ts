/**
 * Scope Audit — Credentials Manager
 *
 * Resolves a TokenCredential through @azure/identity. Supports the
 * DefaultAzureCredential chain, Azure CLI, Service Principal and Managed Identity.
 * One credential is created per manager and reused for the whole run.
 */

import type { TokenCredential } from "@azure/identity";

// =============================================================================
// Types
// =============================================================================

export type CredentialMethod = "default" | "cli" | "service-principal" | "managed-identity";

export type CredentialsManagerOptions = {
  defaultSubscription?: string;
  defaultTenantId?: string;
  credentialMethod?: CredentialMethod;
  env?: Record<string, string | undefined>;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: CredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

// =============================================================================
// Credentials Manager
// =============================================================================

export class CredentialsManager {
  private readonly method: CredentialMethod;
  private readonly subscriptionId?: string;
  private readonly tenantId?: string;
  private readonly env: Record<string, string | undefined>;
  private pending: Promise<CredentialResolutionResult> | null = null;

  constructor(options: CredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.method = options.credentialMethod ?? "default";
    this.subscriptionId = options.defaultSubscription ?? this.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.defaultTenantId ?? this.env.AZURE_TENANT_ID;
  }

  /**
   * Get a TokenCredential for the configured method. Concurrent callers share one resolution.
   */
  getCredential(): Promise<CredentialResolutionResult> {
    if (!this.pending) {
      this.pending = this.createCredential().then((credential) => ({
        credential,
        method: this.method,
        subscriptionId: this.subscriptionId,
        tenantId: this.tenantId,
      }));
      // A failed resolution is not cached; the next caller tries again.
      void this.pending.catch(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  clearCache(): void {
    this.pending = null;
  }

  /**
   * Dynamic import of @azure/identity keeps it off the load path of offline runs.
   */
  private async createCredential(): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (this.method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);

      case "service-principal": {
        const clientId = this.env.AZURE_CLIENT_ID;
        const clientSecret = this.env.AZURE_CLIENT_SECRET;

        if (!this.tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }

        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): CredentialsManager {
  return new CredentialsManager(options);
}
