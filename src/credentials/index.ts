export { CredentialsManager, createCredentialsManager } from "./manager.js";
export type { CredentialMethod, CredentialsManagerOptions, CredentialResolutionResult } from "./manager.js";
