/**
 * Scope Audit — public entry point
 *
 * Enumerates an Azure scope hierarchy from one or more roots, collects role grants
 * and policy assignments at every scope, classifies them and merges the results
 * into one report.
 */

export * from "./src/types.js";
export {
  ConfigurationError,
  MalformedDataError,
  PermanentRemoteError,
  TransientRemoteError,
  classifyRemoteError,
  formatErrorMessage,
} from "./src/errors.js";
export { AUDIT_RETRY_DEFAULTS, shouldRetryAuditError, withAuditRetry } from "./src/retry.js";
export {
  assertRunnable,
  configSchema,
  getDefaultConfig,
  resolveConfig,
  toRunOptions,
  validateRootId,
  type ScopeAuditConfig,
} from "./src/config.js";
export * from "./src/logging/index.js";
export {
  instrumentedCall,
  onAuditDiagnosticEvent,
  type AuditDiagnosticEvent,
  type AuditDiagnosticListener,
} from "./src/diagnostics.js";
export { inferScopeKind, managementGroupPath, parseResourceId } from "./src/scopes.js";
export * from "./src/credentials/index.js";
export * from "./src/directory/index.js";
export * from "./src/walker/index.js";
export * from "./src/collector/index.js";
export * from "./src/classifier/index.js";
export * from "./src/aggregator/index.js";
export * from "./src/engine/index.js";
export * from "./src/export/index.js";
export { createProgram, type CliDependencies } from "./src/cli/index.js";
