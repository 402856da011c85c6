export { AuditEngine, createAuditEngine, DEFAULT_CONCURRENCY } from "./engine.js";
export type { AuditEngineOptions } from "./engine.js";
export { anySignal, runPool } from "./pool.js";
export type { CombinedSignal, PoolResult } from "./pool.js";
