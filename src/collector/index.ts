export { AssignmentCollector, categoriesFor, normalizeAssignment, UNKNOWN_SCOPE_PATH } from "./collector.js";
export type { CollectorOptions, CollectResult } from "./collector.js";
export { deriveScopeFromId, field, firstNonEmpty } from "./fields.js";
export type { FieldAccessor } from "./fields.js";
