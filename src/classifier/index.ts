export { classify, resolveIdentityKind, resolveInheritance, resolveLifecycle, TIME_BOUND_LABEL } from "./classifier.js";
export type { ClassifyOptions, LifecycleResult } from "./classifier.js";
