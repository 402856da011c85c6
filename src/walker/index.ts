export { HierarchyWalker, shouldExpand } from "./walker.js";
export type { WalkerOptions, WalkResult } from "./walker.js";
