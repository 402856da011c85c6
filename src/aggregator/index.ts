export { aggregate, compareNodes, compareRecords, dedupeNodes, recordKey, summarize } from "./aggregator.js";
export type { AggregateContext } from "./aggregator.js";
