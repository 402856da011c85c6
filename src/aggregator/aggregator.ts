/**
 * Aggregator
 *
 * Merges scopes and records from every root into one report: deduplicates,
 * drops records whose scope is not in the node set, computes grouped counts and
 * applies the presentation sort.
 */

import {
  SCOPE_KIND_ORDER,
  type AssignmentCategory,
  type AssignmentRecord,
  type Report,
  type ReportStats,
  type ReportSummaries,
  type ScopeNode,
  type SkippedScope,
} from "../types.js";

export type AggregateContext = {
  skipped?: SkippedScope[];
  incomplete?: boolean;
  cyclesDetected?: number;
  scopesCollected?: number;
  evaluatedAt: Date;
  startedAt: Date;
  completedAt?: Date;
};

const CATEGORY_ORDER: Record<AssignmentCategory, number> = {
  StandingGrant: 0,
  EligibleGrant: 1,
  PolicyAssignment: 2,
};

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Identity of a grant as seen from one reporting scope.
 */
export function recordKey(record: AssignmentRecord): string {
  return JSON.stringify([
    record.scopeId,
    record.category,
    record.principal.id,
    record.roleOrPolicyRef.id,
    record.scopePath,
  ]);
}

/**
 * Collapse nodes reached from several roots into one, keeping the first and
 * merging the roots that reached it.
 */
export function dedupeNodes(nodes: readonly ScopeNode[]): ScopeNode[] {
  const byId = new Map<string, ScopeNode>();
  for (const node of nodes) {
    const existing = byId.get(node.id);
    if (!existing) {
      byId.set(node.id, node);
      continue;
    }
    const roots = [...existing.reachableFrom];
    for (const root of node.reachableFrom) {
      if (!roots.includes(root)) roots.push(root);
    }
    if (roots.length !== existing.reachableFrom.length) {
      byId.set(node.id, Object.freeze({ ...existing, reachableFrom: Object.freeze(roots) }));
    }
  }
  return [...byId.values()];
}

export function compareNodes(a: ScopeNode, b: ScopeNode): number {
  return (
    compareStrings(a.rootId, b.rootId) ||
    SCOPE_KIND_ORDER[a.kind] - SCOPE_KIND_ORDER[b.kind] ||
    compareStrings(a.id, b.id)
  );
}

/**
 * Sort order: root, scope kind, scope id, category, role/policy reference,
 * then principal and assignment id so equal keys still order deterministically.
 */
export function compareRecords(nodesById: ReadonlyMap<string, ScopeNode>) {
  return (a: AssignmentRecord, b: AssignmentRecord): number => {
    const nodeA = nodesById.get(a.scopeId);
    const nodeB = nodesById.get(b.scopeId);
    return (
      compareStrings(nodeA?.rootId ?? "", nodeB?.rootId ?? "") ||
      (nodeA && nodeB ? SCOPE_KIND_ORDER[nodeA.kind] - SCOPE_KIND_ORDER[nodeB.kind] : 0) ||
      compareStrings(a.scopeId, b.scopeId) ||
      CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category] ||
      compareStrings(a.roleOrPolicyRef.id, b.roleOrPolicyRef.id) ||
      compareStrings(a.principal.id, b.principal.id) ||
      compareStrings(a.assignmentId, b.assignmentId)
    );
  };
}

function increment(group: Record<string, number>, key: string): void {
  group[key] = (group[key] ?? 0) + 1;
}

/**
 * Grouped counts over the final record set. Derived data only.
 */
export function summarize(nodes: readonly ScopeNode[], records: readonly AssignmentRecord[]): ReportSummaries {
  const nodesById = new Map(nodes.map((n) => [n.id, n]));
  const summaries: ReportSummaries = {
    byRoot: {},
    byScopeKind: {},
    byCategory: {},
    byLifecycleState: {},
    byIdentityKind: {},
    scopesByKind: {},
  };

  for (const record of records) {
    const node = nodesById.get(record.scopeId);
    if (node) {
      increment(summaries.byRoot, node.rootId);
      increment(summaries.byScopeKind, node.kind);
    }
    increment(summaries.byCategory, record.category);
    increment(summaries.byLifecycleState, record.lifecycleState);
    increment(summaries.byIdentityKind, record.principal.kind);
  }

  for (const node of nodes) increment(summaries.scopesByKind, node.kind);

  return summaries;
}

export function aggregate(
  nodes: readonly ScopeNode[],
  records: readonly AssignmentRecord[],
  context: AggregateContext,
): Report {
  const finalNodes = dedupeNodes(nodes).sort(compareNodes);
  const nodesById = new Map(finalNodes.map((n) => [n.id, n]));

  const seen = new Set<string>();
  const finalRecords: AssignmentRecord[] = [];
  let duplicateRecords = 0;
  let droppedRecords = 0;

  for (const record of records) {
    if (!nodesById.has(record.scopeId)) {
      droppedRecords++;
      continue;
    }
    const key = recordKey(record);
    if (seen.has(key)) {
      duplicateRecords++;
      continue;
    }
    seen.add(key);
    finalRecords.push(record);
  }

  finalRecords.sort(compareRecords(nodesById));

  const skipped = [...(context.skipped ?? [])];
  const stats: ReportStats = {
    scopesDiscovered: finalNodes.length,
    scopesCollected: context.scopesCollected ?? finalNodes.length,
    recordsCollected: records.length,
    duplicateRecords,
    droppedRecords,
    cyclesDetected: context.cyclesDetected ?? 0,
    skippedCount: skipped.length,
  };

  return {
    nodes: finalNodes,
    records: finalRecords,
    summaries: summarize(finalNodes, finalRecords),
    skipped,
    incomplete: context.incomplete ?? false,
    stats,
    evaluatedAt: context.evaluatedAt.toISOString(),
    startedAt: context.startedAt.toISOString(),
    completedAt: (context.completedAt ?? new Date()).toISOString(),
  };
}
