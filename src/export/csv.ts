/**
 * CSV export of a Report: one row per assignment record, plus a scope inventory.
 * Rows end with CRLF; fields containing a comma, quote or line break are quoted.
 */

import type { AssignmentRecord, Report, ScopeNode } from "../types.js";

const LINE_BREAK = "\r\n";

export const ASSIGNMENT_COLUMNS = [
  "scopeId",
  "scopeKind",
  "rootId",
  "category",
  "principalName",
  "principalId",
  "identityKind",
  "roleOrPolicy",
  "scopePath",
  "inheritance",
  "lifecycleState",
  "lifecycleLabel",
  "startTime",
  "endTime",
  "condition",
] as const;

export const SCOPE_COLUMNS = ["id", "displayName", "kind", "parentId", "rootId", "reachableFrom", "depth"] as const;

/** Escape a CSV field value. */
export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toRow(values: readonly string[]): string {
  return values.map(csvEscape).join(",");
}

function assignmentRow(record: AssignmentRecord, node: ScopeNode | undefined): string {
  return toRow([
    record.scopeId,
    node?.kind ?? "",
    node?.rootId ?? "",
    record.category,
    record.principal.displayName,
    record.principal.id,
    record.principal.kind,
    record.roleOrPolicyRef.displayName,
    record.scopePath,
    record.inheritance,
    record.lifecycleState,
    record.lifecycleLabel,
    record.temporal.startTime ?? "",
    record.temporal.endTime ?? "",
    record.conditional.expression ?? "",
  ]);
}

/**
 * Records in report order.
 */
export function toAssignmentsCsv(report: Pick<Report, "nodes" | "records">): string {
  const nodesById = new Map(report.nodes.map((n) => [n.id, n]));
  const lines = [toRow(ASSIGNMENT_COLUMNS)];
  for (const record of report.records) {
    lines.push(assignmentRow(record, nodesById.get(record.scopeId)));
  }
  return lines.join(LINE_BREAK) + LINE_BREAK;
}

export function toScopesCsv(report: Pick<Report, "nodes">): string {
  const lines = [toRow(SCOPE_COLUMNS)];
  for (const node of report.nodes) {
    lines.push(
      toRow([
        node.id,
        node.displayName,
        node.kind,
        node.parentId ?? "",
        node.rootId,
        node.reachableFrom.join(";"),
        String(node.depth),
      ]),
    );
  }
  return lines.join(LINE_BREAK) + LINE_BREAK;
}
