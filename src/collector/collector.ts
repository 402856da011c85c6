/**
 * Assignment Collector
 *
 * Fetches every requested assignment category for one scope and normalizes each
 * provider record into the canonical RawAssignment shape. Categories are fetched
 * independently: one failing category is recorded as a skip and does not
 * suppress the others.
 */

import type { ScopeDirectoryClient } from "../directory/types.js";
import { ConfigurationError, classifyRemoteError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type AuditLogger } from "../logging/index.js";
import { withAuditRetry } from "../retry.js";
import { lastSegment } from "../scopes.js";
import type {
  AssignmentCategory,
  AuditRetryOptions,
  AuditScopeOptions,
  ProviderRecord,
  RawAssignment,
  ScopeNode,
  SkippedScope,
  TemporalFields,
} from "../types.js";
import {
  ASSIGNMENT_ID_FIELDS,
  ASSIGNMENT_NAME_FIELDS,
  CONDITION_FIELDS,
  CONDITION_VERSION_FIELDS,
  CREATED_ON_FIELDS,
  DEFINITION_ID_FIELDS,
  DEFINITION_NAME_FIELDS,
  END_TIME_FIELDS,
  PRINCIPAL_ID_FIELDS,
  PRINCIPAL_NAME_FIELDS,
  PRINCIPAL_TYPE_FIELDS,
  SCOPE_PATH_FIELDS,
  START_TIME_FIELDS,
  field,
  firstNonEmpty,
  stringList,
} from "./fields.js";

export const UNKNOWN_SCOPE_PATH = "Unknown";

export type CollectorOptions = {
  logger?: AuditLogger;
  retry?: AuditRetryOptions;
  signal?: AbortSignal;
};

export type CollectResult = {
  scopeId: string;
  assignments: RawAssignment[];
  skipped: SkippedScope[];
};

/**
 * Categories to request for a run, in report order.
 */
export function categoriesFor(options: AuditScopeOptions): AssignmentCategory[] {
  const categories: AssignmentCategory[] = [];
  if (options.includeRbac !== false) {
    categories.push("StandingGrant");
    if (options.includeEligibleGrants) categories.push("EligibleGrant");
  }
  if (options.includePolicyDomain) categories.push("PolicyAssignment");
  return categories;
}

/**
 * Map a provider record onto the canonical shape. Never throws: fields that do
 * not resolve fall back to technical names or "Unknown".
 */
export function normalizeAssignment(record: ProviderRecord, category: AssignmentCategory): RawAssignment {
  const scopePath = firstNonEmpty(record, SCOPE_PATH_FIELDS) ?? UNKNOWN_SCOPE_PATH;
  const definitionId = firstNonEmpty(record, DEFINITION_ID_FIELDS[category]) ?? "";
  const name = firstNonEmpty(record, ASSIGNMENT_NAME_FIELDS) ?? "";
  const principalId = firstNonEmpty(record, PRINCIPAL_ID_FIELDS[category]) ?? "";

  const assignment: RawAssignment = {
    category,
    assignmentId: firstNonEmpty(record, ASSIGNMENT_ID_FIELDS) ?? `${scopePath}|${principalId}|${definitionId}`,
    name,
    scopePath,
    principal: {
      id: principalId,
      displayName: firstNonEmpty(record, PRINCIPAL_NAME_FIELDS[category]) ?? principalId,
      type: firstNonEmpty(record, PRINCIPAL_TYPE_FIELDS[category]),
    },
    roleOrPolicyRef: {
      id: definitionId,
      displayName:
        firstNonEmpty(record, DEFINITION_NAME_FIELDS[category]) ??
        (definitionId ? lastSegment(definitionId) : name),
    },
  };

  const temporal = readTemporal(record);
  if (temporal) assignment.temporal = temporal;

  const condition = firstNonEmpty(record, CONDITION_FIELDS);
  if (condition) {
    assignment.condition = condition;
    const conditionVersion = firstNonEmpty(record, CONDITION_VERSION_FIELDS);
    if (conditionVersion) assignment.conditionVersion = conditionVersion;
  }

  if (category === "PolicyAssignment") {
    assignment.policy = {
      enforcementMode: firstNonEmpty(record, [field("enforcementMode"), field("properties.enforcementMode")]),
      notScopes: stringList(record.notScopes) ?? stringList(field("properties.notScopes")(record)),
    };
  }

  if (category === "EligibleGrant") {
    assignment.eligibility = {
      memberType: firstNonEmpty(record, [field("memberType"), field("properties.memberType")]),
      status: firstNonEmpty(record, [field("status"), field("properties.status")]),
    };
  }

  return assignment;
}

function readTemporal(record: ProviderRecord): TemporalFields | undefined {
  const temporal: TemporalFields = {};
  const startTime = firstNonEmpty(record, START_TIME_FIELDS);
  const endTime = firstNonEmpty(record, END_TIME_FIELDS);
  const createdOn = firstNonEmpty(record, CREATED_ON_FIELDS);
  if (startTime) temporal.startTime = startTime;
  if (endTime) temporal.endTime = endTime;
  if (createdOn) temporal.createdOn = createdOn;
  return Object.keys(temporal).length > 0 ? temporal : undefined;
}

export class AssignmentCollector {
  private readonly log: AuditLogger;

  constructor(
    private readonly client: ScopeDirectoryClient,
    private readonly options: CollectorOptions = {},
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  async collect(scope: ScopeNode, categories: readonly AssignmentCategory[]): Promise<CollectResult> {
    const settled = await Promise.allSettled(categories.map((category) => this.fetch(scope.id, category)));

    for (const outcome of settled) {
      if (outcome.status === "rejected" && outcome.reason instanceof ConfigurationError) throw outcome.reason;
    }

    const assignments: RawAssignment[] = [];
    const skipped: SkippedScope[] = [];

    settled.forEach((outcome, i) => {
      const category = categories[i];
      if (outcome.status === "fulfilled") {
        for (const record of outcome.value) assignments.push(normalizeAssignment(record, category));
        return;
      }
      const reason = classifyRemoteError(outcome.reason);
      const message = formatErrorMessage(outcome.reason);
      skipped.push({ scopeId: scope.id, stage: "collect", category, reason, message });
      this.log.warn(`Failed to collect ${category} for ${scope.id}: ${reason}`, { error: message });
    });

    this.log.debug(`Collected ${assignments.length} assignment(s) for ${scope.id}`, {
      categories: [...categories],
    });
    return { scopeId: scope.id, assignments, skipped };
  }

  private fetch(scopeId: string, category: AssignmentCategory): Promise<ProviderRecord[]> {
    const call = (): Promise<ProviderRecord[]> => {
      switch (category) {
        case "StandingGrant":
          return this.client.getStandingGrants(scopeId);
        case "EligibleGrant":
          return this.client.getEligibleGrants(scopeId);
        case "PolicyAssignment":
          return this.client.getPolicyAssignments(scopeId);
      }
    };
    return withAuditRetry(call, this.options.retry, this.options.signal);
  }
}
