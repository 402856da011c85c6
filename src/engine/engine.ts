/**
 * Audit Engine
 *
 * Runs one audit: validate options → walk the hierarchy → collect and classify
 * per scope on a bounded worker pool → aggregate.
 *
 * - Configuration problems throw before any remote call is issued; one raised by
 *   the directory mid-run stops the pool and is rethrown.
 * - Cancellation (external signal or deadline) stops new remote calls; whatever
 *   finished is aggregated and the report is flagged incomplete.
 * - Per-scope results land in an append-only list read only after all workers join.
 */

import { randomUUID } from "node:crypto";
import { aggregate } from "../aggregator/index.js";
import { classify } from "../classifier/index.js";
import { AssignmentCollector, categoriesFor } from "../collector/index.js";
import { assertRunnable } from "../config.js";
import type { ScopeDirectoryClient } from "../directory/types.js";
import { ConfigurationError, classifyRemoteError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type AuditLogger } from "../logging/index.js";
import type { AssignmentRecord, AuditRunOptions, Report, ScopeNode, SkippedScope } from "../types.js";
import { HierarchyWalker } from "../walker/index.js";
import { anySignal, runPool } from "./pool.js";

export const DEFAULT_CONCURRENCY = 4;

export type AuditEngineOptions = {
  logger?: AuditLogger;
};

export class AuditEngine {
  private readonly log: AuditLogger;

  constructor(
    private readonly client: ScopeDirectoryClient,
    options: AuditEngineOptions = {},
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  async run(roots: readonly string[], options: AuditRunOptions = {}): Promise<Report> {
    assertRunnable(roots, options);
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Invalid audit configuration: concurrency must be a positive integer, got ${concurrency}`);
    }
    if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 0)) {
      throw new ConfigurationError(`Invalid audit configuration: timeoutMs must be non-negative, got ${options.timeoutMs}`);
    }
    this.client.validateRoots?.(roots);

    const startedAt = new Date();
    const now = options.now ?? startedAt;
    const log = this.log.withContext({ runId: randomUUID() });

    const timeoutController = new AbortController();
    let deadline: ReturnType<typeof setTimeout> | undefined;
    if (options.timeoutMs && options.timeoutMs > 0) {
      deadline = setTimeout(() => timeoutController.abort(new Error("Audit deadline reached")), options.timeoutMs);
    }
    // Aborted when a worker hits a configuration error; the run then rethrows it.
    const fatalController = new AbortController();
    const combined = anySignal(
      options.signal
        ? [options.signal, timeoutController.signal, fatalController.signal]
        : [timeoutController.signal, fatalController.signal],
    );
    const signal = combined.signal;
    const failure: { error?: ConfigurationError } = {};

    try {
      log.info(`Starting audit of ${roots.length} root(s)`, { roots: [...roots], concurrency });

      const walk = await new HierarchyWalker(this.client, {
        includeSubscriptions: options.includeSubscriptions,
        includeResourceGroups: options.includeResourceGroups,
        logger: log.child("walker"),
        retry: options.retry,
        signal,
      }).walk(roots);

      const collector = new AssignmentCollector(this.client, {
        logger: log.child("collector"),
        retry: options.retry,
        signal,
      });
      const categories = categoriesFor(options);

      const records: AssignmentRecord[] = [];
      const skipped: SkippedScope[] = [...walk.skipped];
      let scopesCollected = 0;

      const { notStarted } = await runPool(
        walk.nodes,
        concurrency,
        async (node: ScopeNode) => {
          try {
            const result = await collector.collect(node, categories);
            for (const assignment of result.assignments) {
              records.push(classify(assignment, node, { now }));
            }
            skipped.push(...result.skipped);
            scopesCollected++;
          } catch (error) {
            if (error instanceof ConfigurationError) {
              failure.error ??= error;
              fatalController.abort(error);
              return;
            }
            skipped.push({
              scopeId: node.id,
              stage: "collect",
              reason: classifyRemoteError(error),
              message: formatErrorMessage(error),
            });
            log.error(`Unexpected failure collecting ${node.id}`, { error: formatErrorMessage(error) });
          }
        },
        signal,
      );
      if (failure.error) throw failure.error;

      for (const node of notStarted) {
        skipped.push({
          scopeId: node.id,
          stage: "collect",
          reason: "Cancelled",
          message: "Run cancelled before scope was collected",
        });
      }

      const incomplete = walk.aborted || signal.aborted;
      if (incomplete) {
        log.warn("Audit cancelled; report contains partial results", {
          scopesCollected,
          scopesPending: notStarted.length,
        });
      }

      const report = aggregate(walk.nodes, records, {
        skipped,
        incomplete,
        cyclesDetected: walk.cyclesDetected,
        scopesCollected,
        evaluatedAt: now,
        startedAt,
        completedAt: new Date(),
      });

      log.info(`Audit finished: ${report.nodes.length} scope(s), ${report.records.length} record(s)`, {
        skipped: report.skipped.length,
        incomplete: report.incomplete,
      });
      return report;
    } finally {
      if (deadline) clearTimeout(deadline);
      combined.dispose();
    }
  }
}

export function createAuditEngine(client: ScopeDirectoryClient, options?: AuditEngineOptions): AuditEngine {
  return new AuditEngine(client, options);
}
