/**
 * Hierarchy Walker
 *
 * Expands one or more root scopes into the flat set of descendant scopes.
 *
 * - One visited set spans the whole multi-root walk, so a scope shared by two
 *   roots is expanded once and every root that reaches it is recorded.
 * - Iterative depth-first traversal; a child that is already on the current
 *   ancestor path is reported as a cycle and not followed.
 * - A branch whose expansion fails is skipped with its reason; siblings continue.
 */

import type { ScopeDirectoryClient } from "../directory/types.js";
import { ConfigurationError, classifyRemoteError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type AuditLogger } from "../logging/index.js";
import { withAuditRetry } from "../retry.js";
import { inferScopeKind, lastSegment } from "../scopes.js";
import type {
  AuditRetryOptions,
  AuditScopeOptions,
  ScopeChild,
  ScopeKind,
  ScopeNode,
  SkippedScope,
} from "../types.js";

export type WalkerOptions = Pick<AuditScopeOptions, "includeSubscriptions" | "includeResourceGroups"> & {
  logger?: AuditLogger;
  retry?: AuditRetryOptions;
  signal?: AbortSignal;
};

export type WalkResult = {
  /** Discovered scopes in discovery order. */
  nodes: ScopeNode[];
  skipped: SkippedScope[];
  cyclesDetected: number;
  /** True when the signal fired before the walk finished. */
  aborted: boolean;
};

/**
 * Whether children of a scope of this kind are requested.
 */
export function shouldExpand(kind: ScopeKind, options: WalkerOptions): boolean {
  switch (kind) {
    case "ManagementGroup":
      return true;
    case "Subscription":
      return options.includeSubscriptions === true;
    case "ResourceGroup":
      return options.includeSubscriptions === true && options.includeResourceGroups === true;
    case "Resource":
      return false;
  }
}

type MutableNode = {
  id: string;
  displayName: string;
  kind: ScopeKind;
  parentId: string | null;
  rootId: string;
  depth: number;
  reachableFrom: string[];
};

type Frame = {
  id: string;
  ancestors: ReadonlySet<string>;
};

/**
 * Per-walk state: the visited set, the observed edges and the outcome counters.
 */
class WalkState {
  readonly nodes = new Map<string, MutableNode>();
  readonly edges = new Map<string, string[]>();
  readonly skipped: SkippedScope[] = [];
  cyclesDetected = 0;
  aborted = false;

  register(node: MutableNode): void {
    this.nodes.set(node.id, node);
  }

  addEdge(parentId: string, childId: string): void {
    const list = this.edges.get(parentId);
    if (list) {
      if (!list.includes(childId)) list.push(childId);
    } else {
      this.edges.set(parentId, [childId]);
    }
  }

  /**
   * Record that `rootId` reaches `scopeId` and everything already known below it.
   */
  addReach(scopeId: string, rootId: string): void {
    const seen = new Set<string>();
    const queue = [scopeId];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      const node = this.nodes.get(id);
      if (!node) continue;
      if (!node.reachableFrom.includes(rootId)) node.reachableFrom.push(rootId);
      queue.push(...(this.edges.get(id) ?? []));
    }
  }

  skip(entry: SkippedScope): void {
    this.skipped.push(entry);
  }

  toResult(): WalkResult {
    const nodes: ScopeNode[] = [];
    for (const node of this.nodes.values()) {
      nodes.push(
        Object.freeze({
          ...node,
          reachableFrom: Object.freeze([...node.reachableFrom]),
        }),
      );
    }
    return {
      nodes,
      skipped: [...this.skipped],
      cyclesDetected: this.cyclesDetected,
      aborted: this.aborted,
    };
  }
}

export class HierarchyWalker {
  private readonly log: AuditLogger;

  constructor(
    private readonly client: ScopeDirectoryClient,
    private readonly options: WalkerOptions = {},
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  async walk(roots: readonly string[]): Promise<WalkResult> {
    const state = new WalkState();

    for (let i = 0; i < roots.length; i++) {
      if (this.options.signal?.aborted) {
        state.aborted = true;
        for (const pending of roots.slice(i)) {
          state.skip({ scopeId: pending, stage: "expand", reason: "Cancelled", message: "Walk cancelled before root was expanded" });
        }
        break;
      }
      await this.walkRoot(roots[i], state);
    }

    const result = state.toResult();
    this.log.info(`Discovered ${result.nodes.length} scope(s) from ${roots.length} root(s)`, {
      skipped: result.skipped.length,
      cyclesDetected: result.cyclesDetected,
      aborted: result.aborted,
    });
    return result;
  }

  private async walkRoot(requestedRootId: string, state: WalkState): Promise<void> {
    let root: ScopeChild;
    try {
      root = await this.resolveRoot(requestedRootId);
    } catch (error) {
      this.recordFailure(state, requestedRootId, error);
      return;
    }

    const existing = state.nodes.get(root.id);
    if (existing) {
      this.log.debug(`Root ${root.id} already reached from ${existing.rootId}; not expanding again`);
      state.addReach(root.id, root.id);
      return;
    }

    state.register({
      id: root.id,
      displayName: root.displayName,
      kind: root.kind,
      parentId: null,
      rootId: root.id,
      depth: 0,
      reachableFrom: [root.id],
    });

    const stack: Frame[] = [{ id: root.id, ancestors: new Set([root.id]) }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const node = state.nodes.get(frame.id);
      if (!node || !shouldExpand(node.kind, this.options)) continue;

      if (this.options.signal?.aborted) {
        state.aborted = true;
        for (const pending of [frame, ...stack]) {
          const pendingNode = state.nodes.get(pending.id);
          if (pendingNode && shouldExpand(pendingNode.kind, this.options)) {
            state.skip({ scopeId: pending.id, stage: "expand", reason: "Cancelled", message: "Walk cancelled before scope was expanded" });
          }
        }
        return;
      }

      let children: ScopeChild[];
      try {
        children = await withAuditRetry(
          () => this.client.getChildren(node.id),
          this.options.retry,
          this.options.signal,
        );
      } catch (error) {
        this.recordFailure(state, node.id, error);
        continue;
      }

      const next: Frame[] = [];
      for (const child of children) {
        if (frame.ancestors.has(child.id)) {
          state.cyclesDetected++;
          this.log.warn(`Cycle detected: ${child.id} is an ancestor of ${node.id}; not following`, {
            rootId: node.rootId,
          });
          continue;
        }

        const known = state.nodes.get(child.id);
        if (known) {
          state.addEdge(node.id, child.id);
          for (const rootId of node.reachableFrom) state.addReach(child.id, rootId);
          continue;
        }

        state.register({
          id: child.id,
          displayName: child.displayName || lastSegment(child.id),
          kind: child.kind,
          parentId: node.id,
          rootId: node.rootId,
          depth: node.depth + 1,
          reachableFrom: [...node.reachableFrom],
        });
        state.addEdge(node.id, child.id);
        next.push({ id: child.id, ancestors: new Set([...frame.ancestors, child.id]) });
      }

      // Reverse so children are expanded in the order the directory returned them.
      for (let i = next.length - 1; i >= 0; i--) stack.push(next[i]);
    }
  }

  private async resolveRoot(rootId: string): Promise<ScopeChild> {
    const resolve = this.client.resolveRoot?.bind(this.client);
    if (!resolve) {
      return { id: rootId, displayName: lastSegment(rootId), kind: inferScopeKind(rootId) };
    }
    return withAuditRetry(() => resolve(rootId), this.options.retry, this.options.signal);
  }

  private recordFailure(state: WalkState, scopeId: string, error: unknown): void {
    if (error instanceof ConfigurationError) throw error;
    const reason = classifyRemoteError(error);
    const message = formatErrorMessage(error);
    if (reason === "Cancelled") state.aborted = true;
    state.skip({ scopeId, stage: "expand", reason, message });
    this.log.warn(`Skipping subtree of ${scopeId}: ${reason}`, { error: message });
  }
}
