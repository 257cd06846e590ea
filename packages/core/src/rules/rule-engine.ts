/**
 * Rule Engine
 *
 * Evaluates every registered rule for every (source, target) pair. Each
 * source is independent, so sources run through the worker pool; the
 * per-source edge lists are merged afterwards by a single writer that
 * drops duplicates and sorts, so the output does not depend on
 * evaluation order.
 */

import type { GraphEdge } from '../graph/types.js';
import { edgeKey } from '../graph/types.js';
import { WorkerPool } from '../ingestion/worker-pool.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import { compareStrings } from '../utils/sort.js';
import type { RuleRegistry } from './registry.js';
import type { AccountView, EscalationRule } from './types.js';

export interface RuleEngineOptions {
  concurrency?: number | undefined;
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
}

export interface RuleEngineStats {
  sources: number;
  skippedAdmins: number;
  edges: number;
  edgesByRule: Record<string, number>;
}

export interface RuleEngineResult {
  edges: GraphEdge[];
  stats: RuleEngineStats;
}

function appliesTo(types: EscalationRule['sourceTypes'], principal: ResolvedPrincipal): boolean {
  return types === undefined || types.includes(principal.principal.type);
}

/**
 * Sort edges by (source, target, ruleId)
 */
export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return (
    compareStrings(a.source, b.source) ||
    compareStrings(a.target, b.target) ||
    compareStrings(a.label.ruleId, b.label.ruleId)
  );
}

export class RuleEngine {
  constructor(private readonly registry: RuleRegistry) {}

  /**
   * Edges leaving one source. Pure: reads only its arguments.
   */
  evaluateSource(
    source: ResolvedPrincipal,
    targets: readonly ResolvedPrincipal[],
    account: AccountView,
    rules: readonly EscalationRule[] = this.registry.list()
  ): GraphEdge[] {
    const edges: GraphEdge[] = [];
    const sourceArn = source.principal.arn;

    for (const rule of rules) {
      if (!appliesTo(rule.sourceTypes, source)) continue;

      if (rule.scope === 'self') {
        if (!appliesTo(rule.targetTypes, source)) continue;
        const label = rule.evaluate({ source, target: source, account });
        if (label) {
          edges.push({ source: sourceArn, target: sourceArn, label: { ...label, selfEscalation: true } });
        }
        continue;
      }

      for (const target of targets) {
        if (target.principal.arn === sourceArn) continue;
        if (!appliesTo(rule.targetTypes, target)) continue;
        const label = rule.evaluate({ source, target, account });
        if (label) {
          edges.push({ source: sourceArn, target: target.principal.arn, label: { ...label, selfEscalation: false } });
        }
      }
    }

    return edges;
  }

  /**
   * Evaluate all rules over all principals. Administrators are not used as
   * sources: they already hold every permission.
   */
  async evaluate(
    principals: readonly ResolvedPrincipal[],
    account: AccountView,
    options: RuleEngineOptions = {}
  ): Promise<RuleEngineResult> {
    const logger = options.logger ?? silentLogger;
    const rules = this.registry.list();
    const targets = [...principals].sort((a, b) => compareStrings(a.principal.arn, b.principal.arn));
    const sources = targets.filter(resolved => !resolved.isAdmin);

    logger.debug(`Evaluating ${rules.length} rule(s) for ${sources.length} source principal(s)`);

    const perSource = await WorkerPool.run(
      sources,
      async source => this.evaluateSource(source, targets, account, rules),
      { concurrency: options.concurrency ?? 4, signal: options.signal, stage: 'rule evaluation' }
    );

    // Single writer merge
    const merged = new Map<string, GraphEdge>();
    for (const edges of perSource) {
      for (const edge of edges) {
        const key = edgeKey(edge);
        if (!merged.has(key)) merged.set(key, edge);
      }
    }
    const edges = [...merged.values()].sort(compareEdges);

    const edgesByRule: Record<string, number> = {};
    for (const edge of edges) {
      edgesByRule[edge.label.ruleId] = (edgesByRule[edge.label.ruleId] ?? 0) + 1;
    }

    return {
      edges,
      stats: {
        sources: sources.length,
        skippedAdmins: targets.length - sources.length,
        edges: edges.length,
        edgesByRule,
      },
    };
  }
}
