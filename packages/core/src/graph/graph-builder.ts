/**
 * Graph Builder
 *
 * Collects principals, edges and resource records, then freezes them into
 * a PrincipalGraph. Builders can be seeded from an existing graph to add
 * principals without starting over.
 *
 * References to principals that are not in the identity set never fail the
 * build: the edge or membership is dropped and a dangling-reference
 * warning recorded instead.
 */

import {
  createDanglingReferenceWarning,
  type GraphWarning,
} from '../errors/warnings.js';
import type { InstanceProfileRecord, LambdaFunctionRecord } from '../ingestion/types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { getSearchableName } from '../policy/arn.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import { PrincipalGraph } from './principal-graph.js';
import { edgeKey, type GraphEdge, type GraphNode } from './types.js';

export interface GraphBuilderOptions {
  logger?: Logger | undefined;
}

interface PendingReference {
  source: string;
  reference: string;
  what: string;
}

function warningKey(warning: GraphWarning): string {
  return warning.kind === 'partial-ingestion'
    ? `partial\u0000${warning.principalArn}\u0000${warning.operation}`
    : `dangling\u0000${warning.source}\u0000${warning.reference}`;
}

/**
 * Graph node for a resolved principal
 */
export function createGraphNode(resolved: ResolvedPrincipal): GraphNode {
  const { principal } = resolved;
  return {
    arn: principal.arn,
    type: principal.type,
    name: principal.name,
    searchableName: getSearchableName(principal.arn),
    isAdmin: resolved.isAdmin,
    hasBoundary: principal.permissionsBoundary !== undefined,
  };
}

export class GraphBuilder {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly warnings = new Map<string, GraphWarning>();
  private readonly references: PendingReference[] = [];
  private readonly logger: Logger;

  constructor(options: GraphBuilderOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start from an existing graph: its nodes, edges and warnings are kept
   */
  static from(graph: PrincipalGraph, options: GraphBuilderOptions = {}): GraphBuilder {
    const builder = new GraphBuilder(options);
    for (const node of graph.nodes()) builder.addNode(node);
    builder.addEdges(graph.edges());
    for (const warning of graph.warnings()) builder.addWarning(warning);
    return builder;
  }

  addNode(node: GraphNode): this {
    this.nodes.set(node.arn, node);
    return this;
  }

  /**
   * Add a principal. Group memberships are checked when the graph is built.
   */
  addPrincipal(resolved: ResolvedPrincipal): this {
    this.addNode(createGraphNode(resolved));
    for (const groupArn of resolved.principal.groupArns) {
      this.references.push({ source: resolved.principal.arn, reference: groupArn, what: 'group' });
    }
    return this;
  }

  addPrincipals(principals: Iterable<ResolvedPrincipal>): this {
    for (const resolved of principals) this.addPrincipal(resolved);
    return this;
  }

  hasPrincipal(arn: string): boolean {
    return this.nodes.has(arn);
  }

  /**
   * Add an edge. Returns false when an edge with the same
   * (source, target, ruleId) is already present; the first label wins.
   */
  addEdge(edge: GraphEdge): boolean {
    const key = edgeKey(edge);
    if (this.edges.has(key)) return false;
    this.edges.set(key, edge);
    return true;
  }

  addEdges(edges: Iterable<GraphEdge>): number {
    let added = 0;
    for (const edge of edges) {
      if (this.addEdge(edge)) added++;
    }
    return added;
  }

  /**
   * Record the roles that Lambda functions and instance profiles point at,
   * so unknown ones are reported
   */
  addResources(resources: {
    functions?: readonly LambdaFunctionRecord[] | undefined;
    instanceProfiles?: readonly InstanceProfileRecord[] | undefined;
  }): this {
    for (const fn of resources.functions ?? []) {
      this.references.push({ source: fn.arn, reference: fn.roleArn, what: 'execution role' });
    }
    for (const profile of resources.instanceProfiles ?? []) {
      for (const roleArn of profile.roleArns) {
        this.references.push({ source: profile.arn, reference: roleArn, what: 'role' });
      }
    }
    return this;
  }

  addWarning(warning: GraphWarning): this {
    const key = warningKey(warning);
    if (!this.warnings.has(key)) this.warnings.set(key, warning);
    return this;
  }

  addWarnings(warnings: Iterable<GraphWarning>): this {
    for (const warning of warnings) this.addWarning(warning);
    return this;
  }

  private dangling(source: string, reference: string, what: string): void {
    const warning = createDanglingReferenceWarning(source, reference, what);
    if (!this.warnings.has(warningKey(warning))) {
      this.logger.warn(warning.message);
    }
    this.addWarning(warning);
  }

  /**
   * Freeze the current state into a graph. The builder stays usable.
   */
  build(): PrincipalGraph {
    for (const { source, reference, what } of this.references) {
      if (!this.nodes.has(reference)) this.dangling(source, reference, what);
    }

    const edges: GraphEdge[] = [];
    for (const edge of this.edges.values()) {
      if (!this.nodes.has(edge.source)) {
        this.dangling(edge.target, edge.source, `edge source (${edge.label.ruleId})`);
        continue;
      }
      if (!this.nodes.has(edge.target)) {
        this.dangling(edge.source, edge.target, `edge target (${edge.label.ruleId})`);
        continue;
      }
      edges.push(edge);
    }

    this.logger.debug(`Built graph with ${this.nodes.size} node(s) and ${edges.length} edge(s)`);

    return new PrincipalGraph({
      nodes: [...this.nodes.values()],
      edges,
      warnings: [...this.warnings.values()],
    });
  }
}
