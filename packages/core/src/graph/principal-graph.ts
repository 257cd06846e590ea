/**
 * Principal Graph
 *
 * Frozen snapshot produced by the GraphBuilder. All iteration is sorted by
 * identifier (nodes by ARN, adjacency by target then rule id), so every
 * traversal over the same graph visits the same things in the same order.
 * Safe to share between concurrent readers.
 */

import type { GraphWarning } from '../errors/warnings.js';
import { stableStringify } from '../resolver/policy-hash.js';
import { wildcardMatch } from '../policy/wildcard.js';
import { compareStrings } from '../utils/sort.js';
import { deepFreeze } from '../utils/freeze.js';
import type { GraphData, GraphEdge, GraphNode, GraphStats } from './types.js';

function compareAdjacency(a: GraphEdge, b: GraphEdge): number {
  return (
    compareStrings(a.target, b.target) ||
    compareStrings(a.source, b.source) ||
    compareStrings(a.label.ruleId, b.label.ruleId)
  );
}

function compareIncoming(a: GraphEdge, b: GraphEdge): number {
  return compareStrings(a.source, b.source) || compareStrings(a.label.ruleId, b.label.ruleId);
}

const EMPTY: readonly GraphEdge[] = Object.freeze([]);

/**
 * True when the selector matches the node. A selector is "*", or a glob
 * over the ARN or the searchable name ("role/A", "user/*").
 */
export function matchesSelector(node: GraphNode, selector: string): boolean {
  if (selector === '*') return true;
  return wildcardMatch(selector, node.arn) || wildcardMatch(selector, node.searchableName);
}

export class PrincipalGraph {
  private readonly nodeList: readonly GraphNode[];
  private readonly edgeList: readonly GraphEdge[];
  private readonly warningList: readonly GraphWarning[];
  private readonly nodeIndex: ReadonlyMap<string, GraphNode>;
  private readonly outgoingIndex: ReadonlyMap<string, readonly GraphEdge[]>;
  private readonly incomingIndex: ReadonlyMap<string, readonly GraphEdge[]>;

  constructor(data: GraphData) {
    const nodes = [...data.nodes].sort((a, b) => compareStrings(a.arn, b.arn));
    const edges = [...data.edges].sort(
      (a, b) => compareStrings(a.source, b.source) || compareAdjacency(a, b)
    );

    this.nodeList = deepFreeze(nodes);
    this.edgeList = deepFreeze(edges);
    this.warningList = deepFreeze([...data.warnings]);
    this.nodeIndex = new Map(nodes.map(node => [node.arn, node]));

    const outgoing = new Map<string, GraphEdge[]>();
    const incoming = new Map<string, GraphEdge[]>();
    for (const edge of edges) {
      outgoing.set(edge.source, [...(outgoing.get(edge.source) ?? []), edge]);
      incoming.set(edge.target, [...(incoming.get(edge.target) ?? []), edge]);
    }
    for (const list of outgoing.values()) list.sort(compareAdjacency);
    for (const list of incoming.values()) list.sort(compareIncoming);
    this.outgoingIndex = outgoing;
    this.incomingIndex = incoming;

    Object.freeze(this);
  }

  nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  warnings(): readonly GraphWarning[] {
    return this.warningList;
  }

  getNode(arn: string): GraphNode | undefined {
    return this.nodeIndex.get(arn);
  }

  hasNode(arn: string): boolean {
    return this.nodeIndex.has(arn);
  }

  /**
   * Edges leaving the node, sorted by (target, ruleId)
   */
  outgoing(arn: string): readonly GraphEdge[] {
    return this.outgoingIndex.get(arn) ?? EMPTY;
  }

  /**
   * Edges entering the node, sorted by (source, ruleId)
   */
  incoming(arn: string): readonly GraphEdge[] {
    return this.incomingIndex.get(arn) ?? EMPTY;
  }

  findNodes(selector: string): GraphNode[] {
    return this.nodeList.filter(node => matchesSelector(node, selector));
  }

  stats(): GraphStats {
    return {
      nodes: this.nodeList.length,
      edges: this.edgeList.length,
      users: this.nodeList.filter(node => node.type === 'user').length,
      roles: this.nodeList.filter(node => node.type === 'role').length,
      groups: this.nodeList.filter(node => node.type === 'group').length,
      admins: this.nodeList.filter(node => node.isAdmin).length,
      accessEdges: this.edgeList.filter(edge => edge.label.kind === 'access').length,
      escalationEdges: this.edgeList.filter(edge => edge.label.kind === 'escalation').length,
      selfEscalations: this.edgeList.filter(edge => edge.label.selfEscalation).length,
      warnings: this.warningList.length,
    };
  }

  toData(): GraphData {
    return {
      nodes: [...this.nodeList],
      edges: [...this.edgeList],
      warnings: [...this.warningList],
    };
  }
}

/**
 * Same node set and same edge set, labels included. Warnings and metadata
 * are not compared.
 */
export function graphsStructurallyEqual(a: PrincipalGraph, b: PrincipalGraph): boolean {
  return (
    stableStringify(a.nodes()) === stableStringify(b.nodes()) &&
    stableStringify(a.edges()) === stableStringify(b.edges())
  );
}
