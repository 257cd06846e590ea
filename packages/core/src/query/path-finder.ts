/**
 * Path Finder
 *
 * Depth-first enumeration of simple paths over a frozen PrincipalGraph.
 * The visited set holds the nodes on the current path only and is created
 * per traversal root, so cycles end a branch without hiding nodes from
 * other branches or other roots. A self-loop is only ever the last edge of
 * a path.
 */

import { OperationAbortedError } from '../errors/errors.js';
import type { PrincipalGraph } from '../graph/principal-graph.js';
import type { GraphEdge, GraphNode } from '../graph/types.js';

// ============================================================================
// Types
// ============================================================================

export interface QueryPath {
  source: string;
  target: string;
  /** Empty when the source itself satisfies the goal */
  edges: GraphEdge[];
}

/**
 * What a traversal is looking for
 */
export interface TraversalGoal {
  /** Reaching this node through a regular edge completes a path */
  isTarget(node: GraphNode): boolean;
  /** This self-loop, as the last edge, completes a path */
  acceptsSelfLoop(edge: GraphEdge): boolean;
}

export interface PathFinderOptions {
  /** Maximum number of edges in a path */
  maxDepth: number;
  /** Stop after this many paths in total */
  maxPaths?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface PathCollector {
  paths: QueryPath[];
  truncated: boolean;
  nodesVisited: number;
}

export function createCollector(): PathCollector {
  return { paths: [], truncated: false, nodesVisited: 0 };
}

// ============================================================================
// Path Finder
// ============================================================================

export class PathFinder {
  constructor(private readonly graph: PrincipalGraph) {}

  /**
   * Append every path from root that meets the goal to the collector, in
   * discovery order. Paths stop at the first target they reach.
   *
   * @returns false once the collector is full
   */
  findPaths(root: string, goal: TraversalGoal, options: PathFinderOptions, collector: PathCollector): boolean {
    if (!this.graph.hasNode(root) || collector.truncated) return !collector.truncated;

    const onPath = new Set<string>([root]);
    const edges: GraphEdge[] = [];

    const emit = (target: string): boolean => {
      if (options.maxPaths !== undefined && collector.paths.length >= options.maxPaths) {
        collector.truncated = true;
        return false;
      }
      collector.paths.push({ source: root, target, edges: [...edges] });
      return true;
    };

    const visit = (arn: string): boolean => {
      if (options.signal?.aborted) {
        throw new OperationAbortedError('query traversal');
      }
      collector.nodesVisited++;
      if (edges.length >= options.maxDepth) return true;

      for (const edge of this.graph.outgoing(arn)) {
        if (edge.target === edge.source) {
          if (goal.acceptsSelfLoop(edge)) {
            edges.push(edge);
            const more = emit(edge.target);
            edges.pop();
            if (!more) return false;
          }
          continue;
        }

        if (onPath.has(edge.target)) continue;
        const node = this.graph.getNode(edge.target);
        if (!node) continue;

        edges.push(edge);
        let more: boolean;
        if (goal.isTarget(node)) {
          more = emit(edge.target);
        } else {
          onPath.add(edge.target);
          more = visit(edge.target);
          onPath.delete(edge.target);
        }
        edges.pop();
        if (!more) return false;
      }
      return true;
    };

    return visit(root);
  }

  /**
   * Record a zero-edge path: the root satisfies the goal by itself
   */
  addTrivialPath(root: string, options: PathFinderOptions, collector: PathCollector): boolean {
    if (options.maxPaths !== undefined && collector.paths.length >= options.maxPaths) {
      collector.truncated = true;
      return false;
    }
    collector.paths.push({ source: root, target: root, edges: [] });
    return true;
  }
}
