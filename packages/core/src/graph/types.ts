/**
 * Principal Graph Types
 *
 * Directed multigraph over principals. Edges say "the source can act as, or
 * gain the permissions of, the target" and carry the rule that produced
 * them.
 */

import type { GraphWarning } from '../errors/warnings.js';
import type { PrincipalType } from '../ingestion/types.js';

// ============================================================================
// Nodes
// ============================================================================

export interface GraphNode {
  /** Unique id */
  arn: string;
  type: PrincipalType;
  name: string;
  /** ARN resource segment without the path: "role/A", "user/alice" */
  searchableName: string;
  isAdmin: boolean;
  hasBoundary: boolean;
}

// ============================================================================
// Edges
// ============================================================================

/**
 * access: the source can directly become the target (assume a role).
 * escalation: the source can abuse a permission to gain the target's rights.
 */
export type EdgeKind = 'access' | 'escalation';

export interface EdgeLabel {
  /** Id of the rule that produced the edge */
  ruleId: string;
  kind: EdgeKind;
  /** Short human description of the technique */
  technique: string;
  /** Resource-level conditions the edge depends on */
  preconditions: string[];
  /** The source escalates its own permissions (a self-loop) */
  selfEscalation: boolean;
}

export interface GraphEdge {
  source: string;
  target: string;
  label: EdgeLabel;
}

/**
 * Identity of an edge: at most one edge per (source, target, rule)
 */
export function edgeKey(edge: Pick<GraphEdge, 'source' | 'target'> & { label: Pick<EdgeLabel, 'ruleId'> }): string {
  return `${edge.source}\u0000${edge.target}\u0000${edge.label.ruleId}`;
}

// ============================================================================
// Snapshot data
// ============================================================================

export interface GraphStats {
  nodes: number;
  edges: number;
  users: number;
  roles: number;
  groups: number;
  admins: number;
  accessEdges: number;
  escalationEdges: number;
  selfEscalations: number;
  warnings: number;
}

/**
 * Plain data form of a graph, used by the store and the JSON renderer
 */
export interface GraphData {
  nodes: GraphNode[];
  edges: GraphEdge[];
  warnings: GraphWarning[];
}
