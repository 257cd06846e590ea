/**
 * Query Engine
 *
 * Parses a query and runs it against a frozen graph. Read-only: any number
 * of engines may share one graph.
 */

import { DEFAULT_MAX_DEPTH } from '../config/config.js';
import { matchesSelector, type PrincipalGraph } from '../graph/principal-graph.js';
import type { GraphEdge, GraphNode } from '../graph/types.js';
import { isAdministrator, isAuthorized, withSelfGrantedAccess } from '../resolver/permission-resolver.js';
import type { EffectivePermissions } from '../resolver/types.js';
import { removePermissionsBoundaryRule } from '../rules/catalog/iam-policy-rules.js';
import { queryKind, type QueryAst } from './ast.js';
import { parseQuery } from './parser.js';
import {
  createCollector,
  PathFinder,
  type PathCollector,
  type PathFinderOptions,
  type QueryPath,
  type TraversalGoal,
} from './path-finder.js';

// ============================================================================
// Types
// ============================================================================

export interface QueryOptions {
  /** Depth bound when the query does not give one */
  maxDepth?: number | undefined;
  maxPaths?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface QueryResult {
  query: string;
  kind: string;
  paths: QueryPath[];
  truncated: boolean;
}

/**
 * Effective permissions per principal ARN, used by `can ... do` and
 * `who can do`
 */
export type PermissionLookup = (arn: string) => EffectivePermissions | undefined;

// ============================================================================
// Goals
// ============================================================================

const LIFT_BOUNDARY_RULE = removePermissionsBoundaryRule.id;

function privescGoal(acceptsSelfLoop: (edge: GraphEdge) => boolean): TraversalGoal {
  return { isTarget: node => node.isAdmin, acceptsSelfLoop };
}

function selectorGoal(selector: string, root: string): TraversalGoal {
  return {
    isTarget: node => node.arn !== root && matchesSelector(node, selector),
    acceptsSelfLoop: () => false,
  };
}

function actionGoal(
  authorized: (node: GraphNode) => boolean,
  acceptsSelfLoop: (edge: GraphEdge) => boolean
): TraversalGoal {
  return { isTarget: authorized, acceptsSelfLoop };
}

// ============================================================================
// Query Engine
// ============================================================================

export class QueryEngine {
  private readonly finder: PathFinder;

  constructor(
    private readonly graph: PrincipalGraph,
    private readonly permissions: PermissionLookup = () => undefined
  ) {
    this.finder = new PathFinder(graph);
  }

  /**
   * Parse and run a query string
   */
  execute(query: string, options: QueryOptions = {}): QueryResult {
    const ast = parseQuery(query);
    return this.run(ast, query, options);
  }

  /**
   * Run an already parsed query
   */
  run(ast: QueryAst, query: string, options: QueryOptions = {}): QueryResult {
    const finderOptions: PathFinderOptions = {
      maxDepth: ast.depth ?? options.maxDepth ?? DEFAULT_MAX_DEPTH,
      maxPaths: options.maxPaths,
      signal: options.signal,
    };
    const collector = createCollector();

    switch (ast.kind) {
      case 'preset':
        if (ast.preset === 'privesc') {
          this.privesc(ast.selector, finderOptions, collector);
        } else if (ast.preset === 'admin') {
          this.admins(ast.selector, finderOptions, collector);
        } else {
          this.connected(ast.source, ast.target, finderOptions, collector, false);
        }
        break;
      case 'can-reach':
        this.connected(ast.source, ast.target, finderOptions, collector, true);
        break;
      case 'can-do':
        this.canDo(ast.principal, ast.action, ast.resource, finderOptions, collector);
        break;
      case 'who-can-do':
        this.canDo('*', ast.action, ast.resource, finderOptions, collector);
        break;
    }

    return {
      query,
      kind: queryKind(ast),
      paths: collector.paths,
      truncated: collector.truncated,
    };
  }

  /**
   * Non-admin principals that can reach an admin or escalate themselves
   */
  private privesc(selector: string, options: PathFinderOptions, collector: PathCollector): void {
    const goal = privescGoal(edge => this.selfLoopGrants(edge, isAdministrator));
    for (const node of this.graph.findNodes(selector)) {
      if (node.isAdmin) continue;
      if (!this.finder.findPaths(node.arn, goal, options, collector)) return;
    }
  }

  private admins(selector: string, options: PathFinderOptions, collector: PathCollector): void {
    for (const node of this.graph.findNodes(selector)) {
      if (!node.isAdmin) continue;
      if (!this.finder.addTrivialPath(node.arn, options, collector)) return;
    }
  }

  private connected(
    sourceSelector: string,
    targetSelector: string,
    options: PathFinderOptions,
    collector: PathCollector,
    includeSelf: boolean
  ): void {
    for (const node of this.graph.findNodes(sourceSelector)) {
      if (includeSelf && matchesSelector(node, targetSelector)) {
        if (!this.finder.addTrivialPath(node.arn, options, collector)) return;
        continue;
      }
      const goal = selectorGoal(targetSelector, node.arn);
      if (!this.finder.findPaths(node.arn, goal, options, collector)) return;
    }
  }

  private canDo(
    selector: string,
    action: string,
    resource: string,
    options: PathFinderOptions,
    collector: PathCollector
  ): void {
    const authorized = (node: GraphNode): boolean => {
      const permissions = this.permissions(node.arn);
      return permissions !== undefined && isAuthorized(permissions, action, resource);
    };
    const goal = actionGoal(authorized, edge =>
      this.selfLoopGrants(edge, permissions => isAuthorized(permissions, action, resource))
    );

    for (const node of this.graph.findNodes(selector)) {
      const more = authorized(node)
        ? this.finder.addTrivialPath(node.arn, options, collector)
        : this.finder.findPaths(node.arn, goal, options, collector);
      if (!more) return;
    }
  }

  /**
   * Whether taking a self-escalation loop leaves its principal with
   * permissions that pass `check`. Policies the principal writes for itself
   * stay inside its permissions boundary unless it can also lift the
   * boundary.
   */
  private selfLoopGrants(edge: GraphEdge, check: (permissions: EffectivePermissions) => boolean): boolean {
    if (!edge.label.selfEscalation) return false;

    const lifts = edge.label.ruleId === LIFT_BOUNDARY_RULE;
    const canLift =
      lifts ||
      this.graph
        .outgoing(edge.source)
        .some(other => other.target === other.source && other.label.ruleId === LIFT_BOUNDARY_RULE);

    const permissions = this.permissions(edge.source);
    if (permissions === undefined) {
      // Unresolved principal: only the boundary flag is known
      return canLift || this.graph.getNode(edge.source)?.hasBoundary !== true;
    }

    const after = lifts
      ? { ...permissions, boundary: null }
      : withSelfGrantedAccess(permissions, { liftBoundary: canLift });
    return check(after);
  }
}

/**
 * Deterministic JSON form of a result
 */
export function serializeQueryResult(result: QueryResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Lookup over stored resolutions, e.g. a snapshot's resolution cache
 */
export function createPermissionLookup(entries: Iterable<EffectivePermissions>): PermissionLookup {
  const byArn = new Map<string, EffectivePermissions>();
  for (const permissions of entries) {
    byArn.set(permissions.principalArn, permissions);
  }
  return arn => byArn.get(arn);
}
