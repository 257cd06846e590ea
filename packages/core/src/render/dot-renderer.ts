/**
 * DOT / JSON export of a principal graph
 *
 * Output depends only on the graph: nodes and edges are written in the
 * graph's sorted order.
 */

import type { PrincipalGraph } from '../graph/principal-graph.js';
import type { GraphData, GraphEdge, GraphNode } from '../graph/types.js';

export interface DotRenderOptions {
  /** Include role-assumption edges (default true) */
  includeAccessEdges?: boolean | undefined;
  /** Graph name in the header */
  name?: string | undefined;
}

const NODE_SHAPES: Record<GraphNode['type'], string> = {
  user: 'ellipse',
  role: 'box',
  group: 'folder',
};

/**
 * Quote a DOT identifier or label
 */
export function quoteDot(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

function renderNode(node: GraphNode): string {
  const attributes = [`label=${quoteDot(node.searchableName)}`, `shape=${NODE_SHAPES[node.type]}`];
  if (node.isAdmin) {
    attributes.push('style=filled', 'fillcolor="#f4cccc"', 'color="#cc0000"');
  }
  if (node.hasBoundary) {
    attributes.push('peripheries=2');
  }
  return `  ${quoteDot(node.arn)} [${attributes.join(', ')}];`;
}

function renderEdge(edge: GraphEdge): string {
  const attributes =
    edge.label.kind === 'access'
      ? ['style=dashed', `tooltip=${quoteDot(edge.label.technique)}`]
      : [`label=${quoteDot(edge.label.ruleId)}`, 'color="#cc0000"', `tooltip=${quoteDot(edge.label.technique)}`];
  return `  ${quoteDot(edge.source)} -> ${quoteDot(edge.target)} [${attributes.join(', ')}];`;
}

/**
 * Graphviz DOT text for the graph. Admin principals are filled red,
 * escalation edges are labelled with their rule id.
 */
export function renderDot(graph: PrincipalGraph, options: DotRenderOptions = {}): string {
  const includeAccess = options.includeAccessEdges ?? true;
  const lines: string[] = [];

  lines.push(`digraph ${quoteDot(options.name ?? 'iamgraph')} {`);
  lines.push('  rankdir=LR;');
  lines.push('  node [fontname="Helvetica"];');
  lines.push('  edge [fontname="Helvetica", fontsize=10];');

  for (const node of graph.nodes()) {
    lines.push(renderNode(node));
  }
  for (const edge of graph.edges()) {
    if (!includeAccess && edge.label.kind === 'access') continue;
    lines.push(renderEdge(edge));
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}

/**
 * Node and edge arrays of the graph, as stored in a snapshot
 */
export function renderJson(graph: PrincipalGraph, options: DotRenderOptions = {}): string {
  const includeAccess = options.includeAccessEdges ?? true;
  const data: Omit<GraphData, 'warnings'> = {
    nodes: [...graph.nodes()],
    edges: graph.edges().filter(edge => includeAccess || edge.label.kind !== 'access'),
  };
  return `${JSON.stringify(data, null, 2)}\n`;
}
