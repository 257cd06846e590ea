import { describe, it, expect } from 'vitest';
import { arnOf } from '../__fixtures__/principals.js';
import { PrincipalGraph } from '../graph/principal-graph.js';
import type { GraphEdge, GraphNode } from '../graph/types.js';
import { quoteDot, renderDot, renderJson } from './dot-renderer.js';

const admin: GraphNode = {
  arn: arnOf('role', 'Admin'),
  type: 'role',
  name: 'Admin',
  searchableName: 'role/Admin',
  isAdmin: true,
  hasBoundary: false,
};

const bob: GraphNode = {
  arn: arnOf('user', 'bob'),
  type: 'user',
  name: 'bob',
  searchableName: 'user/bob',
  isAdmin: false,
  hasBoundary: true,
};

const assume: GraphEdge = {
  source: bob.arn,
  target: admin.arn,
  label: { ruleId: 'sts-assume-role', kind: 'access', technique: 'Assume the role', preconditions: [], selfEscalation: false },
};

const selfEscalation: GraphEdge = {
  source: bob.arn,
  target: bob.arn,
  label: {
    ruleId: 'iam-put-inline-policy',
    kind: 'escalation',
    technique: 'Add an inline policy with iam:PutUserPolicy',
    preconditions: [],
    selfEscalation: true,
  },
};

const graph = new PrincipalGraph({ nodes: [bob, admin], edges: [selfEscalation, assume], warnings: [] });

describe('quoteDot', () => {
  it('escapes quotes, backslashes and newlines', () => {
    expect(quoteDot('a "b" \\ c\nd')).toBe('"a \\"b\\" \\\\ c\\nd"');
  });
});

describe('renderDot', () => {
  it('writes nodes and edges in graph order', () => {
    expect(renderDot(graph).split('\n')).toEqual([
      'digraph "iamgraph" {',
      '  rankdir=LR;',
      '  node [fontname="Helvetica"];',
      '  edge [fontname="Helvetica", fontsize=10];',
      `  "${admin.arn}" [label="role/Admin", shape=box, style=filled, fillcolor="#f4cccc", color="#cc0000"];`,
      `  "${bob.arn}" [label="user/bob", shape=ellipse, peripheries=2];`,
      `  "${bob.arn}" -> "${admin.arn}" [style=dashed, tooltip="Assume the role"];`,
      `  "${bob.arn}" -> "${bob.arn}" [label="iam-put-inline-policy", color="#cc0000", tooltip="Add an inline policy with iam:PutUserPolicy"];`,
      '}',
      '',
    ]);
  });

  it('can leave out access edges', () => {
    const dot = renderDot(graph, { includeAccessEdges: false, name: 'escalations' });
    expect(dot.startsWith('digraph "escalations" {\n')).toBe(true);
    expect(dot).not.toContain('style=dashed');
    expect(dot).toContain('label="iam-put-inline-policy"');
  });
});

describe('renderJson', () => {
  it('writes nodes and edges', () => {
    const parsed: unknown = JSON.parse(renderJson(graph, { includeAccessEdges: false }));
    expect(parsed).toEqual({ nodes: [admin, bob], edges: [selfEscalation] });
  });
});
