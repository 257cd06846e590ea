import fc from 'fast-check';
import { beforeAll, describe, it, expect } from 'vitest';
import {
  allow,
  arnOf,
  fixtureSource,
  managedPolicy,
  policy,
  resolve,
  viewOf,
  withInline,
} from '../__fixtures__/principals.js';
import { OperationAbortedError, QuerySyntaxError } from '../errors/errors.js';
import { GraphBuilder } from '../graph/graph-builder.js';
import type { PrincipalGraph } from '../graph/principal-graph.js';
import { silentLogger } from '../logging/logger.js';
import { createGraph, resolvePrincipals } from '../pipeline/create-graph.js';
import { ResolutionCache } from '../resolver/resolution-cache.js';
import type { Principal } from '../ingestion/types.js';
import { createDefaultRuleRegistry } from '../rules/registry.js';
import { RuleEngine } from '../rules/rule-engine.js';
import type { QueryPath } from './path-finder.js';
import { createPermissionLookup, QueryEngine, serializeQueryResult, type PermissionLookup } from './query-engine.js';

const DEV = arnOf('group', 'developers');
const ROLE_A = arnOf('role', 'A');
const ADMIN = arnOf('role', 'Admin');
const ALICE = arnOf('user', 'alice');
const BOB = arnOf('user', 'bob');

let graph: PrincipalGraph;
let lookup: PermissionLookup;
let engine: QueryEngine;

function hops(path: QueryPath): string[] {
  return path.edges.map(edge => `${edge.source} -> ${edge.target}`);
}

beforeAll(async () => {
  ({ graph } = await createGraph({ profile: 'test', source: await fixtureSource() }));
  const { account } = await (await fixtureSource()).ingest({ logger: silentLogger });
  const resolved = resolvePrincipals(account.principals, new ResolutionCache());
  lookup = createPermissionLookup(resolved.map(entry => entry.permissions));
  engine = new QueryEngine(graph, lookup);
});

describe('QueryEngine', () => {
  it('finds privilege escalation paths, self-escalation included', () => {
    const result = engine.execute('preset privesc *');

    expect(result.kind).toBe('preset privesc');
    expect(result.truncated).toBe(false);
    expect(result.paths.map(path => [path.source, hops(path)])).toEqual([
      [DEV, [`${DEV} -> ${ROLE_A}`, `${ROLE_A} -> ${ROLE_A}`]],
      [ROLE_A, [`${ROLE_A} -> ${ROLE_A}`]],
      [ALICE, [`${ALICE} -> ${ALICE}`]],
      [BOB, [`${BOB} -> ${ROLE_A}`, `${ROLE_A} -> ${ROLE_A}`]],
    ]);
  });

  it('lists administrators as zero-edge paths', () => {
    expect(engine.execute('preset admin').paths).toEqual([{ source: ADMIN, target: ADMIN, edges: [] }]);
  });

  it('answers can ... do through other principals', () => {
    const result = engine.execute('can user/bob do iam:CreatePolicyVersion');
    expect(result.paths.map(hops)).toEqual([[`${BOB} -> ${ROLE_A}`]]);
    expect(result.paths[0]?.target).toBe(ROLE_A);
  });

  it('answers who can do, direct holders first in node order', () => {
    const result = engine.execute('who can do iam:CreatePolicyVersion');
    expect(result.paths.map(path => [path.source, path.target, path.edges.length])).toEqual([
      [DEV, ROLE_A, 1],
      [ROLE_A, ROLE_A, 0],
      [ADMIN, ADMIN, 0],
      [ALICE, ALICE, 0],
      [BOB, ROLE_A, 1],
    ]);
  });

  it('answers can ... reach', () => {
    expect(engine.execute('can user/bob reach role/A').paths.map(hops)).toEqual([[`${BOB} -> ${ROLE_A}`]]);
    expect(engine.execute('can user/alice reach role/Admin').paths).toEqual([]);
    expect(engine.execute('can role/A reach role/*').paths).toEqual([{ source: ROLE_A, target: ROLE_A, edges: [] }]);
  });

  it('stops a connected path at the first principal it reaches', () => {
    expect(engine.execute('preset connected user/bob *').paths.map(hops)).toEqual([[`${BOB} -> ${ROLE_A}`]]);
  });

  it('bounds paths by depth, the query depth winning', () => {
    const shallow = engine.execute('preset privesc * depth 1');
    expect(shallow.paths.map(path => path.source)).toEqual([ROLE_A, ALICE]);

    expect(engine.execute('preset privesc *', { maxDepth: 1 }).paths).toHaveLength(2);
    expect(engine.execute('preset privesc * depth 2', { maxDepth: 1 }).paths).toHaveLength(4);
  });

  it('truncates at maxPaths', () => {
    const result = engine.execute('preset privesc *', { maxPaths: 2 });
    expect(result.paths.map(path => path.source)).toEqual([DEV, ROLE_A]);
    expect(result.truncated).toBe(true);
  });

  it('is deterministic', () => {
    const again = new QueryEngine(graph);
    expect(serializeQueryResult(again.execute('preset privesc *'))).toBe(
      serializeQueryResult(engine.execute('preset privesc *'))
    );
  });

  it('serialises any query identically across runs and engines', () => {
    const queries = fc.constantFrom(
      'preset privesc *',
      'preset admin',
      'preset connected user/bob *',
      'can user/bob reach role/A',
      'can user/bob do iam:CreatePolicyVersion',
      'who can do s3:GetObject'
    );

    fc.assert(
      fc.property(
        queries,
        fc.integer({ min: 1, max: 4 }),
        fc.option(fc.integer({ min: 1, max: 5 }), { nil: undefined }),
        (query, maxDepth, maxPaths) => {
          const options = { maxDepth, maxPaths };
          const first = serializeQueryResult(engine.execute(query, options));

          expect(serializeQueryResult(engine.execute(query, options))).toBe(first);
          expect(serializeQueryResult(new QueryEngine(graph, lookup).execute(query, options))).toBe(first);
        }
      )
    );
  });

  it('counts self-escalation as reaching any action', () => {
    const withoutPermissions = new QueryEngine(graph).execute('who can do s3:GetObject');
    expect(withoutPermissions.paths.map(path => [path.source, path.edges.at(-1)?.label.ruleId])).toEqual([
      [DEV, 'iam-create-policy-version'],
      [ROLE_A, 'iam-create-policy-version'],
      [ALICE, 'iam-create-policy-version'],
      [BOB, 'iam-create-policy-version'],
    ]);
  });

  it('raises syntax errors and aborts', () => {
    expect(() => engine.execute('preset')).toThrow(QuerySyntaxError);

    const controller = new AbortController();
    controller.abort();
    expect(() => engine.execute('preset privesc *', { signal: controller.signal })).toThrow(OperationAbortedError);
  });
});

describe('QueryEngine with permissions boundaries', () => {
  const ROLE_B = arnOf('role', 'B');
  const ROLE_C = arnOf('role', 'C');
  const ROLE_D = arnOf('role', 'D');

  let bounded: PrincipalGraph;
  let boundedEngine: QueryEngine;

  const boundary = (actions: string[]): Partial<Principal> => ({
    permissionsBoundary: managedPolicy('Boundary', policy([allow(actions)])),
  });

  beforeAll(async () => {
    const principals = [
      // may rewrite its own policy, but the boundary allows nothing else
      resolve(withInline('role', 'B', [allow('*')], boundary(['iam:PutRolePolicy']))),
      resolve(withInline('role', 'C', [allow('*')], boundary(['iam:PutRolePolicy', 'iam:DeleteRolePermissionsBoundary']))),
      resolve(withInline('role', 'D', [allow('iam:PutRolePolicy')], boundary(['iam:PutRolePolicy', 's3:*']))),
    ];
    const { edges } = await new RuleEngine(createDefaultRuleRegistry()).evaluate(principals, viewOf(principals));
    const builder = new GraphBuilder().addPrincipals(principals);
    builder.addEdges(edges);
    bounded = builder.build();
    boundedEngine = new QueryEngine(bounded, createPermissionLookup(principals.map(entry => entry.permissions)));
  });

  it('keeps a self-granted policy inside the boundary', () => {
    expect(bounded.outgoing(ROLE_B).map(edge => edge.label.ruleId)).toEqual(['iam-put-inline-policy']);
    expect(boundedEngine.execute('can role/B do s3:GetObject').paths).toEqual([]);
  });

  it('reaches actions the boundary leaves room for', () => {
    const result = boundedEngine.execute('can role/D do s3:GetObject');
    expect(result.paths.map(path => path.edges.map(edge => edge.label.ruleId))).toEqual([['iam-put-inline-policy']]);
    expect(boundedEngine.execute('can role/D do ec2:RunInstances').paths).toEqual([]);
  });

  it('reports only bounded principals that can lift their boundary as escalating', () => {
    const result = boundedEngine.execute('preset privesc *');

    expect(result.paths.map(path => path.source)).toEqual([ROLE_C, ROLE_C]);
    expect(result.paths.flatMap(path => path.edges.map(edge => edge.label.ruleId)).sort()).toEqual([
      'iam-put-inline-policy',
      'iam-remove-permissions-boundary',
    ]);
  });

  it('falls back to the boundary flag for unresolved principals', () => {
    const result = new QueryEngine(bounded).execute('preset privesc *');
    expect(result.paths.map(path => path.source)).toEqual([ROLE_C, ROLE_C]);
  });
});
