/**
 * Permission Resolver
 *
 * Computes a principal's effective permissions from its identity policies,
 * inherited group policies and permissions boundary, and answers
 * authorization checks against them.
 *
 * Evaluation order does not matter: an explicit Deny anywhere wins, an
 * Allow is required from the identity policies, and a boundary can only
 * take permissions away.
 */

import { evaluateConditions } from '../policy/conditions.js';
import { getAccountId } from '../policy/arn.js';
import { substituteVariables } from '../policy/variables.js';
import { matchesAny, segmentsMatch } from '../policy/wildcard.js';
import type { PolicyDocument, PolicyStatement, RequestContext } from '../policy/types.js';
import type { Principal } from '../ingestion/types.js';
import { computePolicyHash } from './policy-hash.js';
import type {
  EffectiveGrant,
  EffectivePermissions,
  GrantTuple,
  PatternSet,
  ResolvedPrincipal,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * A principal counts as an administrator when all of these are allowed on
 * every resource.
 */
export const ADMIN_CHECK_ACTIONS: readonly string[] = [
  'iam:PutRolePolicy',
  'iam:AttachUserPolicy',
  'iam:CreateAccessKey',
  'sts:AssumeRole',
  'ec2:RunInstances',
  's3:GetObject',
  'lambda:CreateFunction',
  'kms:Decrypt',
  'organizations:ListAccounts',
];

// ============================================================================
// Grant construction
// ============================================================================

function statementToGrant(statement: PolicyStatement, origin: string): EffectiveGrant {
  const actions: PatternSet = statement.notAction
    ? { patterns: [...statement.notAction], negated: true }
    : { patterns: [...(statement.action ?? [])], negated: false };
  const resources: PatternSet = statement.notResource
    ? { patterns: [...statement.notResource], negated: true }
    : { patterns: [...(statement.resource ?? ['*'])], negated: false };

  return {
    allowed: statement.effect === 'Allow',
    actions,
    resources,
    conditions: statement.condition,
    origin,
  };
}

function documentToGrants(document: PolicyDocument, policyName: string): EffectiveGrant[] {
  return document.statements.map((statement, index) => {
    const label = statement.sid ? `${policyName}#${statement.sid}` : `${policyName}#${index}`;
    return statementToGrant(statement, label);
  });
}

function identityGrants(principal: Principal): EffectiveGrant[] {
  const grants: EffectiveGrant[] = [];
  for (const policy of principal.inlinePolicies) {
    grants.push(...documentToGrants(policy.document, `${principal.arn}/inline/${policy.name}`));
  }
  for (const policy of principal.attachedPolicies) {
    grants.push(...documentToGrants(policy.document, policy.arn));
  }
  return grants;
}

/**
 * Policy variables describing the principal
 */
export function principalVariables(principal: Principal): Record<string, string> {
  const variables: Record<string, string> = {
    'aws:PrincipalArn': principal.arn,
    'aws:PrincipalAccount': getAccountId(principal.arn),
    'aws:PrincipalType': principal.type === 'role' ? 'AssumedRole' : 'User',
  };
  if (principal.type === 'user') {
    variables['aws:username'] = principal.name;
  }
  if (principal.id) {
    variables['aws:userid'] = principal.id;
  }
  return variables;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve the effective permissions of a principal.
 *
 * @param groups The groups the principal belongs to (users only); their
 *   policies are inherited
 */
export function resolvePermissions(
  principal: Principal,
  groups: readonly Principal[] = []
): EffectivePermissions {
  const grants = identityGrants(principal);
  for (const group of groups) {
    grants.push(...identityGrants(group));
  }

  const boundary = principal.permissionsBoundary
    ? documentToGrants(principal.permissionsBoundary.document, principal.permissionsBoundary.arn)
    : null;

  return {
    principalArn: principal.arn,
    policyHash: computePolicyHash(principal, groups),
    grants,
    boundary,
    session: null,
    variables: principalVariables(principal),
  };
}

/**
 * Scope resolved permissions down by a session policy, as happens when a
 * role is assumed with an inline session policy. Never expands.
 */
export function applySessionPolicy(
  permissions: EffectivePermissions,
  sessionPolicy: PolicyDocument,
  sessionName = 'session'
): EffectivePermissions {
  const grants = documentToGrants(sessionPolicy, `${permissions.principalArn}/session/${sessionName}`);
  return {
    ...permissions,
    session: permissions.session ? [...permissions.session, ...grants] : grants,
  };
}

/**
 * Permissions after the principal writes itself an allow-everything policy.
 * The boundary and any session policy still cap the result unless
 * `liftBoundary` is set; existing Deny statements stay in force.
 */
export function withSelfGrantedAccess(
  permissions: EffectivePermissions,
  options: { liftBoundary: boolean }
): EffectivePermissions {
  const grant: EffectiveGrant = {
    allowed: true,
    actions: { patterns: ['*'], negated: false },
    resources: { patterns: ['*'], negated: false },
    conditions: {},
    origin: `${permissions.principalArn}/self-granted`,
  };
  return {
    ...permissions,
    grants: [...permissions.grants, grant],
    boundary: options.liftBoundary ? null : permissions.boundary,
  };
}

// ============================================================================
// Evaluation
// ============================================================================

function actionMatches(set: PatternSet, action: string): boolean {
  const hit = matchesAny(set.patterns, action);
  return set.negated ? !hit : hit;
}

function resourceMatches(set: PatternSet, resource: string, context: RequestContext): boolean {
  const hit = set.patterns.some(pattern => {
    const segments = substituteVariables(pattern, context);
    return segments !== null && segmentsMatch(segments, resource);
  });
  return set.negated ? !hit : hit;
}

function grantApplies(
  grant: EffectiveGrant,
  action: string,
  resource: string,
  context: RequestContext
): boolean {
  return (
    actionMatches(grant.actions, action) &&
    resourceMatches(grant.resources, resource, context) &&
    evaluateConditions(grant.conditions, context)
  );
}

function decide(
  grants: readonly EffectiveGrant[],
  action: string,
  resource: string,
  context: RequestContext
): 'deny' | 'allow' | 'implicit-deny' {
  let allowed = false;
  for (const grant of grants) {
    if (!grantApplies(grant, action, resource, context)) continue;
    if (!grant.allowed) return 'deny';
    allowed = true;
  }
  return allowed ? 'allow' : 'implicit-deny';
}

function buildContext(permissions: EffectivePermissions, context: RequestContext): RequestContext {
  return { ...permissions.variables, ...context };
}

/**
 * Whether the principal may perform the action on the resource
 */
export function isAuthorized(
  permissions: EffectivePermissions,
  action: string,
  resource: string,
  context: RequestContext = {}
): boolean {
  const fullContext = buildContext(permissions, context);

  if (decide(permissions.grants, action, resource, fullContext) !== 'allow') {
    return false;
  }
  if (permissions.boundary !== null && decide(permissions.boundary, action, resource, fullContext) !== 'allow') {
    return false;
  }
  if (permissions.session !== null && decide(permissions.session, action, resource, fullContext) !== 'allow') {
    return false;
  }
  return true;
}

/**
 * Whether an explicit Deny (identity or boundary) applies, regardless of
 * any Allow
 */
export function isExplicitlyDenied(
  permissions: EffectivePermissions,
  action: string,
  resource: string,
  context: RequestContext = {}
): boolean {
  const fullContext = buildContext(permissions, context);
  return [permissions.grants, permissions.boundary, permissions.session].some(
    grants => grants !== null && decide(grants, action, resource, fullContext) === 'deny'
  );
}

/**
 * Administrator: every admin check action allowed on every resource
 */
export function isAdministrator(permissions: EffectivePermissions): boolean {
  return ADMIN_CHECK_ACTIONS.every(action => isAuthorized(permissions, action, '*'));
}

/**
 * Flatten grants into (action, resource, allowed) tuples
 */
export function listGrants(permissions: EffectivePermissions): GrantTuple[] {
  const flatten = (grants: readonly EffectiveGrant[], fromBoundary: boolean, fromSession: boolean): GrantTuple[] =>
    grants.flatMap(grant =>
      grant.actions.patterns.flatMap(action =>
        grant.resources.patterns.map(resource => ({
          action,
          resource,
          allowed: grant.allowed,
          notAction: grant.actions.negated,
          notResource: grant.resources.negated,
          conditional: Object.keys(grant.conditions).length > 0,
          fromBoundary,
          fromSession,
          origin: grant.origin,
        }))
      )
    );

  return [
    ...flatten(permissions.grants, false, false),
    ...flatten(permissions.boundary ?? [], true, false),
    ...flatten(permissions.session ?? [], false, true),
  ];
}

/**
 * Resolve a principal and tag whether it is an administrator
 */
export function toResolvedPrincipal(principal: Principal, permissions: EffectivePermissions): ResolvedPrincipal {
  return {
    principal,
    permissions,
    isAdmin: isAdministrator(permissions),
  };
}
