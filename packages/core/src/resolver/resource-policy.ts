/**
 * Resource Policy Evaluation
 *
 * Decides whether a resource policy (a role trust policy in practice) admits
 * a caller, and how: by naming the principal, by naming a service, or by
 * delegating to the caller's account.
 */

import { evaluateConditions } from '../policy/conditions.js';
import { getAccountId } from '../policy/arn.js';
import { matchesAny, wildcardMatch } from '../policy/wildcard.js';
import type { PolicyDocument, PolicyPrincipal, PolicyStatement, RequestContext } from '../policy/types.js';
import type { ResourcePolicyDecision } from './types.js';

/**
 * Who is making the request
 */
export type ResourcePolicyCaller =
  | { kind: 'principal'; arn: string }
  | { kind: 'service'; service: string };

type PrincipalMatch = 'principal' | 'account' | 'service' | null;

function matchPrincipalElement(element: PolicyPrincipal, caller: ResourcePolicyCaller): PrincipalMatch {
  if (caller.kind === 'service') {
    return matchesAny(element.service, caller.service) ? 'service' : null;
  }

  if (element.wildcard) return 'principal';

  const accountId = getAccountId(caller.arn);
  for (const entry of element.aws) {
    if (entry === '*' || wildcardMatch(entry, caller.arn)) return 'principal';
  }
  for (const entry of element.aws) {
    if (entry === accountId || entry.endsWith(`:iam::${accountId}:root`)) return 'account';
  }
  return null;
}

function statementMatch(
  statement: PolicyStatement,
  caller: ResourcePolicyCaller,
  action: string,
  resource: string,
  context: RequestContext
): PrincipalMatch {
  const actionHit = statement.notAction
    ? !matchesAny(statement.notAction, action)
    : matchesAny(statement.action ?? [], action);
  if (!actionHit) return null;

  if (statement.resource && !matchesAny(statement.resource, resource)) return null;
  if (statement.notResource && matchesAny(statement.notResource, resource)) return null;

  let match: PrincipalMatch;
  if (statement.principal) {
    match = matchPrincipalElement(statement.principal, caller);
  } else if (statement.notPrincipal) {
    match = matchPrincipalElement(statement.notPrincipal, caller) === null
      ? caller.kind === 'service' ? 'service' : 'principal'
      : null;
  } else {
    match = null;
  }
  if (match === null) return null;

  return evaluateConditions(statement.condition, context) ? match : null;
}

/**
 * Evaluate a resource policy for one caller, action and resource
 */
export function evaluateResourcePolicy(
  policy: PolicyDocument,
  caller: ResourcePolicyCaller,
  action: string,
  resource: string,
  context: RequestContext = {}
): ResourcePolicyDecision {
  let best: ResourcePolicyDecision = 'no-match';

  const rank: Record<ResourcePolicyDecision, number> = {
    'no-match': 0,
    'account-match': 1,
    'service-match': 2,
    'principal-match': 3,
    'explicit-deny': 4,
  };

  for (const statement of policy.statements) {
    const match = statementMatch(statement, caller, action, resource, context);
    if (match === null) continue;

    if (statement.effect === 'Deny') {
      return 'explicit-deny';
    }

    const decision: ResourcePolicyDecision =
      match === 'principal' ? 'principal-match' : match === 'service' ? 'service-match' : 'account-match';
    if (rank[decision] > rank[best]) {
      best = decision;
    }
  }

  return best;
}

/**
 * Shorthand: does the trust policy let the service assume the role?
 */
export function trustsService(trustPolicy: PolicyDocument | undefined, roleArn: string, service: string): boolean {
  if (!trustPolicy) return false;
  return (
    evaluateResourcePolicy(trustPolicy, { kind: 'service', service }, 'sts:AssumeRole', roleArn) === 'service-match'
  );
}
