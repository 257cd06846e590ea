/**
 * Shared predicates for rule implementations
 */

import type { EdgeLabel } from '../graph/types.js';
import type { RequestContext } from '../policy/types.js';
import { isAuthorized } from '../resolver/permission-resolver.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import type { AccountView, EscalationRule } from './types.js';

export function can(
  principal: ResolvedPrincipal,
  action: string,
  resource: string,
  context: RequestContext = {}
): boolean {
  return isAuthorized(principal.permissions, action, resource, context);
}

/**
 * iam:PassRole on the role, handed to the given service
 */
export function canPassRole(source: ResolvedPrincipal, role: ResolvedPrincipal, service: string): boolean {
  return can(source, 'iam:PassRole', role.principal.arn, { 'iam:PassedToService': service });
}

/**
 * ARN pattern covering every resource of a kind in the account
 */
export function accountResource(account: AccountView, service: string, resource: string, region = '*'): string {
  const regionPart = service === 'iam' ? '' : region;
  return `arn:${account.partition}:${service}:${regionPart}:${account.accountId}:${resource}`;
}

export function createLabel(
  rule: Pick<EscalationRule, 'id' | 'kind'>,
  technique: string,
  preconditions: string[] = [],
  selfEscalation = false
): EdgeLabel {
  return { ruleId: rule.id, kind: rule.kind, technique, preconditions, selfEscalation };
}
