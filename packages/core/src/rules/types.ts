/**
 * Escalation Rule Types
 */

import type { EdgeKind, EdgeLabel } from '../graph/types.js';
import type { InstanceProfileRecord, LambdaFunctionRecord, PrincipalType } from '../ingestion/types.js';
import type { ResolvedPrincipal } from '../resolver/types.js';

/**
 * self: the rule only relates a principal to itself.
 * cross: the rule relates a principal to another principal.
 */
export type RuleScope = 'self' | 'cross';

/**
 * Read-only view of the account a rule can consult
 */
export interface AccountView {
  accountId: string;
  partition: string;
  getPrincipal(arn: string): ResolvedPrincipal | undefined;
  /** Groups the principal belongs to (empty for roles and groups) */
  groupsOf(principal: ResolvedPrincipal): ResolvedPrincipal[];
  /** Functions whose execution role is the given role */
  functionsFor(roleArn: string): readonly LambdaFunctionRecord[];
  functions: readonly LambdaFunctionRecord[];
  instanceProfiles: readonly InstanceProfileRecord[];
}

export interface RuleContext {
  source: ResolvedPrincipal;
  target: ResolvedPrincipal;
  account: AccountView;
}

/**
 * A pure predicate over a (source, target) pair. Returns the edge label
 * when the source can reach the target through the technique.
 */
export interface EscalationRule {
  /** Stable identifier, used as the edge's ruleId */
  id: string;
  description: string;
  kind: EdgeKind;
  /** Provider actions the technique relies on */
  capabilities: readonly string[];
  scope: RuleScope;
  /** Principal types the rule can start from; all when unset */
  sourceTypes?: readonly PrincipalType[] | undefined;
  /** Principal types the rule can land on; all when unset */
  targetTypes?: readonly PrincipalType[] | undefined;
  evaluate(ctx: RuleContext): EdgeLabel | null;
}
