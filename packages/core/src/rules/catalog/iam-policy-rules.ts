/**
 * Self-escalation through the principal's own policies
 *
 * Each rule fires when a principal can rewrite, replace or add to the
 * policies that apply to it, which lets it grant itself anything its
 * permissions boundary allows.
 */

import type { PrincipalType } from '../../ingestion/types.js';
import type { ManagedPolicyRecord } from '../../policy/types.js';
import { accountResource, can, createLabel } from '../helpers.js';
import type { EscalationRule, RuleContext } from '../types.js';
import type { ResolvedPrincipal } from '../../resolver/types.js';

const BOUNDARY_NOTE = 'permissions boundary still applies';

function withBoundaryNote(source: ResolvedPrincipal, preconditions: string[]): string[] {
  return source.principal.permissionsBoundary ? [...preconditions, BOUNDARY_NOTE] : preconditions;
}

/**
 * Customer managed policies attached to the principal or its groups
 */
function attachedCustomerPolicies(ctx: RuleContext): ManagedPolicyRecord[] {
  const seen = new Map<string, ManagedPolicyRecord>();
  const owners = [ctx.source, ...ctx.account.groupsOf(ctx.source)];
  for (const owner of owners) {
    for (const policy of owner.principal.attachedPolicies) {
      if (policy.customerManaged) seen.set(policy.arn, policy);
    }
  }
  return [...seen.values()];
}

const PUT_ACTION: Record<PrincipalType, string> = {
  user: 'iam:PutUserPolicy',
  role: 'iam:PutRolePolicy',
  group: 'iam:PutGroupPolicy',
};

const ATTACH_ACTION: Record<PrincipalType, string> = {
  user: 'iam:AttachUserPolicy',
  role: 'iam:AttachRolePolicy',
  group: 'iam:AttachGroupPolicy',
};

/**
 * The first of (self, own groups) the source may apply the per-type action to
 */
function firstWritableOwner(ctx: RuleContext, actions: Record<PrincipalType, string>): ResolvedPrincipal | undefined {
  const owners = [ctx.source, ...ctx.account.groupsOf(ctx.source)];
  return owners.find(owner => can(ctx.source, actions[owner.principal.type], owner.principal.arn));
}

export const createPolicyVersionRule: EscalationRule = {
  id: 'iam-create-policy-version',
  description: 'Create a new default version of a customer managed policy that applies to the principal',
  kind: 'escalation',
  capabilities: ['iam:CreatePolicyVersion'],
  scope: 'self',
  evaluate(ctx) {
    const action = 'iam:CreatePolicyVersion';
    const policy = attachedCustomerPolicies(ctx).find(candidate => can(ctx.source, action, candidate.arn));
    if (policy) {
      return createLabel(
        createPolicyVersionRule,
        'Create a new default version of an attached policy',
        withBoundaryNote(ctx.source, [`policy ${policy.arn}`]),
        true
      );
    }

    if (can(ctx.source, action, accountResource(ctx.account, 'iam', 'policy/*'))) {
      return createLabel(
        createPolicyVersionRule,
        'Create a new default version of any customer managed policy',
        withBoundaryNote(ctx.source, ['any customer managed policy in the account']),
        true
      );
    }
    return null;
  },
};

export const setDefaultPolicyVersionRule: EscalationRule = {
  id: 'iam-set-default-policy-version',
  description: 'Switch an attached customer managed policy to a different existing version',
  kind: 'escalation',
  capabilities: ['iam:SetDefaultPolicyVersion'],
  scope: 'self',
  evaluate(ctx) {
    const policy = attachedCustomerPolicies(ctx).find(
      candidate => candidate.versionCount > 1 && can(ctx.source, 'iam:SetDefaultPolicyVersion', candidate.arn)
    );
    if (!policy) return null;
    return createLabel(
      setDefaultPolicyVersionRule,
      'Set a non-default version of an attached policy as default',
      withBoundaryNote(ctx.source, [`policy ${policy.arn}`, 'a non-default version grants more']),
      true
    );
  },
};

export const putInlinePolicyRule: EscalationRule = {
  id: 'iam-put-inline-policy',
  description: 'Write an inline policy on the principal or one of its groups',
  kind: 'escalation',
  capabilities: ['iam:PutUserPolicy', 'iam:PutRolePolicy', 'iam:PutGroupPolicy'],
  scope: 'self',
  evaluate(ctx) {
    const owner = firstWritableOwner(ctx, PUT_ACTION);
    if (!owner) return null;
    return createLabel(
      putInlinePolicyRule,
      `Add an inline policy with ${PUT_ACTION[owner.principal.type]}`,
      withBoundaryNote(ctx.source, [`on ${owner.principal.arn}`]),
      true
    );
  },
};

export const attachManagedPolicyRule: EscalationRule = {
  id: 'iam-attach-managed-policy',
  description: 'Attach a managed policy (e.g. AdministratorAccess) to the principal or one of its groups',
  kind: 'escalation',
  capabilities: ['iam:AttachUserPolicy', 'iam:AttachRolePolicy', 'iam:AttachGroupPolicy'],
  scope: 'self',
  evaluate(ctx) {
    const owner = firstWritableOwner(ctx, ATTACH_ACTION);
    if (!owner) return null;
    return createLabel(
      attachManagedPolicyRule,
      `Attach a managed policy with ${ATTACH_ACTION[owner.principal.type]}`,
      withBoundaryNote(ctx.source, [`on ${owner.principal.arn}`]),
      true
    );
  },
};

export const removePermissionsBoundaryRule: EscalationRule = {
  id: 'iam-remove-permissions-boundary',
  description: 'Delete or replace the permissions boundary restricting the principal',
  kind: 'escalation',
  capabilities: [
    'iam:DeleteUserPermissionsBoundary',
    'iam:PutUserPermissionsBoundary',
    'iam:DeleteRolePermissionsBoundary',
    'iam:PutRolePermissionsBoundary',
  ],
  scope: 'self',
  sourceTypes: ['user', 'role'],
  evaluate(ctx) {
    const { principal } = ctx.source;
    if (!principal.permissionsBoundary) return null;

    const kind = principal.type === 'user' ? 'User' : 'Role';
    const action = [`iam:Delete${kind}PermissionsBoundary`, `iam:Put${kind}PermissionsBoundary`].find(candidate =>
      can(ctx.source, candidate, principal.arn)
    );
    if (!action) return null;

    return createLabel(
      removePermissionsBoundaryRule,
      `Lift the permissions boundary with ${action}`,
      [`boundary ${principal.permissionsBoundary.arn}`],
      true
    );
  },
};

export const IAM_POLICY_RULES: readonly EscalationRule[] = [
  createPolicyVersionRule,
  setDefaultPolicyVersionRule,
  putInlinePolicyRule,
  attachManagedPolicyRule,
  removePermissionsBoundaryRule,
];
