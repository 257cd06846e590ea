/**
 * Escalation to other IAM principals: take over their credentials, join
 * their group, or rewrite who may assume them.
 */

import { evaluateResourcePolicy } from '../../resolver/resource-policy.js';
import { isExplicitlyDenied } from '../../resolver/permission-resolver.js';
import { can, createLabel } from '../helpers.js';
import type { EscalationRule } from '../types.js';

export const assumeRoleRule: EscalationRule = {
  id: 'sts-assume-role',
  description: 'Assume a role whose trust policy admits the principal',
  kind: 'access',
  capabilities: ['sts:AssumeRole'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const { source, target } = ctx;
    const trustPolicy = target.principal.trustPolicy;
    if (!trustPolicy) return null;

    const decision = evaluateResourcePolicy(
      trustPolicy,
      { kind: 'principal', arn: source.principal.arn },
      'sts:AssumeRole',
      target.principal.arn,
      source.permissions.variables
    );

    if (decision === 'principal-match') {
      if (isExplicitlyDenied(source.permissions, 'sts:AssumeRole', target.principal.arn)) return null;
      return createLabel(assumeRoleRule, 'Assume the role', ['trust policy names the source']);
    }
    if (decision === 'account-match' && can(source, 'sts:AssumeRole', target.principal.arn)) {
      return createLabel(assumeRoleRule, 'Assume the role', ['trust policy delegates to the account']);
    }
    return null;
  },
};

export const updateAssumeRolePolicyRule: EscalationRule = {
  id: 'iam-update-assume-role-policy',
  description: "Rewrite a role's trust policy to admit the principal, then assume it",
  kind: 'escalation',
  capabilities: ['iam:UpdateAssumeRolePolicy', 'sts:AssumeRole'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const roleArn = ctx.target.principal.arn;
    if (!can(ctx.source, 'iam:UpdateAssumeRolePolicy', roleArn)) return null;
    if (!can(ctx.source, 'sts:AssumeRole', roleArn)) return null;
    return createLabel(updateAssumeRolePolicyRule, 'Rewrite the trust policy and assume the role');
  },
};

export const addUserToGroupRule: EscalationRule = {
  id: 'iam-add-user-to-group',
  description: 'Add oneself to a group and inherit its policies',
  kind: 'escalation',
  capabilities: ['iam:AddUserToGroup'],
  scope: 'cross',
  sourceTypes: ['user'],
  targetTypes: ['group'],
  evaluate(ctx) {
    const groupArn = ctx.target.principal.arn;
    if (ctx.source.principal.groupArns.includes(groupArn)) return null;
    if (!can(ctx.source, 'iam:AddUserToGroup', groupArn)) return null;
    return createLabel(addUserToGroupRule, 'Join the group');
  },
};

export const createAccessKeyRule: EscalationRule = {
  id: 'iam-create-access-key',
  description: 'Mint access keys for another user',
  kind: 'escalation',
  capabilities: ['iam:CreateAccessKey'],
  scope: 'cross',
  targetTypes: ['user'],
  evaluate(ctx) {
    if (!can(ctx.source, 'iam:CreateAccessKey', ctx.target.principal.arn)) return null;
    return createLabel(createAccessKeyRule, 'Create an access key for the user', [
      'the user has fewer than two access keys',
    ]);
  },
};

export const loginProfileRule: EscalationRule = {
  id: 'iam-login-profile',
  description: "Create or reset another user's console password",
  kind: 'escalation',
  capabilities: ['iam:CreateLoginProfile', 'iam:UpdateLoginProfile'],
  scope: 'cross',
  targetTypes: ['user'],
  evaluate(ctx) {
    const userArn = ctx.target.principal.arn;
    if (can(ctx.source, 'iam:UpdateLoginProfile', userArn)) {
      return createLabel(loginProfileRule, 'Reset the console password', ['the user has a login profile']);
    }
    if (can(ctx.source, 'iam:CreateLoginProfile', userArn)) {
      return createLabel(loginProfileRule, 'Create a console password', ['the user has no login profile']);
    }
    return null;
  },
};

export const IAM_PRINCIPAL_RULES: readonly EscalationRule[] = [
  assumeRoleRule,
  updateAssumeRolePolicyRule,
  addUserToGroupRule,
  createAccessKeyRule,
  loginProfileRule,
];
