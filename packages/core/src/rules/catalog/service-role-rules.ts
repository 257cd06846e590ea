/**
 * Escalation through services that run code as a role: pass the role to
 * the service (or hijack something already running as it) and act with
 * its credentials.
 */

import { trustsService } from '../../resolver/resource-policy.js';
import type { ResolvedPrincipal } from '../../resolver/types.js';
import { accountResource, can, canPassRole, createLabel } from '../helpers.js';
import type { EscalationRule } from '../types.js';

const LAMBDA = 'lambda.amazonaws.com';
const EC2 = 'ec2.amazonaws.com';
const CLOUDFORMATION = 'cloudformation.amazonaws.com';

function roleTrusts(role: ResolvedPrincipal, service: string): boolean {
  return trustsService(role.principal.trustPolicy, role.principal.arn, service);
}

export const lambdaCreateFunctionRule: EscalationRule = {
  id: 'lambda-create-function',
  description: 'Create a Lambda function running as the role and invoke it',
  kind: 'escalation',
  capabilities: ['iam:PassRole', 'lambda:CreateFunction'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const { source, target, account } = ctx;
    if (!roleTrusts(target, LAMBDA)) return null;
    if (!canPassRole(source, target, LAMBDA)) return null;
    if (!can(source, 'lambda:CreateFunction', accountResource(account, 'lambda', 'function:*'))) return null;
    return createLabel(lambdaCreateFunctionRule, 'Create a Lambda function with the role', [
      'the function can be invoked or triggered',
    ]);
  },
};

export const lambdaUpdateFunctionCodeRule: EscalationRule = {
  id: 'lambda-update-function-code',
  description: 'Replace the code of a Lambda function that already runs as the role',
  kind: 'escalation',
  capabilities: ['lambda:UpdateFunctionCode'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const fn = ctx.account
      .functionsFor(ctx.target.principal.arn)
      .find(candidate => can(ctx.source, 'lambda:UpdateFunctionCode', candidate.arn));
    if (!fn) return null;
    return createLabel(lambdaUpdateFunctionCodeRule, 'Replace the code of a function running as the role', [
      `function ${fn.arn}`,
    ]);
  },
};

export const lambdaUpdateFunctionConfigurationRule: EscalationRule = {
  id: 'lambda-update-function-configuration',
  description: 'Point an existing Lambda function at the role and replace its code',
  kind: 'escalation',
  capabilities: ['iam:PassRole', 'lambda:UpdateFunctionCode', 'lambda:UpdateFunctionConfiguration'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const { source, target, account } = ctx;
    if (!roleTrusts(target, LAMBDA)) return null;
    if (!canPassRole(source, target, LAMBDA)) return null;

    const fn = account.functions.find(
      candidate =>
        candidate.roleArn !== target.principal.arn &&
        can(source, 'lambda:UpdateFunctionConfiguration', candidate.arn) &&
        can(source, 'lambda:UpdateFunctionCode', candidate.arn)
    );
    if (!fn) return null;
    return createLabel(lambdaUpdateFunctionConfigurationRule, 'Swap the role of an existing function', [
      `function ${fn.arn}`,
    ]);
  },
};

export const ec2RunInstancesRule: EscalationRule = {
  id: 'ec2-run-instances',
  description: 'Launch an EC2 instance with an instance profile holding the role',
  kind: 'escalation',
  capabilities: ['iam:PassRole', 'ec2:RunInstances'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const { source, target, account } = ctx;
    const profileArn = target.principal.instanceProfileArns[0];
    if (profileArn === undefined) return null;
    if (!roleTrusts(target, EC2)) return null;
    if (!canPassRole(source, target, EC2)) return null;
    if (!can(source, 'ec2:RunInstances', accountResource(account, 'ec2', 'instance/*'))) return null;
    return createLabel(ec2RunInstancesRule, 'Launch an instance with the role', [`instance profile ${profileArn}`]);
  },
};

export const cloudFormationCreateStackRule: EscalationRule = {
  id: 'cloudformation-create-stack',
  description: 'Create a CloudFormation stack that provisions resources as the role',
  kind: 'escalation',
  capabilities: ['iam:PassRole', 'cloudformation:CreateStack'],
  scope: 'cross',
  targetTypes: ['role'],
  evaluate(ctx) {
    const { source, target, account } = ctx;
    if (!roleTrusts(target, CLOUDFORMATION)) return null;
    if (!canPassRole(source, target, CLOUDFORMATION)) return null;
    if (!can(source, 'cloudformation:CreateStack', accountResource(account, 'cloudformation', 'stack/*'))) {
      return null;
    }
    return createLabel(cloudFormationCreateStackRule, 'Create a stack that runs as the role');
  },
};

export const SERVICE_ROLE_RULES: readonly EscalationRule[] = [
  lambdaCreateFunctionRule,
  lambdaUpdateFunctionCodeRule,
  lambdaUpdateFunctionConfigurationRule,
  ec2RunInstancesRule,
  cloudFormationCreateStackRule,
];
