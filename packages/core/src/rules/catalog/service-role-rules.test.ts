import { describe, it, expect } from 'vitest';
import { allow, arnOf, makePrincipal, resolve, trust, viewOf, withInline } from '../../__fixtures__/principals.js';
import type { LambdaFunctionRecord } from '../../ingestion/types.js';
import type { ResolvedPrincipal } from '../../resolver/types.js';
import type { EscalationRule } from '../types.js';
import { ec2RunInstancesRule, lambdaCreateFunctionRule, lambdaUpdateFunctionCodeRule } from './service-role-rules.js';

function evaluate(
  rule: EscalationRule,
  source: ResolvedPrincipal,
  target: ResolvedPrincipal,
  functions: LambdaFunctionRecord[] = []
) {
  return rule.evaluate({ source, target, account: viewOf([source, target], functions) });
}

const lambdaRole = resolve(makePrincipal('role', 'fn', { trustPolicy: trust({ Service: 'lambda.amazonaws.com' }) }));

describe('lambdaCreateFunctionRule', () => {
  it('needs PassRole to Lambda and CreateFunction', () => {
    const source = resolve(withInline('user', 'dev', [allow(['iam:PassRole', 'lambda:CreateFunction'])]));
    expect(evaluate(lambdaCreateFunctionRule, source, lambdaRole)).toEqual({
      ruleId: 'lambda-create-function',
      kind: 'escalation',
      technique: 'Create a Lambda function with the role',
      preconditions: ['the function can be invoked or triggered'],
      selfEscalation: false,
    });
  });

  it('respects an iam:PassedToService condition', () => {
    const source = resolve(
      withInline('user', 'dev', [
        allow('lambda:CreateFunction'),
        {
          Effect: 'Allow',
          Action: 'iam:PassRole',
          Resource: '*',
          Condition: { StringEquals: { 'iam:PassedToService': 'ec2.amazonaws.com' } },
        },
      ])
    );
    expect(evaluate(lambdaCreateFunctionRule, source, lambdaRole)).toBeNull();
  });

  it('requires the role to trust Lambda', () => {
    const source = resolve(withInline('user', 'dev', [allow(['iam:PassRole', 'lambda:CreateFunction'])]));
    const ec2Role = resolve(makePrincipal('role', 'web', { trustPolicy: trust({ Service: 'ec2.amazonaws.com' }) }));
    expect(evaluate(lambdaCreateFunctionRule, source, ec2Role)).toBeNull();
  });
});

describe('lambdaUpdateFunctionCodeRule', () => {
  it('targets functions already running as the role', () => {
    const fnArn = 'arn:aws:lambda:eu-west-1:111111111111:function:resize';
    const functions = [{ arn: fnArn, name: 'resize', region: 'eu-west-1', roleArn: arnOf('role', 'fn') }];
    const source = resolve(withInline('user', 'dev', [allow('lambda:UpdateFunctionCode', fnArn)]));

    expect(evaluate(lambdaUpdateFunctionCodeRule, source, lambdaRole, functions)?.preconditions).toEqual([
      `function ${fnArn}`,
    ]);
    expect(evaluate(lambdaUpdateFunctionCodeRule, source, lambdaRole)).toBeNull();
  });
});

describe('ec2RunInstancesRule', () => {
  it('needs an instance profile holding the role', () => {
    const profileArn = 'arn:aws:iam::111111111111:instance-profile/web';
    const source = resolve(withInline('user', 'dev', [allow(['iam:PassRole', 'ec2:RunInstances'])]));
    const withProfile = resolve(
      makePrincipal('role', 'web', {
        trustPolicy: trust({ Service: 'ec2.amazonaws.com' }),
        instanceProfileArns: [profileArn],
      })
    );
    const withoutProfile = resolve(makePrincipal('role', 'web', { trustPolicy: trust({ Service: 'ec2.amazonaws.com' }) }));

    expect(evaluate(ec2RunInstancesRule, source, withProfile)?.preconditions).toEqual([`instance profile ${profileArn}`]);
    expect(evaluate(ec2RunInstancesRule, source, withoutProfile)).toBeNull();
  });
});
