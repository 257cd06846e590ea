import { describe, it, expect } from 'vitest';
import { arnOf, policy, trust } from '../__fixtures__/principals.js';
import { evaluateResourcePolicy, trustsService } from './resource-policy.js';

const ROLE = arnOf('role', 'target');
const ALICE = arnOf('user', 'alice');

function decide(document: ReturnType<typeof policy>, arn: string = ALICE): string {
  return evaluateResourcePolicy(document, { kind: 'principal', arn }, 'sts:AssumeRole', ROLE);
}

describe('evaluateResourcePolicy', () => {
  it('reports a principal match when the ARN is named', () => {
    expect(decide(trust({ AWS: ALICE }))).toBe('principal-match');
  });

  it('reports an account match for the account root or bare account id', () => {
    expect(decide(trust({ AWS: 'arn:aws:iam::111111111111:root' }))).toBe('account-match');
    expect(decide(trust({ AWS: '111111111111' }))).toBe('account-match');
    expect(decide(trust({ AWS: 'arn:aws:iam::222222222222:root' }))).toBe('no-match');
  });

  it('treats a wildcard principal as naming everyone', () => {
    expect(decide(policy([{ Effect: 'Allow', Principal: '*', Action: 'sts:AssumeRole' }], 'resource'))).toBe(
      'principal-match'
    );
  });

  it('prefers the strongest match across statements', () => {
    const document = policy(
      [
        { Effect: 'Allow', Principal: { AWS: 'arn:aws:iam::111111111111:root' }, Action: 'sts:AssumeRole' },
        { Effect: 'Allow', Principal: { AWS: ALICE }, Action: 'sts:AssumeRole' },
      ],
      'resource'
    );
    expect(decide(document)).toBe('principal-match');
  });

  it('returns explicit-deny when a Deny statement matches', () => {
    const document = policy(
      [
        { Effect: 'Allow', Principal: { AWS: ALICE }, Action: 'sts:AssumeRole' },
        { Effect: 'Deny', Principal: { AWS: ALICE }, Action: 'sts:*' },
      ],
      'resource'
    );
    expect(decide(document)).toBe('explicit-deny');
    expect(decide(document, arnOf('user', 'bob'))).toBe('no-match');
  });

  it('matches everyone except the listed principals for NotPrincipal', () => {
    const document = policy([{ Effect: 'Allow', NotPrincipal: { AWS: ALICE }, Action: 'sts:AssumeRole' }], 'resource');
    expect(decide(document)).toBe('no-match');
    expect(decide(document, arnOf('user', 'bob'))).toBe('principal-match');
  });

  it('ignores statements for other actions or failed conditions', () => {
    const document = policy(
      [
        { Effect: 'Allow', Principal: { AWS: ALICE }, Action: 'sts:TagSession' },
        {
          Effect: 'Allow',
          Principal: { AWS: ALICE },
          Action: 'sts:AssumeRole',
          Condition: { Bool: { 'aws:MultiFactorAuthPresent': 'true' } },
        },
      ],
      'resource'
    );
    expect(decide(document)).toBe('no-match');
    expect(
      evaluateResourcePolicy(document, { kind: 'principal', arn: ALICE }, 'sts:AssumeRole', ROLE, {
        'aws:MultiFactorAuthPresent': 'true',
      })
    ).toBe('principal-match');
  });
});

describe('trustsService', () => {
  it('checks the Service element only', () => {
    const document = trust({ Service: ['lambda.amazonaws.com', 'ec2.amazonaws.com'] });
    expect(trustsService(document, ROLE, 'lambda.amazonaws.com')).toBe(true);
    expect(trustsService(document, ROLE, 'cloudformation.amazonaws.com')).toBe(false);
    expect(trustsService(trust({ AWS: ALICE }), ROLE, 'lambda.amazonaws.com')).toBe(false);
    expect(trustsService(undefined, ROLE, 'lambda.amazonaws.com')).toBe(false);
  });
});
