import { describe, it, expect } from 'vitest';
import { evaluateConditions, getContextValue } from './conditions.js';
import { substituteVariables } from './variables.js';

describe('evaluateConditions', () => {
  it('is true for an empty block', () => {
    expect(evaluateConditions({}, {})).toBe(true);
  });

  it('compares strings exactly, ignoring case or by glob', () => {
    const context = { 'aws:username': 'Alice' };
    expect(evaluateConditions({ StringEquals: { 'aws:username': ['Alice'] } }, context)).toBe(true);
    expect(evaluateConditions({ StringEquals: { 'aws:username': ['alice'] } }, context)).toBe(false);
    expect(evaluateConditions({ StringEqualsIgnoreCase: { 'aws:username': ['alice'] } }, context)).toBe(true);
    expect(evaluateConditions({ StringLike: { 'aws:username': ['A*'] } }, context)).toBe(true);
    expect(evaluateConditions({ StringNotLike: { 'aws:username': ['A*'] } }, context)).toBe(false);
  });

  it('looks keys up case-insensitively', () => {
    expect(getContextValue({ 'iam:PassedToService': 'lambda.amazonaws.com' }, 'IAM:passedtoservice')).toEqual([
      'lambda.amazonaws.com',
    ]);
  });

  it('fails a positive operator on a missing key unless IfExists applies', () => {
    expect(evaluateConditions({ StringEquals: { 'aws:SourceIp': ['10.0.0.1'] } }, {})).toBe(false);
    expect(evaluateConditions({ StringEqualsIfExists: { 'aws:SourceIp': ['10.0.0.1'] } }, {})).toBe(true);
  });

  it('matches negated operators when the key is absent', () => {
    expect(evaluateConditions({ StringNotEquals: { 'aws:SourceVpc': ['vpc-1'] } }, {})).toBe(true);
  });

  it('evaluates Null against key presence', () => {
    expect(evaluateConditions({ Null: { 'aws:TokenIssueTime': ['true'] } }, {})).toBe(true);
    expect(evaluateConditions({ Null: { 'aws:TokenIssueTime': ['false'] } }, {})).toBe(false);
    expect(evaluateConditions({ Null: { 'aws:TokenIssueTime': ['false'] } }, { 'aws:TokenIssueTime': 'now' })).toBe(true);
  });

  it('compares numbers, dates and booleans', () => {
    expect(evaluateConditions({ NumericLessThan: { 's3:max-keys': ['10'] } }, { 's3:max-keys': '5' })).toBe(true);
    expect(evaluateConditions({ NumericLessThan: { 's3:max-keys': ['10'] } }, { 's3:max-keys': 'many' })).toBe(false);
    expect(
      evaluateConditions({ DateGreaterThan: { 'aws:CurrentTime': ['2024-01-01T00:00:00Z'] } }, { 'aws:CurrentTime': '2024-06-01T00:00:00Z' })
    ).toBe(true);
    expect(evaluateConditions({ Bool: { 'aws:SecureTransport': ['true'] } }, { 'aws:SecureTransport': 'TRUE' })).toBe(true);
  });

  it('matches ARNs segment by segment', () => {
    const context = { 'aws:SourceArn': 'arn:aws:s3:::bucket/key' };
    expect(evaluateConditions({ ArnLike: { 'aws:SourceArn': ['arn:aws:s3:::bucket/*'] } }, context)).toBe(true);
    expect(evaluateConditions({ ArnLike: { 'aws:SourceArn': ['arn:aws:s3:::other/*'] } }, context)).toBe(false);
    expect(evaluateConditions({ ArnEquals: { 'aws:SourceArn': ['not-an-arn'] } }, context)).toBe(false);
  });

  it('applies set qualifiers to multi-valued keys', () => {
    const context = { 'aws:TagKeys': ['team', 'env'] };
    expect(evaluateConditions({ 'ForAnyValue:StringEquals': { 'aws:TagKeys': ['env'] } }, context)).toBe(true);
    expect(evaluateConditions({ 'ForAllValues:StringEquals': { 'aws:TagKeys': ['env'] } }, context)).toBe(false);
    expect(evaluateConditions({ 'ForAllValues:StringEquals': { 'aws:TagKeys': ['env', 'team'] } }, context)).toBe(true);
    expect(evaluateConditions({ 'ForAllValues:StringEquals': { 'aws:TagKeys': ['env'] } }, {})).toBe(true);
  });

  it('never matches an unknown operator', () => {
    expect(evaluateConditions({ StringSoundsLike: { 'aws:username': ['alice'] } }, { 'aws:username': 'alice' })).toBe(false);
  });

  it('does not resolve operators named after object members', () => {
    const context = { 'aws:username': 'alice' };
    expect(evaluateConditions({ constructor: { 'aws:username': ['alice'] } }, context)).toBe(false);
    expect(evaluateConditions({ toString: { 'aws:username': ['alice'] } }, context)).toBe(false);
    expect(evaluateConditions({ hasOwnProperty: { 'aws:department': ['ops'] } }, context)).toBe(false);
  });

  it('requires every operator and key to hold', () => {
    const block = {
      StringEquals: { 'aws:username': ['alice'] },
      Bool: { 'aws:MultiFactorAuthPresent': ['true'] },
    };
    expect(evaluateConditions(block, { 'aws:username': 'alice', 'aws:MultiFactorAuthPresent': 'true' })).toBe(true);
    expect(evaluateConditions(block, { 'aws:username': 'alice', 'aws:MultiFactorAuthPresent': 'false' })).toBe(false);
  });
});

describe('substituteVariables', () => {
  it('replaces known variables from the context', () => {
    expect(substituteVariables('arn:aws:iam::*:user/${aws:username}', { 'aws:username': 'alice' })).toEqual([
      { text: 'arn:aws:iam::*:user/', literal: false },
      { text: 'alice', literal: true },
    ]);
  });

  it('keeps literal escapes as literal segments', () => {
    expect(substituteVariables('prefix-${*}-${?}-${$}', {})).toEqual([
      { text: 'prefix-', literal: false },
      { text: '*', literal: true },
      { text: '-', literal: false },
      { text: '?', literal: true },
      { text: '-', literal: false },
      { text: '$', literal: true },
    ]);
  });

  it('uses a quoted default for a missing key', () => {
    expect(substituteVariables("home/${aws:username, 'nobody'}", {})).toEqual([
      { text: 'home/', literal: false },
      { text: 'nobody', literal: true },
    ]);
  });

  it('makes patterns with unknown variables unmatchable', () => {
    expect(substituteVariables('user/${aws:username}', {})).toBeNull();
    expect(substituteVariables('user/${constructor}', {})).toBeNull();
  });

  it('returns patterns without variables as one glob segment', () => {
    expect(substituteVariables('arn:aws:s3:::bucket/*', {})).toEqual([{ text: 'arn:aws:s3:::bucket/*', literal: false }]);
  });
});
