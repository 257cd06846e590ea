import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { matchesAny, segmentsMatch, wildcardMatch } from './wildcard.js';

describe('wildcardMatch', () => {
  it('matches literal patterns exactly', () => {
    expect(wildcardMatch('iam:PassRole', 'iam:PassRole')).toBe(true);
    expect(wildcardMatch('iam:PassRole', 'iam:PassRoles')).toBe(false);
    expect(wildcardMatch('iam:passrole', 'iam:PassRole')).toBe(false);
  });

  it('anchors * at both ends', () => {
    expect(wildcardMatch('iam:*', 'iam:CreateUser')).toBe(true);
    expect(wildcardMatch('iam:*', 'xiam:CreateUser')).toBe(false);
    expect(wildcardMatch('*User', 'iam:CreateUser')).toBe(true);
    expect(wildcardMatch('*User', 'iam:CreateUsers')).toBe(false);
    expect(wildcardMatch('iam:*Policy*', 'iam:PutRolePolicy')).toBe(true);
  });

  it('matches ? against exactly one character', () => {
    expect(wildcardMatch('role/?', 'role/A')).toBe(true);
    expect(wildcardMatch('role/?', 'role/')).toBe(false);
    expect(wildcardMatch('role/?', 'role/AB')).toBe(false);
  });

  it('treats regex metacharacters literally', () => {
    expect(wildcardMatch('a.b', 'a.b')).toBe(true);
    expect(wildcardMatch('a.b*', 'axb')).toBe(false);
    expect(wildcardMatch('(x)+*', '(x)+y')).toBe(true);
  });

  it('lets * match across slashes and colons', () => {
    expect(wildcardMatch('arn:aws:iam::*:role/*', 'arn:aws:iam::111111111111:role/ops/deploy')).toBe(true);
  });

  it('matches every string against itself and against *', () => {
    fc.assert(
      fc.property(fc.string().filter(s => !s.includes('*') && !s.includes('?')), value => {
        expect(wildcardMatch(value, value)).toBe(true);
        expect(wildcardMatch('*', value)).toBe(true);
        expect(wildcardMatch(`${value}*`, `${value}suffix`)).toBe(true);
      })
    );
  });
});

describe('segmentsMatch', () => {
  it('treats literal segments verbatim', () => {
    const segments = [
      { text: 'bucket/', literal: false },
      { text: '*', literal: true },
    ];
    expect(segmentsMatch(segments, 'bucket/*')).toBe(true);
    expect(segmentsMatch(segments, 'bucket/report')).toBe(false);
  });

  it('keeps wildcards in glob segments next to literals', () => {
    const segments = [
      { text: 'home/', literal: false },
      { text: 'a?b', literal: true },
      { text: '/*', literal: false },
    ];
    expect(segmentsMatch(segments, 'home/a?b/notes.txt')).toBe(true);
    expect(segmentsMatch(segments, 'home/axb/notes.txt')).toBe(false);
  });

  it('matches glob-only segments like wildcardMatch', () => {
    expect(segmentsMatch([{ text: 'role/*', literal: false }], 'role/A')).toBe(true);
  });
});

describe('matchesAny', () => {
  it('is true when any pattern matches', () => {
    expect(matchesAny(['s3:*', 'iam:Get*'], 'iam:GetUser')).toBe(true);
    expect(matchesAny(['s3:*', 'iam:Get*'], 'iam:PutUserPolicy')).toBe(false);
    expect(matchesAny([], 'iam:GetUser')).toBe(false);
  });
});
