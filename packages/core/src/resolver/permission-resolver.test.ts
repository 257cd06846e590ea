import fc from 'fast-check';
import { describe, it, expect } from 'vitest';
import {
  allow,
  arnOf,
  deny,
  makePrincipal,
  managedPolicy,
  policy,
  withInline,
} from '../__fixtures__/principals.js';
import {
  applySessionPolicy,
  isAdministrator,
  isAuthorized,
  isExplicitlyDenied,
  listGrants,
  resolvePermissions,
  withSelfGrantedAccess,
} from './permission-resolver.js';

describe('resolvePermissions', () => {
  it('collects inline, attached and group policies', () => {
    const group = withInline('group', 'dev', [allow('s3:GetObject')]);
    const user = withInline('user', 'alice', [allow('iam:GetUser')], {
      attachedPolicies: [managedPolicy('ReadLogs', policy([allow('logs:Get*')]))],
      groupArns: [group.arn],
    });

    const permissions = resolvePermissions(user, [group]);

    expect(permissions.grants.map(grant => grant.origin)).toEqual([
      `${user.arn}/inline/inline#0`,
      'arn:aws:iam::111111111111:policy/ReadLogs#0',
      `${group.arn}/inline/inline#0`,
    ]);
    expect(permissions.boundary).toBeNull();
    expect(permissions.session).toBeNull();
    expect(permissions.variables['aws:username']).toBe('alice');
    expect(isAuthorized(permissions, 's3:GetObject', 'arn:aws:s3:::bucket/key')).toBe(true);
    expect(isAuthorized(permissions, 'logs:GetLogEvents', '*')).toBe(true);
    expect(isAuthorized(permissions, 'iam:CreateUser', '*')).toBe(false);
  });

  it('changes the policy hash when a policy changes', () => {
    const before = resolvePermissions(withInline('user', 'alice', [allow('iam:GetUser')]));
    const same = resolvePermissions(withInline('user', 'alice', [allow('iam:GetUser')]));
    const after = resolvePermissions(withInline('user', 'alice', [allow('iam:ListUsers')]));

    expect(same.policyHash).toBe(before.policyHash);
    expect(after.policyHash).not.toBe(before.policyHash);
  });
});

describe('isAuthorized', () => {
  it('lets an explicit deny win regardless of statement order', () => {
    const denyFirst = resolvePermissions(withInline('user', 'a', [deny('iam:*'), allow('*')]));
    const denyLast = resolvePermissions(withInline('user', 'b', [allow('*'), deny('iam:*')]));

    for (const permissions of [denyFirst, denyLast]) {
      expect(isAuthorized(permissions, 'iam:PassRole', '*')).toBe(false);
      expect(isAuthorized(permissions, 's3:GetObject', '*')).toBe(true);
      expect(isExplicitlyDenied(permissions, 'iam:PassRole', '*')).toBe(true);
    }
  });

  it('lets a Deny covering the request win over any set of Allows', () => {
    const target = arnOf('role', 'A');
    const allowed = fc.record({
      action: fc.constantFrom('*', 'iam:*', 'iam:PassRole', 's3:GetObject'),
      resource: fc.constantFrom('*', target, 'arn:aws:iam::111111111111:role/*'),
    });
    const denied = fc.record({
      action: fc.constantFrom('*', 'iam:*', 'iam:Pass*', 'iam:PassRole'),
      resource: fc.constantFrom('*', target, 'arn:aws:iam::111111111111:role/*'),
    });

    fc.assert(
      fc.property(fc.array(allowed, { maxLength: 6 }), denied, fc.nat({ max: 6 }), (allows, deniedOne, position) => {
        const statements = allows.map(entry => allow(entry.action, entry.resource));
        statements.splice(Math.min(position, statements.length), 0, deny(deniedOne.action, deniedOne.resource));
        const permissions = resolvePermissions(withInline('user', 'alice', statements));

        expect(isAuthorized(permissions, 'iam:PassRole', target)).toBe(false);
        expect(isExplicitlyDenied(permissions, 'iam:PassRole', target)).toBe(true);
      })
    );
  });

  it('honours NotAction and NotResource', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [
        { Effect: 'Allow', NotAction: 'iam:*', Resource: '*' },
        { Effect: 'Allow', Action: 'iam:GetUser', NotResource: arnOf('user', 'root-admin') },
      ])
    );

    expect(isAuthorized(permissions, 's3:PutObject', '*')).toBe(true);
    expect(isAuthorized(permissions, 'iam:CreateUser', '*')).toBe(false);
    expect(isAuthorized(permissions, 'iam:GetUser', arnOf('user', 'bob'))).toBe(true);
    expect(isAuthorized(permissions, 'iam:GetUser', arnOf('user', 'root-admin'))).toBe(false);
  });

  it('substitutes policy variables in resources', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [allow('iam:CreateAccessKey', 'arn:aws:iam::111111111111:user/${aws:username}')])
    );

    expect(isAuthorized(permissions, 'iam:CreateAccessKey', arnOf('user', 'alice'))).toBe(true);
    expect(isAuthorized(permissions, 'iam:CreateAccessKey', arnOf('user', 'bob'))).toBe(false);
  });

  it('reads ${*} and ${?} as literal characters', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [allow('s3:GetObject', 'arn:aws:s3:::bucket/${*}/${?}')])
    );

    expect(isAuthorized(permissions, 's3:GetObject', 'arn:aws:s3:::bucket/*/?')).toBe(true);
    expect(isAuthorized(permissions, 's3:GetObject', 'arn:aws:s3:::bucket/reports/a')).toBe(false);
  });

  it('evaluates conditions against the request context', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [
        {
          Effect: 'Allow',
          Action: 'iam:PassRole',
          Resource: '*',
          Condition: { StringEquals: { 'iam:PassedToService': 'lambda.amazonaws.com' } },
        },
      ])
    );

    expect(isAuthorized(permissions, 'iam:PassRole', '*', { 'iam:PassedToService': 'lambda.amazonaws.com' })).toBe(true);
    expect(isAuthorized(permissions, 'iam:PassRole', '*', { 'iam:PassedToService': 'ec2.amazonaws.com' })).toBe(false);
    expect(isAuthorized(permissions, 'iam:PassRole', '*')).toBe(false);
  });

  it('requires the permissions boundary to allow as well', () => {
    const bounded = resolvePermissions(
      withInline('role', 'bounded', [allow('*')], {
        permissionsBoundary: managedPolicy('Boundary', policy([allow(['s3:*', 'iam:Get*'])])),
      })
    );

    expect(isAuthorized(bounded, 's3:GetObject', '*')).toBe(true);
    expect(isAuthorized(bounded, 'iam:GetRole', '*')).toBe(true);
    expect(isAuthorized(bounded, 'iam:PutRolePolicy', '*')).toBe(false);
    expect(isAdministrator(bounded)).toBe(false);
  });

  it('never lets a boundary grant what identity policies do not', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [allow('s3:GetObject')], {
        permissionsBoundary: managedPolicy('Wide', policy([allow('*')])),
      })
    );

    expect(isAuthorized(permissions, 's3:GetObject', '*')).toBe(true);
    expect(isAuthorized(permissions, 'iam:CreateUser', '*')).toBe(false);
  });

  it('scopes permissions down with a session policy', () => {
    const base = resolvePermissions(withInline('role', 'ops', [allow('*')]));
    const scoped = applySessionPolicy(base, policy([allow('s3:*')]), 'read-only');

    expect(isAuthorized(base, 'iam:CreateUser', '*')).toBe(true);
    expect(isAuthorized(scoped, 'iam:CreateUser', '*')).toBe(false);
    expect(isAuthorized(scoped, 's3:GetObject', '*')).toBe(true);
    expect(scoped.session?.[0]?.origin).toBe(`${arnOf('role', 'ops')}/session/read-only#0`);
  });
});

describe('isAdministrator', () => {
  it('requires every admin check action on every resource', () => {
    expect(isAdministrator(resolvePermissions(withInline('role', 'admin', [allow('*')])))).toBe(true);
    expect(isAdministrator(resolvePermissions(withInline('role', 'almost', [allow('*'), deny('kms:*')])))).toBe(false);
    expect(isAdministrator(resolvePermissions(makePrincipal('role', 'empty')))).toBe(false);
  });
});

describe('withSelfGrantedAccess', () => {
  const bounded = resolvePermissions(
    withInline('role', 'bounded', [allow('iam:PutRolePolicy'), deny('kms:*')], {
      permissionsBoundary: managedPolicy('Boundary', policy([allow(['iam:PutRolePolicy', 's3:*', 'kms:*'])])),
    })
  );

  it('stays inside the boundary and keeps existing denies', () => {
    const granted = withSelfGrantedAccess(bounded, { liftBoundary: false });

    expect(isAuthorized(bounded, 's3:GetObject', '*')).toBe(false);
    expect(isAuthorized(granted, 's3:GetObject', '*')).toBe(true);
    expect(isAuthorized(granted, 'ec2:RunInstances', '*')).toBe(false);
    expect(isAuthorized(granted, 'kms:Decrypt', '*')).toBe(false);
    expect(granted.grants.at(-1)?.origin).toBe(`${arnOf('role', 'bounded')}/self-granted`);
  });

  it('drops the boundary when it can be lifted', () => {
    const granted = withSelfGrantedAccess(bounded, { liftBoundary: true });

    expect(granted.boundary).toBeNull();
    expect(isAuthorized(granted, 'ec2:RunInstances', '*')).toBe(true);
    expect(isAdministrator(granted)).toBe(false);
    expect(isAdministrator(withSelfGrantedAccess(resolvePermissions(makePrincipal('role', 'empty')), { liftBoundary: false }))).toBe(true);
  });
});

describe('listGrants', () => {
  it('flattens grants into tuples', () => {
    const permissions = resolvePermissions(
      withInline('user', 'alice', [allow(['iam:GetUser', 'iam:ListUsers'], '*'), deny('iam:DeleteUser', arnOf('user', 'bob'))], {
        permissionsBoundary: managedPolicy('Boundary', policy([allow('iam:*')])),
      })
    );

    expect(listGrants(permissions).map(t => [t.action, t.resource, t.allowed, t.fromBoundary])).toEqual([
      ['iam:GetUser', '*', true, false],
      ['iam:ListUsers', '*', true, false],
      ['iam:DeleteUser', arnOf('user', 'bob'), false, false],
      ['iam:*', '*', true, true],
    ]);
  });
});
