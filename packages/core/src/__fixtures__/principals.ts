/**
 * Builders for test principals and policies
 */

import * as fs from 'node:fs/promises';

import {
  AuthorizationDetailsApi,
  parseAuthorizationDetails,
  type AuthorizationDetails,
} from '../ingestion/authorization-details.js';
import { ApiIdentitySource } from '../ingestion/identity-source.js';
import type { LambdaFunctionRecord, Principal, PrincipalType } from '../ingestion/types.js';
import { parsePolicyDocument } from '../policy/policy-parser.js';
import type { ManagedPolicyRecord, PolicyDocument } from '../policy/types.js';
import { resolvePermissions, toResolvedPrincipal } from '../resolver/permission-resolver.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import { createAccountView } from '../rules/account-view.js';
import type { AccountView } from '../rules/types.js';

export const ACCOUNT_ID = '111111111111';

export const FIXTURE_PATH = new URL('./authorization-details.json', import.meta.url);

export function arnOf(type: PrincipalType, name: string): string {
  return `arn:aws:iam::${ACCOUNT_ID}:${type}/${name}`;
}

export function policy(statements: unknown[], kind: 'identity' | 'resource' = 'identity'): PolicyDocument {
  return parsePolicyDocument({ Version: '2012-10-17', Statement: statements }, 'test-policy', kind);
}

export function allow(action: string | string[], resource: string | string[] = '*'): Record<string, unknown> {
  return { Effect: 'Allow', Action: action, Resource: resource };
}

export function deny(action: string | string[], resource: string | string[] = '*'): Record<string, unknown> {
  return { Effect: 'Deny', Action: action, Resource: resource };
}

/**
 * Trust policy admitting the given AWS principals or services
 */
export function trust(principal: { AWS?: string | string[]; Service?: string | string[] }): PolicyDocument {
  return policy([{ Effect: 'Allow', Principal: principal, Action: 'sts:AssumeRole' }], 'resource');
}

export function managedPolicy(name: string, document: PolicyDocument, options: Partial<ManagedPolicyRecord> = {}): ManagedPolicyRecord {
  return {
    arn: options.arn ?? `arn:aws:iam::${ACCOUNT_ID}:policy/${name}`,
    name,
    customerManaged: options.customerManaged ?? true,
    defaultVersionId: options.defaultVersionId ?? 'v1',
    versionCount: options.versionCount ?? 1,
    document,
  };
}

export function makePrincipal(type: PrincipalType, name: string, options: Partial<Principal> = {}): Principal {
  return {
    arn: arnOf(type, name),
    type,
    name,
    path: '/',
    inlinePolicies: [],
    attachedPolicies: [],
    groupArns: [],
    instanceProfileArns: [],
    tags: {},
    ...options,
  };
}

/**
 * Principal with a single inline policy
 */
export function withInline(type: PrincipalType, name: string, statements: unknown[], options: Partial<Principal> = {}): Principal {
  return makePrincipal(type, name, {
    inlinePolicies: [{ name: 'inline', document: policy(statements) }],
    ...options,
  });
}

export function resolve(principal: Principal, groups: readonly Principal[] = []): ResolvedPrincipal {
  return toResolvedPrincipal(principal, resolvePermissions(principal, groups));
}

export function viewOf(principals: readonly ResolvedPrincipal[], functions: LambdaFunctionRecord[] = []): AccountView {
  return createAccountView({ accountId: ACCOUNT_ID, partition: 'aws', functions, instanceProfiles: [] }, principals);
}

export async function loadFixture(): Promise<AuthorizationDetails> {
  return parseAuthorizationDetails(JSON.parse(await fs.readFile(FIXTURE_PATH, 'utf-8')), 'fixture');
}

/**
 * Offline source over the fixture export
 */
export async function fixtureSource(): Promise<ApiIdentitySource> {
  const api = new AuthorizationDetailsApi(await loadFixture());
  return new ApiIdentitySource(api, { label: 'fixture', lambdaRegions: [], retry: { maxRetries: 0 } });
}
