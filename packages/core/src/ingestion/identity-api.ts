/**
 * Identity API
 *
 * The narrow set of read calls ingestion needs from a provider. The live
 * implementation wraps the AWS SDK; the offline one serves an
 * authorization-details export from memory.
 */

import type { InstanceProfileRecord, LambdaFunctionRecord, PrincipalType } from './types.js';

/**
 * A policy document as the provider returns it: a JSON string (possibly
 * URL-encoded) or an already decoded object
 */
export type RawPolicyDocument = string | Record<string, unknown>;

export interface RawPrincipalSummary {
  arn: string;
  name: string;
  path: string;
  id?: string | undefined;
  tags: Record<string, string>;
  /** Role trust policy */
  trustPolicy?: RawPolicyDocument | undefined;
}

export interface RawInlinePolicy {
  name: string;
  document: RawPolicyDocument;
}

export interface RawManagedPolicy {
  arn: string;
  name: string;
  defaultVersionId: string;
  versionCount: number;
  document: RawPolicyDocument;
}

export interface IdentityApi {
  getAccountId(signal?: AbortSignal): Promise<string>;
  listPrincipals(type: PrincipalType, signal?: AbortSignal): Promise<RawPrincipalSummary[]>;
  /** Boundary policy ARN of a user or role, if one is set */
  getPermissionsBoundaryArn(type: PrincipalType, name: string, signal?: AbortSignal): Promise<string | undefined>;
  listInlinePolicies(type: PrincipalType, name: string, signal?: AbortSignal): Promise<RawInlinePolicy[]>;
  listAttachedPolicyArns(type: PrincipalType, name: string, signal?: AbortSignal): Promise<string[]>;
  /** ARNs of the groups a user belongs to */
  listGroupsForUser(userName: string, signal?: AbortSignal): Promise<string[]>;
  /** Default version of a managed policy, undefined when it does not exist */
  getManagedPolicy(arn: string, signal?: AbortSignal): Promise<RawManagedPolicy | undefined>;
  listInstanceProfiles(signal?: AbortSignal): Promise<InstanceProfileRecord[]>;
  listFunctions(region: string, signal?: AbortSignal): Promise<LambdaFunctionRecord[]>;
}

/**
 * AWS managed policies live in the reserved "aws" account
 */
export function isAwsManagedPolicy(arn: string): boolean {
  return /^arn:[^:]+:iam::aws:policy\//.test(arn);
}
