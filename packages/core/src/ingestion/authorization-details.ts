/**
 * Offline Authorization Details
 *
 * Serves the output of `aws iam get-account-authorization-details`
 * (optionally extended with a `Functions` list in the shape of
 * `aws lambda list-functions`) through the IdentityApi interface, so the
 * same ingestion path runs against a file.
 */

import * as fs from 'node:fs/promises';

import { z } from 'zod';

import { ConfigError } from '../errors/errors.js';
import { getAccountId, getPartition, parseArn } from '../policy/arn.js';
import type {
  IdentityApi,
  RawInlinePolicy,
  RawManagedPolicy,
  RawPolicyDocument,
  RawPrincipalSummary,
} from './identity-api.js';
import type { InstanceProfileRecord, LambdaFunctionRecord, PrincipalType } from './types.js';

// ============================================================================
// Schema
// ============================================================================

const DocumentSchema = z.union([z.string(), z.record(z.unknown())]);

const TagSchema = z.object({ Key: z.string(), Value: z.string() });

const InlineSchema = z.object({ PolicyName: z.string(), PolicyDocument: DocumentSchema });

const AttachedSchema = z.object({ PolicyName: z.string().optional(), PolicyArn: z.string() });

const BoundarySchema = z.object({ PermissionsBoundaryArn: z.string() }).passthrough();

const InstanceProfileSchema = z
  .object({
    Arn: z.string(),
    InstanceProfileName: z.string(),
    Roles: z.array(z.object({ Arn: z.string() }).passthrough()).default([]),
  })
  .passthrough();

const UserDetailSchema = z
  .object({
    Arn: z.string(),
    UserName: z.string(),
    UserId: z.string().optional(),
    Path: z.string().default('/'),
    UserPolicyList: z.array(InlineSchema).default([]),
    GroupList: z.array(z.string()).default([]),
    AttachedManagedPolicies: z.array(AttachedSchema).default([]),
    PermissionsBoundary: BoundarySchema.optional(),
    Tags: z.array(TagSchema).default([]),
  })
  .passthrough();

const GroupDetailSchema = z
  .object({
    Arn: z.string(),
    GroupName: z.string(),
    GroupId: z.string().optional(),
    Path: z.string().default('/'),
    GroupPolicyList: z.array(InlineSchema).default([]),
    AttachedManagedPolicies: z.array(AttachedSchema).default([]),
  })
  .passthrough();

const RoleDetailSchema = z
  .object({
    Arn: z.string(),
    RoleName: z.string(),
    RoleId: z.string().optional(),
    Path: z.string().default('/'),
    AssumeRolePolicyDocument: DocumentSchema.optional(),
    InstanceProfileList: z.array(InstanceProfileSchema).default([]),
    RolePolicyList: z.array(InlineSchema).default([]),
    AttachedManagedPolicies: z.array(AttachedSchema).default([]),
    PermissionsBoundary: BoundarySchema.optional(),
    Tags: z.array(TagSchema).default([]),
  })
  .passthrough();

const PolicyDetailSchema = z
  .object({
    Arn: z.string(),
    PolicyName: z.string(),
    DefaultVersionId: z.string(),
    PolicyVersionList: z.array(
      z
        .object({
          VersionId: z.string(),
          IsDefaultVersion: z.boolean().optional(),
          Document: DocumentSchema,
        })
        .passthrough()
    ),
  })
  .passthrough();

const FunctionSchema = z
  .object({
    FunctionArn: z.string(),
    FunctionName: z.string(),
    Role: z.string(),
  })
  .passthrough();

export const AuthorizationDetailsSchema = z
  .object({
    UserDetailList: z.array(UserDetailSchema).default([]),
    GroupDetailList: z.array(GroupDetailSchema).default([]),
    RoleDetailList: z.array(RoleDetailSchema).default([]),
    Policies: z.array(PolicyDetailSchema).default([]),
    Functions: z.array(FunctionSchema).default([]),
    AccountId: z.string().optional(),
  })
  .passthrough();

export type AuthorizationDetails = z.infer<typeof AuthorizationDetailsSchema>;

type Detail =
  | { type: 'user'; value: z.infer<typeof UserDetailSchema> }
  | { type: 'role'; value: z.infer<typeof RoleDetailSchema> }
  | { type: 'group'; value: z.infer<typeof GroupDetailSchema> };

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an already parsed authorization-details object
 */
export function parseAuthorizationDetails(input: unknown, source = 'authorization details'): AuthorizationDetails {
  const result = AuthorizationDetailsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`${source} is not a valid authorization-details export`, { issues });
  }
  return result.data;
}

export async function loadAuthorizationDetails(filePath: string): Promise<AuthorizationDetails> {
  const text = await fs.readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${filePath} is not valid JSON: ${reason}`);
  }
  return parseAuthorizationDetails(json, filePath);
}

// ============================================================================
// In-memory API
// ============================================================================

function tagsToRecord(tags: readonly { Key: string; Value: string }[]): Record<string, string> {
  return Object.fromEntries(tags.map(tag => [tag.Key, tag.Value]));
}

function inline(list: readonly { PolicyName: string; PolicyDocument: RawPolicyDocument }[]): RawInlinePolicy[] {
  return list.map(policy => ({ name: policy.PolicyName, document: policy.PolicyDocument }));
}

export class AuthorizationDetailsApi implements IdentityApi {
  private readonly details = new Map<string, Detail>();
  private readonly groupArnsByName = new Map<string, string>();
  private readonly accountId: string;
  private readonly partition: string;

  constructor(private readonly data: AuthorizationDetails) {
    for (const value of data.UserDetailList) this.details.set(`user:${value.UserName}`, { type: 'user', value });
    for (const value of data.RoleDetailList) this.details.set(`role:${value.RoleName}`, { type: 'role', value });
    for (const value of data.GroupDetailList) {
      this.details.set(`group:${value.GroupName}`, { type: 'group', value });
      this.groupArnsByName.set(value.GroupName, value.Arn);
    }

    const firstArn = [...data.UserDetailList, ...data.RoleDetailList, ...data.GroupDetailList][0]?.Arn;
    this.accountId = data.AccountId ?? (firstArn ? getAccountId(firstArn) : '');
    this.partition = firstArn ? getPartition(firstArn) : 'aws';
  }

  private detail(type: PrincipalType, name: string): Detail | undefined {
    return this.details.get(`${type}:${name}`);
  }

  async getAccountId(): Promise<string> {
    if (!this.accountId) {
      throw new ConfigError('Cannot determine the account id: the export holds no principals and no AccountId');
    }
    return this.accountId;
  }

  async listPrincipals(type: PrincipalType): Promise<RawPrincipalSummary[]> {
    if (type === 'user') {
      return this.data.UserDetailList.map(user => ({
        arn: user.Arn,
        name: user.UserName,
        path: user.Path,
        id: user.UserId,
        tags: tagsToRecord(user.Tags),
      }));
    }
    if (type === 'role') {
      return this.data.RoleDetailList.map(role => ({
        arn: role.Arn,
        name: role.RoleName,
        path: role.Path,
        id: role.RoleId,
        tags: tagsToRecord(role.Tags),
        trustPolicy: role.AssumeRolePolicyDocument,
      }));
    }
    return this.data.GroupDetailList.map(group => ({
      arn: group.Arn,
      name: group.GroupName,
      path: group.Path,
      id: group.GroupId,
      tags: {},
    }));
  }

  async getPermissionsBoundaryArn(type: PrincipalType, name: string): Promise<string | undefined> {
    const detail = this.detail(type, name);
    if (detail?.type === 'user' || detail?.type === 'role') {
      return detail.value.PermissionsBoundary?.PermissionsBoundaryArn;
    }
    return undefined;
  }

  async listInlinePolicies(type: PrincipalType, name: string): Promise<RawInlinePolicy[]> {
    const detail = this.detail(type, name);
    switch (detail?.type) {
      case 'user':
        return inline(detail.value.UserPolicyList);
      case 'role':
        return inline(detail.value.RolePolicyList);
      case 'group':
        return inline(detail.value.GroupPolicyList);
      default:
        return [];
    }
  }

  async listAttachedPolicyArns(type: PrincipalType, name: string): Promise<string[]> {
    const detail = this.detail(type, name);
    return detail ? detail.value.AttachedManagedPolicies.map(policy => policy.PolicyArn) : [];
  }

  async listGroupsForUser(userName: string): Promise<string[]> {
    const detail = this.detail('user', userName);
    if (detail?.type !== 'user') return [];
    return detail.value.GroupList.map(
      groupName =>
        this.groupArnsByName.get(groupName) ?? `arn:${this.partition}:iam::${this.accountId}:group/${groupName}`
    );
  }

  async getManagedPolicy(arn: string): Promise<RawManagedPolicy | undefined> {
    const policy = this.data.Policies.find(candidate => candidate.Arn === arn);
    if (!policy) return undefined;

    const version =
      policy.PolicyVersionList.find(candidate => candidate.VersionId === policy.DefaultVersionId) ??
      policy.PolicyVersionList.find(candidate => candidate.IsDefaultVersion === true);
    if (!version) return undefined;

    return {
      arn,
      name: policy.PolicyName,
      defaultVersionId: policy.DefaultVersionId,
      versionCount: policy.PolicyVersionList.length,
      document: version.Document,
    };
  }

  async listInstanceProfiles(): Promise<InstanceProfileRecord[]> {
    const profiles = new Map<string, InstanceProfileRecord>();
    for (const role of this.data.RoleDetailList) {
      for (const profile of role.InstanceProfileList) {
        const existing = profiles.get(profile.Arn);
        const roleArns = profile.Roles.length > 0 ? profile.Roles.map(r => r.Arn) : [role.Arn];
        profiles.set(profile.Arn, {
          arn: profile.Arn,
          name: profile.InstanceProfileName,
          roleArns: [...new Set([...(existing?.roleArns ?? []), ...roleArns])],
        });
      }
    }
    return [...profiles.values()];
  }

  async listFunctions(region: string): Promise<LambdaFunctionRecord[]> {
    return this.data.Functions.flatMap(fn => {
      const fnRegion = parseArn(fn.FunctionArn)?.region ?? '';
      if (fnRegion !== region) return [];
      return [{ arn: fn.FunctionArn, name: fn.FunctionName, region: fnRegion, roleArn: fn.Role }];
    });
  }

  /**
   * Every region the export has functions in
   */
  functionRegions(): string[] {
    const regions = new Set(this.data.Functions.map(fn => parseArn(fn.FunctionArn)?.region ?? ''));
    regions.delete('');
    return [...regions].sort();
  }
}
