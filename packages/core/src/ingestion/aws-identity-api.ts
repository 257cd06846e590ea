/**
 * AWS Identity API
 *
 * IdentityApi backed by the AWS SDK. One IAM client, one STS client and a
 * Lambda client per region, all sharing the profile's credentials, the
 * request timeout and the optional proxy agent. Retries are left to
 * withRetry, so the SDK's own retry loop is disabled.
 */

import {
  GetGroupPolicyCommand,
  GetPolicyCommand,
  GetPolicyVersionCommand,
  GetRoleCommand,
  GetRolePolicyCommand,
  GetUserCommand,
  GetUserPolicyCommand,
  IAMClient,
  ListPolicyVersionsCommand,
  NoSuchEntityException,
  paginateListAttachedGroupPolicies,
  paginateListAttachedRolePolicies,
  paginateListAttachedUserPolicies,
  paginateListGroupPolicies,
  paginateListGroups,
  paginateListGroupsForUser,
  paginateListInstanceProfiles,
  paginateListRolePolicies,
  paginateListRoles,
  paginateListUserPolicies,
  paginateListUsers,
  type AttachedPolicy,
  type Tag,
} from '@aws-sdk/client-iam';
import { LambdaClient, paginateListFunctions } from '@aws-sdk/client-lambda';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { HttpsProxyAgent } from 'https-proxy-agent';

import type {
  IdentityApi,
  RawInlinePolicy,
  RawManagedPolicy,
  RawPrincipalSummary,
} from './identity-api.js';
import type { InstanceProfileRecord, LambdaFunctionRecord, PrincipalType } from './types.js';

export interface AwsIdentityApiOptions {
  profile: string;
  /** Region for the IAM and STS endpoints */
  region: string;
  requestTimeoutMs: number;
  httpsProxy?: string | undefined;
}

function tagsToRecord(tags: Tag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) record[tag.Key] = tag.Value ?? '';
  }
  return record;
}

function attachedArns(policies: AttachedPolicy[] | undefined): string[] {
  return (policies ?? []).flatMap(policy => (policy.PolicyArn ? [policy.PolicyArn] : []));
}

export class AwsIdentityApi implements IdentityApi {
  private readonly iam: IAMClient;
  private readonly sts: STSClient;
  private readonly lambdaClients = new Map<string, LambdaClient>();
  private readonly requestHandler: NodeHttpHandler;
  private readonly credentials: ReturnType<typeof fromIni>;

  constructor(options: AwsIdentityApiOptions) {
    const agent = options.httpsProxy ? new HttpsProxyAgent(options.httpsProxy) : undefined;
    this.requestHandler = new NodeHttpHandler({
      connectionTimeout: options.requestTimeoutMs,
      requestTimeout: options.requestTimeoutMs,
      ...(agent ? { httpsAgent: agent } : {}),
    });
    this.credentials = fromIni({ profile: options.profile });

    this.iam = new IAMClient(this.clientConfig(options.region));
    this.sts = new STSClient(this.clientConfig(options.region));
  }

  private clientConfig(region: string) {
    return {
      region,
      credentials: this.credentials,
      requestHandler: this.requestHandler,
      maxAttempts: 1,
    };
  }

  private lambda(region: string): LambdaClient {
    let client = this.lambdaClients.get(region);
    if (!client) {
      client = new LambdaClient(this.clientConfig(region));
      this.lambdaClients.set(region, client);
    }
    return client;
  }

  async getAccountId(signal?: AbortSignal): Promise<string> {
    const identity = await this.sts.send(new GetCallerIdentityCommand({}), { abortSignal: signal });
    if (!identity.Account) {
      throw new Error('GetCallerIdentity returned no account id');
    }
    return identity.Account;
  }

  async listPrincipals(type: PrincipalType, signal?: AbortSignal): Promise<RawPrincipalSummary[]> {
    const summaries: RawPrincipalSummary[] = [];
    const config = { client: this.iam };
    const sendOptions = { abortSignal: signal };

    if (type === 'user') {
      for await (const page of paginateListUsers(config, {}, sendOptions)) {
        for (const user of page.Users ?? []) {
          if (!user.Arn || !user.UserName) continue;
          summaries.push({
            arn: user.Arn,
            name: user.UserName,
            path: user.Path ?? '/',
            id: user.UserId,
            tags: tagsToRecord(user.Tags),
          });
        }
      }
    } else if (type === 'role') {
      for await (const page of paginateListRoles(config, {}, sendOptions)) {
        for (const role of page.Roles ?? []) {
          if (!role.Arn || !role.RoleName) continue;
          summaries.push({
            arn: role.Arn,
            name: role.RoleName,
            path: role.Path ?? '/',
            id: role.RoleId,
            tags: tagsToRecord(role.Tags),
            trustPolicy: role.AssumeRolePolicyDocument,
          });
        }
      }
    } else {
      for await (const page of paginateListGroups(config, {}, sendOptions)) {
        for (const group of page.Groups ?? []) {
          if (!group.Arn || !group.GroupName) continue;
          summaries.push({
            arn: group.Arn,
            name: group.GroupName,
            path: group.Path ?? '/',
            id: group.GroupId,
            tags: {},
          });
        }
      }
    }

    return summaries;
  }

  async getPermissionsBoundaryArn(
    type: PrincipalType,
    name: string,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    if (type === 'user') {
      const result = await this.iam.send(new GetUserCommand({ UserName: name }), { abortSignal: signal });
      return result.User?.PermissionsBoundary?.PermissionsBoundaryArn;
    }
    if (type === 'role') {
      const result = await this.iam.send(new GetRoleCommand({ RoleName: name }), { abortSignal: signal });
      return result.Role?.PermissionsBoundary?.PermissionsBoundaryArn;
    }
    return undefined;
  }

  async listInlinePolicies(type: PrincipalType, name: string, signal?: AbortSignal): Promise<RawInlinePolicy[]> {
    const config = { client: this.iam };
    const sendOptions = { abortSignal: signal };
    const names: string[] = [];

    if (type === 'user') {
      for await (const page of paginateListUserPolicies(config, { UserName: name }, sendOptions)) {
        names.push(...(page.PolicyNames ?? []));
      }
    } else if (type === 'role') {
      for await (const page of paginateListRolePolicies(config, { RoleName: name }, sendOptions)) {
        names.push(...(page.PolicyNames ?? []));
      }
    } else {
      for await (const page of paginateListGroupPolicies(config, { GroupName: name }, sendOptions)) {
        names.push(...(page.PolicyNames ?? []));
      }
    }

    const policies: RawInlinePolicy[] = [];
    for (const policyName of names) {
      let document: string | undefined;
      if (type === 'user') {
        const result = await this.iam.send(
          new GetUserPolicyCommand({ UserName: name, PolicyName: policyName }),
          sendOptions
        );
        document = result.PolicyDocument;
      } else if (type === 'role') {
        const result = await this.iam.send(
          new GetRolePolicyCommand({ RoleName: name, PolicyName: policyName }),
          sendOptions
        );
        document = result.PolicyDocument;
      } else {
        const result = await this.iam.send(
          new GetGroupPolicyCommand({ GroupName: name, PolicyName: policyName }),
          sendOptions
        );
        document = result.PolicyDocument;
      }
      if (document !== undefined) {
        policies.push({ name: policyName, document });
      }
    }
    return policies;
  }

  async listAttachedPolicyArns(type: PrincipalType, name: string, signal?: AbortSignal): Promise<string[]> {
    const config = { client: this.iam };
    const sendOptions = { abortSignal: signal };
    const arns: string[] = [];

    if (type === 'user') {
      for await (const page of paginateListAttachedUserPolicies(config, { UserName: name }, sendOptions)) {
        arns.push(...attachedArns(page.AttachedPolicies));
      }
    } else if (type === 'role') {
      for await (const page of paginateListAttachedRolePolicies(config, { RoleName: name }, sendOptions)) {
        arns.push(...attachedArns(page.AttachedPolicies));
      }
    } else {
      for await (const page of paginateListAttachedGroupPolicies(config, { GroupName: name }, sendOptions)) {
        arns.push(...attachedArns(page.AttachedPolicies));
      }
    }
    return arns;
  }

  async listGroupsForUser(userName: string, signal?: AbortSignal): Promise<string[]> {
    const arns: string[] = [];
    for await (const page of paginateListGroupsForUser(
      { client: this.iam },
      { UserName: userName },
      { abortSignal: signal }
    )) {
      for (const group of page.Groups ?? []) {
        if (group.Arn) arns.push(group.Arn);
      }
    }
    return arns;
  }

  async getManagedPolicy(arn: string, signal?: AbortSignal): Promise<RawManagedPolicy | undefined> {
    const sendOptions = { abortSignal: signal };
    try {
      const { Policy: policy } = await this.iam.send(new GetPolicyCommand({ PolicyArn: arn }), sendOptions);
      if (!policy?.DefaultVersionId) return undefined;

      const { PolicyVersion: version } = await this.iam.send(
        new GetPolicyVersionCommand({ PolicyArn: arn, VersionId: policy.DefaultVersionId }),
        sendOptions
      );
      const { Versions: versions } = await this.iam.send(
        new ListPolicyVersionsCommand({ PolicyArn: arn }),
        sendOptions
      );
      if (version?.Document === undefined) return undefined;

      return {
        arn,
        name: policy.PolicyName ?? arn.slice(arn.lastIndexOf('/') + 1),
        defaultVersionId: policy.DefaultVersionId,
        versionCount: versions?.length ?? 1,
        document: version.Document,
      };
    } catch (error) {
      if (error instanceof NoSuchEntityException) return undefined;
      throw error;
    }
  }

  async listInstanceProfiles(signal?: AbortSignal): Promise<InstanceProfileRecord[]> {
    const profiles: InstanceProfileRecord[] = [];
    for await (const page of paginateListInstanceProfiles({ client: this.iam }, {}, { abortSignal: signal })) {
      for (const profile of page.InstanceProfiles ?? []) {
        if (!profile.Arn || !profile.InstanceProfileName) continue;
        profiles.push({
          arn: profile.Arn,
          name: profile.InstanceProfileName,
          roleArns: (profile.Roles ?? []).flatMap(role => (role.Arn ? [role.Arn] : [])),
        });
      }
    }
    return profiles;
  }

  async listFunctions(region: string, signal?: AbortSignal): Promise<LambdaFunctionRecord[]> {
    const functions: LambdaFunctionRecord[] = [];
    for await (const page of paginateListFunctions({ client: this.lambda(region) }, {}, { abortSignal: signal })) {
      for (const fn of page.Functions ?? []) {
        if (!fn.FunctionArn || !fn.FunctionName || !fn.Role) continue;
        functions.push({ arn: fn.FunctionArn, name: fn.FunctionName, region, roleArn: fn.Role });
      }
    }
    return functions;
  }

  /**
   * Release the sockets held by the clients
   */
  destroy(): void {
    this.iam.destroy();
    this.sts.destroy();
    for (const client of this.lambdaClients.values()) {
      client.destroy();
    }
  }
}
