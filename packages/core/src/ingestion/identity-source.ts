/**
 * Identity Source
 *
 * Turns an IdentityApi into an AccountSnapshot. Independent collections
 * (users, roles, groups, instance profiles, functions per region) are
 * fetched in parallel through the worker pool, then every principal's
 * policies are fetched, then every referenced managed policy once.
 *
 * Authorization failures on a single principal skip that principal with a
 * PartialIngestionWarning. Anything else, including an authorization
 * failure on an account-wide listing, is fatal.
 */

import { AuthError } from '../errors/errors.js';
import { createPartialIngestionWarning, type PartialIngestionWarning } from '../errors/warnings.js';
import type { Logger } from '../logging/logger.js';
import { getPartition } from '../policy/arn.js';
import { parsePolicyDocument } from '../policy/policy-parser.js';
import type { ManagedPolicyRecord } from '../policy/types.js';
import { deepFreeze } from '../utils/freeze.js';
import { compareStrings } from '../utils/sort.js';
import { withRetry, type RetryConfig } from './aws-retry.js';
import {
  isAwsManagedPolicy,
  type IdentityApi,
  type RawInlinePolicy,
  type RawManagedPolicy,
  type RawPrincipalSummary,
} from './identity-api.js';
import type {
  IdentitySource,
  IngestionResult,
  IngestOptions,
  InstanceProfileRecord,
  LambdaFunctionRecord,
  Principal,
  PrincipalType,
} from './types.js';
import { WorkerPool } from './worker-pool.js';

export interface ApiIdentitySourceOptions {
  /** Shown in logs, e.g. "AWS profile 'dev'" */
  label: string;
  /** Regions to list Lambda functions in */
  lambdaRegions: readonly string[];
  retry?: Partial<Pick<RetryConfig, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterFactor'>> | undefined;
  /** Per-task timeout inside the worker pool */
  taskTimeoutMs?: number | undefined;
  /** Called by close() */
  dispose?: (() => void) | undefined;
}

interface FetchedPrincipal {
  type: PrincipalType;
  summary: RawPrincipalSummary;
  inline: RawInlinePolicy[];
  attachedArns: string[];
  boundaryArn?: string | undefined;
  groupArns: string[];
}

type FetchOutcome =
  | { ok: true; principal: FetchedPrincipal }
  | { ok: false; warning: PartialIngestionWarning };

type ManagedOutcome =
  | { ok: true; policy: RawManagedPolicy | undefined }
  | { ok: false; operation: string; reason: string };

const DEFAULT_CONCURRENCY = 4;

const LIST_OPERATION: Record<PrincipalType, string> = {
  user: 'iam:ListUsers',
  role: 'iam:ListRoles',
  group: 'iam:ListGroups',
};

function capitalize(type: PrincipalType): string {
  return type.charAt(0).toUpperCase() + type.slice(1);
}

export class ApiIdentitySource implements IdentitySource {
  constructor(
    private readonly api: IdentityApi,
    private readonly options: ApiIdentitySourceOptions
  ) {}

  describe(): string {
    return this.options.label;
  }

  close(): void {
    this.options.dispose?.();
  }

  async ingest(options: IngestOptions): Promise<IngestionResult> {
    const { logger, signal } = options;
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    const poolOptions = { concurrency, signal, timeoutMs: this.options.taskTimeoutMs };
    const startTime = Date.now();

    const call = <T>(operationName: string, operation: () => Promise<T>): Promise<T> =>
      withRetry(operation, operationName, { ...this.options.retry, logger, signal });

    const accountId = await call('sts:GetCallerIdentity', () => this.api.getAccountId(signal));
    logger.info(`Ingesting account ${accountId} from ${this.describe()}`);

    // ------------------------------------------------------------------
    // Account-wide collections
    // ------------------------------------------------------------------

    const summaries: Record<PrincipalType, RawPrincipalSummary[]> = { user: [], role: [], group: [] };
    let instanceProfiles: InstanceProfileRecord[] = [];
    const functionsByRegion = new Map<string, LambdaFunctionRecord[]>();

    const collections: Array<() => Promise<void>> = [
      ...(['group', 'user', 'role'] as const).map(type => async () => {
        summaries[type] = await call(LIST_OPERATION[type], () => this.api.listPrincipals(type, signal));
        logger.debug(`Listed ${summaries[type].length} ${type}(s)`);
      }),
      async () => {
        instanceProfiles = await call('iam:ListInstanceProfiles', () => this.api.listInstanceProfiles(signal));
      },
      ...this.options.lambdaRegions.map(region => async () => {
        functionsByRegion.set(
          region,
          await call(`lambda:ListFunctions ${region}`, () => this.api.listFunctions(region, signal))
        );
      }),
    ];
    await WorkerPool.run(collections, task => task(), { ...poolOptions, stage: 'listing identities' });

    // ------------------------------------------------------------------
    // Per-principal policies
    // ------------------------------------------------------------------

    const targets = (['group', 'user', 'role'] as const).flatMap(type =>
      summaries[type].map(summary => ({ type, summary }))
    );

    const fetched = await WorkerPool.run(
      targets,
      ({ type, summary }) => this.fetchPrincipal(type, summary, call, signal),
      { ...poolOptions, stage: 'fetching principal policies' }
    );

    const warnings: PartialIngestionWarning[] = [];
    const principals: FetchedPrincipal[] = [];
    for (const outcome of fetched) {
      if (outcome.ok) {
        principals.push(outcome.principal);
      } else {
        logger.warn(outcome.warning.message);
        warnings.push(outcome.warning);
      }
    }

    // ------------------------------------------------------------------
    // Managed policies, fetched once each
    // ------------------------------------------------------------------

    const policyArns = [
      ...new Set(principals.flatMap(p => [...p.attachedArns, ...(p.boundaryArn ? [p.boundaryArn] : [])])),
    ].sort(compareStrings);

    const managedOutcomes = await WorkerPool.run(
      policyArns,
      async (arn): Promise<ManagedOutcome> => {
        const operation = `iam:GetPolicyVersion ${arn}`;
        try {
          return { ok: true, policy: await call(operation, () => this.api.getManagedPolicy(arn, signal)) };
        } catch (error) {
          if (error instanceof AuthError) return { ok: false, operation, reason: error.reason };
          throw error;
        }
      },
      { ...poolOptions, stage: 'fetching managed policies' }
    );

    const managed = new Map<string, ManagedPolicyRecord>();
    const unavailable = new Map<string, { operation: string; reason: string }>();
    policyArns.forEach((arn, index) => {
      const outcome = managedOutcomes[index];
      if (!outcome) return;
      if (!outcome.ok) {
        unavailable.set(arn, outcome);
      } else if (outcome.policy === undefined) {
        unavailable.set(arn, { operation: `iam:GetPolicy ${arn}`, reason: 'policy not found' });
      } else {
        managed.set(arn, toManagedRecord(outcome.policy));
      }
    });

    // ------------------------------------------------------------------
    // Assembly
    // ------------------------------------------------------------------

    const profilesByRole = new Map<string, string[]>();
    for (const profile of instanceProfiles) {
      for (const roleArn of profile.roleArns) {
        profilesByRole.set(roleArn, [...(profilesByRole.get(roleArn) ?? []), profile.arn]);
      }
    }

    const assembled: Principal[] = [];
    for (const fetchedPrincipal of principals) {
      const missing = [...fetchedPrincipal.attachedArns, ...(fetchedPrincipal.boundaryArn ? [fetchedPrincipal.boundaryArn] : [])]
        .map(arn => unavailable.get(arn))
        .find(entry => entry !== undefined);
      if (missing) {
        const warning = createPartialIngestionWarning(fetchedPrincipal.summary.arn, missing.operation, missing.reason);
        logger.warn(warning.message);
        warnings.push(warning);
        continue;
      }
      assembled.push(assemblePrincipal(fetchedPrincipal, managed, profilesByRole));
    }
    assembled.sort((a, b) => compareStrings(a.arn, b.arn));

    const functions = [...functionsByRegion.values()].flat().sort((a, b) => compareStrings(a.arn, b.arn));
    instanceProfiles.sort((a, b) => compareStrings(a.arn, b.arn));
    warnings.sort((a, b) => compareStrings(a.principalArn, b.principalArn));

    const firstArn = assembled[0]?.arn;
    const result: IngestionResult = {
      account: deepFreeze({
        accountId,
        partition: firstArn ? getPartition(firstArn) : 'aws',
        principals: assembled,
        functions,
        instanceProfiles,
      }),
      warnings,
      stats: {
        users: assembled.filter(p => p.type === 'user').length,
        roles: assembled.filter(p => p.type === 'role').length,
        groups: assembled.filter(p => p.type === 'group').length,
        managedPolicies: managed.size,
        functions: functions.length,
        instanceProfiles: instanceProfiles.length,
        skippedPrincipals: warnings.length,
        durationMs: Date.now() - startTime,
      },
    };

    logIngestionSummary(logger, result);
    return result;
  }

  private async fetchPrincipal(
    type: PrincipalType,
    summary: RawPrincipalSummary,
    call: <T>(operationName: string, operation: () => Promise<T>) => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<FetchOutcome> {
    const kind = capitalize(type);
    try {
      const inline = await call(`iam:List${kind}Policies ${summary.name}`, () =>
        this.api.listInlinePolicies(type, summary.name, signal)
      );
      const attachedArns = await call(`iam:ListAttached${kind}Policies ${summary.name}`, () =>
        this.api.listAttachedPolicyArns(type, summary.name, signal)
      );
      const boundaryArn = type === 'group'
        ? undefined
        : await call(`iam:Get${kind} ${summary.name}`, () => this.api.getPermissionsBoundaryArn(type, summary.name, signal));
      const groupArns = type === 'user'
        ? await call(`iam:ListGroupsForUser ${summary.name}`, () => this.api.listGroupsForUser(summary.name, signal))
        : [];

      return { ok: true, principal: { type, summary, inline, attachedArns, boundaryArn, groupArns } };
    } catch (error) {
      if (error instanceof AuthError) {
        return { ok: false, warning: createPartialIngestionWarning(summary.arn, error.operation, error.reason) };
      }
      throw error;
    }
  }
}

function toManagedRecord(policy: RawManagedPolicy): ManagedPolicyRecord {
  return {
    arn: policy.arn,
    name: policy.name,
    customerManaged: !isAwsManagedPolicy(policy.arn),
    defaultVersionId: policy.defaultVersionId,
    versionCount: policy.versionCount,
    document: parsePolicyDocument(policy.document, policy.arn),
  };
}

function assemblePrincipal(
  fetched: FetchedPrincipal,
  managed: ReadonlyMap<string, ManagedPolicyRecord>,
  profilesByRole: ReadonlyMap<string, string[]>
): Principal {
  const { summary, type } = fetched;
  const lookup = (arn: string): ManagedPolicyRecord[] => {
    const record = managed.get(arn);
    return record ? [record] : [];
  };

  return {
    arn: summary.arn,
    type,
    name: summary.name,
    path: summary.path,
    id: summary.id,
    inlinePolicies: fetched.inline
      .map(policy => ({
        name: policy.name,
        document: parsePolicyDocument(policy.document, `${summary.arn}/inline/${policy.name}`),
      }))
      .sort((a, b) => compareStrings(a.name, b.name)),
    attachedPolicies: [...fetched.attachedArns].sort(compareStrings).flatMap(lookup),
    groupArns: [...fetched.groupArns].sort(compareStrings),
    permissionsBoundary: fetched.boundaryArn ? lookup(fetched.boundaryArn)[0] : undefined,
    trustPolicy:
      type === 'role' && summary.trustPolicy !== undefined
        ? parsePolicyDocument(summary.trustPolicy, `${summary.arn}/trust`, 'resource')
        : undefined,
    instanceProfileArns: [...(profilesByRole.get(summary.arn) ?? [])].sort(compareStrings),
    tags: summary.tags,
  };
}

function logIngestionSummary(logger: Logger, result: IngestionResult): void {
  const { stats } = result;
  logger.info(
    `Ingested ${stats.users} user(s), ${stats.roles} role(s), ${stats.groups} group(s), ` +
      `${stats.managedPolicies} managed policy(ies), ${stats.functions} function(s) in ${stats.durationMs}ms`
  );
  if (stats.skippedPrincipals > 0) {
    logger.warn(`${stats.skippedPrincipals} principal(s) skipped, see warnings`);
  }
}
