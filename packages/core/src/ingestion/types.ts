/**
 * Ingestion Types
 *
 * Typed records produced by an IdentitySource. Records are frozen once an
 * account snapshot is assembled.
 */

import type { PartialIngestionWarning } from '../errors/warnings.js';
import type { Logger } from '../logging/logger.js';
import type { InlinePolicyRecord, ManagedPolicyRecord, PolicyDocument } from '../policy/types.js';

export type PrincipalType = 'user' | 'role' | 'group';

/**
 * An identity with every policy that applies to it
 */
export interface Principal {
  arn: string;
  type: PrincipalType;
  name: string;
  /** IAM path, e.g. "/" or "/ops/" */
  path: string;
  /** Stable provider-side identifier (AIDA..., AROA..., AGPA...) */
  id?: string | undefined;
  inlinePolicies: InlinePolicyRecord[];
  attachedPolicies: ManagedPolicyRecord[];
  /** Groups a user belongs to */
  groupArns: string[];
  permissionsBoundary?: ManagedPolicyRecord | undefined;
  /** Role trust policy */
  trustPolicy?: PolicyDocument | undefined;
  /** Instance profiles holding this role */
  instanceProfileArns: string[];
  tags: Record<string, string>;
}

export interface LambdaFunctionRecord {
  arn: string;
  name: string;
  region: string;
  /** Execution role */
  roleArn: string;
}

export interface InstanceProfileRecord {
  arn: string;
  name: string;
  roleArns: string[];
}

/**
 * Everything ingested for one account
 */
export interface AccountSnapshot {
  accountId: string;
  partition: string;
  principals: Principal[];
  functions: LambdaFunctionRecord[];
  instanceProfiles: InstanceProfileRecord[];
}

export interface IngestionStats {
  users: number;
  roles: number;
  groups: number;
  managedPolicies: number;
  functions: number;
  instanceProfiles: number;
  skippedPrincipals: number;
  durationMs: number;
}

export interface IngestionResult {
  account: AccountSnapshot;
  warnings: PartialIngestionWarning[];
  stats: IngestionStats;
}

export interface IngestOptions {
  logger: Logger;
  signal?: AbortSignal | undefined;
  /** Maximum number of provider calls in flight */
  concurrency?: number | undefined;
}

/**
 * Where identity and policy data comes from: the live provider API or an
 * offline export.
 */
export interface IdentitySource {
  /** Human readable description for logs */
  describe(): string;
  ingest(options: IngestOptions): Promise<IngestionResult>;
  /** Release connections; called once the source is no longer needed */
  close?(): void;
}
