/**
 * Canonical hashing of policy inputs, used as the resolution cache key
 */

import * as crypto from 'node:crypto';

import type { Principal } from '../ingestion/types.js';
import { compareStrings } from '../utils/sort.js';

/**
 * JSON.stringify with object keys sorted, so equal values hash equally
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => compareStrings(a, b));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

export function sha256(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

/**
 * Hash over every policy that can affect the principal's permissions
 */
export function computePolicyHash(principal: Principal, groups: readonly Principal[]): string {
  const policyInput = (p: Principal) => ({
    arn: p.arn,
    inline: p.inlinePolicies.map(policy => ({ name: policy.name, document: policy.document })),
    attached: p.attachedPolicies.map(policy => ({ arn: policy.arn, document: policy.document })),
  });

  return sha256(
    stableStringify({
      principal: policyInput(principal),
      boundary: principal.permissionsBoundary
        ? { arn: principal.permissionsBoundary.arn, document: principal.permissionsBoundary.document }
        : null,
      groups: [...groups].sort((a, b) => compareStrings(a.arn, b.arn)).map(policyInput),
    })
  );
}
