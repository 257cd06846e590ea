/**
 * Resolution Cache
 *
 * Memoises resolved permissions by (principal ARN, policy hash). Entries
 * can be exported with a snapshot and seeded back on the next run, so an
 * unchanged principal is not resolved twice.
 */

import type { Principal } from '../ingestion/types.js';
import { computePolicyHash } from './policy-hash.js';
import { resolvePermissions } from './permission-resolver.js';
import type { EffectivePermissions } from './types.js';
import { compareStrings } from '../utils/sort.js';

export interface ResolutionCacheStats {
  hits: number;
  misses: number;
  size: number;
}

function cacheKey(principalArn: string, policyHash: string): string {
  return `${principalArn}#${policyHash}`;
}

export class ResolutionCache {
  private readonly entries = new Map<string, EffectivePermissions>();
  private hits = 0;
  private misses = 0;

  constructor(seed: Iterable<EffectivePermissions> = []) {
    for (const permissions of seed) {
      this.set(permissions);
    }
  }

  get(principalArn: string, policyHash: string): EffectivePermissions | undefined {
    return this.entries.get(cacheKey(principalArn, policyHash));
  }

  set(permissions: EffectivePermissions): void {
    this.entries.set(cacheKey(permissions.principalArn, permissions.policyHash), permissions);
  }

  /**
   * Return cached permissions when the policy inputs are unchanged,
   * otherwise resolve and remember them
   */
  resolve(principal: Principal, groups: readonly Principal[] = []): EffectivePermissions {
    const policyHash = computePolicyHash(principal, groups);
    const cached = this.get(principal.arn, policyHash);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const permissions = resolvePermissions(principal, groups);
    this.set(permissions);
    return permissions;
  }

  /**
   * Keep only entries for the given keys; stale resolutions are dropped
   * before the cache is persisted
   */
  retain(keep: Iterable<EffectivePermissions>): void {
    const wanted = new Set<string>();
    for (const permissions of keep) {
      wanted.add(cacheKey(permissions.principalArn, permissions.policyHash));
    }
    for (const key of [...this.entries.keys()]) {
      if (!wanted.has(key)) this.entries.delete(key);
    }
  }

  values(): EffectivePermissions[] {
    return [...this.entries.values()].sort((a, b) => compareStrings(a.principalArn, b.principalArn));
  }

  getStats(): ResolutionCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}

/**
 * Resolve through the cache when one is given
 */
export function resolveWithCache(
  cache: ResolutionCache | undefined,
  principal: Principal,
  groups: readonly Principal[] = []
): EffectivePermissions {
  return cache ? cache.resolve(principal, groups) : resolvePermissions(principal, groups);
}
