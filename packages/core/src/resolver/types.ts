/**
 * Resolver Types
 */

import type { ConditionBlock } from '../policy/types.js';
import type { Principal } from '../ingestion/types.js';

/**
 * A list of action or resource patterns. When negated the set matches
 * everything the patterns do not (NotAction / NotResource).
 */
export interface PatternSet {
  patterns: string[];
  negated: boolean;
}

/**
 * One statement's contribution to a principal's permissions
 */
export interface EffectiveGrant {
  allowed: boolean;
  actions: PatternSet;
  resources: PatternSet;
  conditions: ConditionBlock;
  /** Policy name or ARN plus statement index */
  origin: string;
}

/**
 * Resolved permissions of one principal. Plain data so it can be cached
 * and persisted.
 */
export interface EffectivePermissions {
  principalArn: string;
  /** Hash over every policy that went into the resolution */
  policyHash: string;
  /** Identity grants: inline, attached and inherited group policies */
  grants: EffectiveGrant[];
  /** Permissions boundary grants, null when no boundary is set */
  boundary: EffectiveGrant[] | null;
  /** Session policy grants, null outside an assumed-role session */
  session: EffectiveGrant[] | null;
  /** Policy variables describing the principal (aws:username, ...) */
  variables: Record<string, string>;
}

/**
 * Flattened (action, resource, allowed) view of a grant
 */
export interface GrantTuple {
  action: string;
  resource: string;
  allowed: boolean;
  notAction: boolean;
  notResource: boolean;
  conditional: boolean;
  fromBoundary: boolean;
  fromSession: boolean;
  origin: string;
}

/**
 * A principal paired with its resolved permissions
 */
export interface ResolvedPrincipal {
  principal: Principal;
  permissions: EffectivePermissions;
  isAdmin: boolean;
}

/**
 * Outcome of evaluating a resource policy (e.g. a role trust policy)
 */
export type ResourcePolicyDecision =
  | 'explicit-deny'
  | 'principal-match'
  | 'service-match'
  | 'account-match'
  | 'no-match';
