/**
 * Policy Types
 *
 * Normalised form of IAM policy documents. Every list-valued field is an
 * array after parsing, whatever shape the source document used.
 */

export type PolicyEffect = 'Allow' | 'Deny';

/**
 * Condition block: operator -> condition key -> values
 */
export type ConditionBlock = Record<string, Record<string, string[]>>;

/**
 * Principal element of a resource policy (trust policies included)
 */
export interface PolicyPrincipal {
  /** True when the element is the bare wildcard "*" */
  wildcard: boolean;
  aws: string[];
  service: string[];
  federated: string[];
  canonicalUser: string[];
}

export interface PolicyStatement {
  sid?: string | undefined;
  effect: PolicyEffect;
  action?: string[] | undefined;
  notAction?: string[] | undefined;
  resource?: string[] | undefined;
  notResource?: string[] | undefined;
  principal?: PolicyPrincipal | undefined;
  notPrincipal?: PolicyPrincipal | undefined;
  condition: ConditionBlock;
}

export interface PolicyDocument {
  version: string;
  statements: PolicyStatement[];
}

/**
 * Whether the document is attached to an identity or to a resource
 */
export type PolicyKind = 'identity' | 'resource';

/**
 * An inline policy embedded in a user, role or group
 */
export interface InlinePolicyRecord {
  name: string;
  document: PolicyDocument;
}

/**
 * A managed policy (AWS or customer managed) with its default version
 */
export interface ManagedPolicyRecord {
  arn: string;
  name: string;
  /** True for customer managed policies */
  customerManaged: boolean;
  defaultVersionId: string;
  versionCount: number;
  document: PolicyDocument;
}

/**
 * Request context used to evaluate conditions and policy variables
 */
export type RequestContext = Record<string, string | string[] | undefined>;
