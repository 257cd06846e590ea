/**
 * Built-in rule catalog
 */

import type { EscalationRule } from '../types.js';
import { IAM_POLICY_RULES } from './iam-policy-rules.js';
import { IAM_PRINCIPAL_RULES } from './iam-principal-rules.js';
import { SERVICE_ROLE_RULES } from './service-role-rules.js';

export * from './iam-policy-rules.js';
export * from './iam-principal-rules.js';
export * from './service-role-rules.js';

export const BUILTIN_RULES: readonly EscalationRule[] = [
  ...IAM_PRINCIPAL_RULES,
  ...IAM_POLICY_RULES,
  ...SERVICE_ROLE_RULES,
];
