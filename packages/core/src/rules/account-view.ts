/**
 * Builds the AccountView the rules consult
 */

import type { AccountSnapshot, LambdaFunctionRecord } from '../ingestion/types.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import type { AccountView } from './types.js';

export function createAccountView(
  account: Pick<AccountSnapshot, 'accountId' | 'partition' | 'functions' | 'instanceProfiles'>,
  principals: readonly ResolvedPrincipal[]
): AccountView {
  const byArn = new Map(principals.map(resolved => [resolved.principal.arn, resolved]));

  const functionsByRole = new Map<string, LambdaFunctionRecord[]>();
  for (const fn of account.functions) {
    functionsByRole.set(fn.roleArn, [...(functionsByRole.get(fn.roleArn) ?? []), fn]);
  }

  return {
    accountId: account.accountId,
    partition: account.partition,
    getPrincipal: arn => byArn.get(arn),
    groupsOf: resolved =>
      resolved.principal.groupArns.flatMap(arn => {
        const group = byArn.get(arn);
        return group ? [group] : [];
      }),
    functionsFor: roleArn => functionsByRole.get(roleArn) ?? [],
    functions: account.functions,
    instanceProfiles: account.instanceProfiles,
  };
}
