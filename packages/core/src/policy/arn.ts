/**
 * ARN helpers
 */

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  account: string;
  resource: string;
}

export function parseArn(arn: string): ParsedArn | null {
  const parts = arn.split(':');
  if (parts.length < 6 || parts[0] !== 'arn') return null;
  const [, partition = '', service = '', region = '', account = ''] = parts;
  return {
    partition,
    service,
    region,
    account,
    resource: parts.slice(5).join(':'),
  };
}

export function isArn(value: string): boolean {
  return parseArn(value) !== null;
}

export function getAccountId(arn: string): string {
  return parseArn(arn)?.account ?? '';
}

export function getPartition(arn: string): string {
  return parseArn(arn)?.partition ?? 'aws';
}

/**
 * Resource segment of an IAM ARN with the path removed:
 * arn:aws:iam::111122223333:role/ops/Deploy -> role/Deploy
 */
export function getSearchableName(arn: string): string {
  const resource = parseArn(arn)?.resource ?? arn;
  const slash = resource.indexOf('/');
  if (slash === -1) return resource;
  const type = resource.slice(0, slash);
  const name = resource.slice(resource.lastIndexOf('/') + 1);
  return `${type}/${name}`;
}

/**
 * Last path segment of an IAM resource ARN
 */
export function getResourceName(arn: string): string {
  const resource = parseArn(arn)?.resource ?? arn;
  return resource.slice(resource.lastIndexOf('/') + 1);
}

export function accountRootArn(accountId: string, partition: string = 'aws'): string {
  return `arn:${partition}:iam::${accountId}:root`;
}
