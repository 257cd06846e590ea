/**
 * Identity source factories
 */

import type { IamGraphConfig } from '../config/config.js';
import { AuthorizationDetailsApi, loadAuthorizationDetails } from './authorization-details.js';
import { AwsIdentityApi } from './aws-identity-api.js';
import { ApiIdentitySource } from './identity-source.js';

/**
 * Live source: the AWS account behind the configured profile
 */
export function createAwsIdentitySource(config: IamGraphConfig): ApiIdentitySource {
  const api = new AwsIdentityApi({
    profile: config.profile,
    region: config.region,
    requestTimeoutMs: config.requestTimeoutMs,
    httpsProxy: config.httpsProxy,
  });

  return new ApiIdentitySource(api, {
    label: `AWS profile '${config.profile}'`,
    lambdaRegions: config.lambdaRegions,
    retry: { maxRetries: config.maxRetries },
    taskTimeoutMs: config.requestTimeoutMs * (config.maxRetries + 1) * 4,
    dispose: () => api.destroy(),
  });
}

/**
 * Offline source: an authorization-details export on disk
 */
export async function createFileIdentitySource(filePath: string): Promise<ApiIdentitySource> {
  const api = new AuthorizationDetailsApi(await loadAuthorizationDetails(filePath));
  return new ApiIdentitySource(api, {
    label: `file ${filePath}`,
    lambdaRegions: api.functionRegions(),
    retry: { maxRetries: 0 },
  });
}
