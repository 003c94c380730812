// Path: src/rds-iam/aws.ts
// AWS SDK backed credential resolver and token signer

import { defaultProvider } from '@aws-sdk/credential-provider-node';
import { Signer } from '@aws-sdk/rds-signer';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { createLogger } from '../lib/logger.js';
import { withAbort } from '../utils/cancel.js';
import type {
  CredentialResolver,
  RdsIamDependencies,
  SignTokenRequest,
  TokenSigner,
} from './types.js';

const log = createLogger({ module: 'rds-iam-aws' });

/**
 * Split `host:port` into its parts. The port is required for signing.
 */
export function splitEndpoint(endpoint: string): { hostname: string; port: number } {
  const colon = endpoint.lastIndexOf(':');
  const portText = colon === -1 ? '' : endpoint.slice(colon + 1);
  if (!/^\d+$/.test(portText)) {
    throw new Error('endpoint must include a port, e.g. mydb.abc123.eu-west-1.rds.amazonaws.com:5432');
  }
  return { hostname: endpoint.slice(0, colon), port: parseInt(portText, 10) };
}

/**
 * Credential resolver over the AWS SDK default Node provider chain
 * (environment, shared config/credentials files, SSO, web identity, ECS, EC2 metadata).
 * STS calls made by the chain (assume role, web identity) go to `region`.
 *
 * The provider is invoked once so that missing credentials fail here, not at signing.
 */
export const defaultCredentialResolver: CredentialResolver = {
  async resolve(region: string, signal?: AbortSignal): Promise<AwsCredentialIdentityProvider> {
    const provider = defaultProvider({ clientConfig: { region } });
    const identity = await withAbort(provider(), signal, 'resolve AWS credentials');
    log.debug({ region, expiration: identity.expiration?.toISOString() }, 'Resolved AWS credentials');
    return provider;
  },
};

/**
 * Token signer using @aws-sdk/rds-signer (SigV4 presigned `connect` action)
 */
export const rdsTokenSigner: TokenSigner = {
  async sign(request: SignTokenRequest, signal?: AbortSignal): Promise<string> {
    const { hostname, port } = splitEndpoint(request.endpoint);
    const signer = new Signer({
      hostname,
      port,
      region: request.region,
      username: request.dbUser,
      credentials: request.credentials,
    });
    return withAbort(signer.getAuthToken(), signal, 'sign RDS auth token');
  },
};

export const defaultDependencies: RdsIamDependencies = {
  credentialResolver: defaultCredentialResolver,
  tokenSigner: rdsTokenSigner,
};
