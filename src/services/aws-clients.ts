import { SecretsManager } from '@aws-sdk/client-secrets-manager';
import type { ClientFactory } from '../core/client-cache.js';
import { ConfigurationError } from '../utils/errors.js';
import { SECRETS_MANAGER_SERVICE, type SecretsStoreClient } from './types.js';

/**
 * Default ClientFactory for the ClientCache.
 *
 * Only Secrets Manager is wired; the cache key carries the service name so
 * other services can be added here without touching the cache.
 */
export const createServiceClient: ClientFactory<SecretsStoreClient> = (service, config) => {
  if (service !== SECRETS_MANAGER_SERVICE) {
    throw new ConfigurationError(`Unsupported AWS service: ${service}`, { service });
  }

  return new SecretsManager({
    region: config.region,
    ...(config.credentials && { credentials: config.credentials }),
  });
};
