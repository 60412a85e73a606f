export {
  SecretsManagerService,
  parseSecretString,
  LIST_PAGE_SIZE,
  DEFAULT_LIST_MAX_RESULTS,
  DEFAULT_RECOVERY_WINDOW_DAYS,
  type CreateSecretParams,
  type GetSecretValueParams,
  type UpdateSecretParams,
  type DeleteSecretParams,
  type ListSecretsParams,
  type SecretIdParams,
  type TagSecretParams,
  type UntagSecretParams,
} from './secrets-manager.js';

export { createServiceClient } from './aws-clients.js';

export * from './types.js';
