/**
 * Secrets Manager facade types
 *
 * `SecretsStoreClient` is the slice of the SDK's aggregated `SecretsManager`
 * client the facade calls. The real client satisfies it structurally; tests
 * hand in `vi.fn()` implementations.
 */

import type {
  CreateSecretCommandInput,
  CreateSecretCommandOutput,
  DeleteSecretCommandInput,
  DeleteSecretCommandOutput,
  DescribeSecretCommandInput,
  DescribeSecretCommandOutput,
  GetSecretValueCommandInput,
  GetSecretValueCommandOutput,
  ListSecretsCommandInput,
  ListSecretsCommandOutput,
  RestoreSecretCommandInput,
  RestoreSecretCommandOutput,
  RotationRulesType,
  TagResourceCommandInput,
  TagResourceCommandOutput,
  UntagResourceCommandInput,
  UntagResourceCommandOutput,
  UpdateSecretCommandInput,
  UpdateSecretCommandOutput,
} from '@aws-sdk/client-secrets-manager';

export const SECRETS_MANAGER_SERVICE = 'secretsmanager';

export interface SecretsStoreClient {
  createSecret(input: CreateSecretCommandInput): Promise<CreateSecretCommandOutput>;
  getSecretValue(input: GetSecretValueCommandInput): Promise<GetSecretValueCommandOutput>;
  updateSecret(input: UpdateSecretCommandInput): Promise<UpdateSecretCommandOutput>;
  deleteSecret(input: DeleteSecretCommandInput): Promise<DeleteSecretCommandOutput>;
  listSecrets(input: ListSecretsCommandInput): Promise<ListSecretsCommandOutput>;
  describeSecret(input: DescribeSecretCommandInput): Promise<DescribeSecretCommandOutput>;
  restoreSecret(input: RestoreSecretCommandInput): Promise<RestoreSecretCommandOutput>;
  tagResource(input: TagResourceCommandInput): Promise<TagResourceCommandOutput>;
  untagResource(input: UntagResourceCommandInput): Promise<UntagResourceCommandOutput>;
}

/**
 * Per-call identity selectors. Every facade operation accepts these.
 */
export interface CallTarget {
  roleArn?: string;
  region?: string;
  profile?: string;
}

export type SecretTags = Record<string, string>;

// ============================================================================
// Results
// ============================================================================

/**
 * Returned instead of throwing when the remote store (or STS, while building
 * the client) rejects a call. Exactly one identifier field is set, matching
 * the operation.
 */
export interface OperationFailure {
  success: false;
  error: string;
  error_code: string;
  secret_id?: string;
  secret_name?: string;
  name_prefix?: string;
}

export type OperationResult<T> = ({ success: true } & T) | OperationFailure;

export interface CreateSecretData {
  secret_name: string | null;
  secret_arn: string | null;
  version_id: string | null;
  region: string;
}

export interface GetSecretValueData {
  secret_name: string | null;
  secret_arn: string | null;
  secret_value: unknown;
  is_json: boolean;
  version_id: string | null;
  version_stages: string[];
  created_date: string | null;
}

export type UpdateSecretData = CreateSecretData;

export interface DeleteSecretData {
  secret_name: string | null;
  secret_arn: string | null;
  deletion_date: string | null;
  force_deleted: boolean;
}

export interface SecretListEntry {
  name: string | null;
  arn: string | null;
  description: string | null;
  last_changed_date: string | null;
  last_accessed_date: string | null;
  tags: SecretTags;
  deletion_date: string | null;
}

export interface ListSecretsData {
  secrets: SecretListEntry[];
  count: number;
  region: string;
}

export interface DescribeSecretData {
  secret_name: string | null;
  secret_arn: string | null;
  description: string | null;
  kms_key_id: string | null;
  rotation_enabled: boolean;
  rotation_lambda_arn: string | null;
  rotation_rules: RotationRulesType | null;
  last_rotated_date: string | null;
  last_changed_date: string | null;
  last_accessed_date: string | null;
  deleted_date: string | null;
  tags: SecretTags;
  version_ids_to_stages: Record<string, string[]>;
}

export interface RestoreSecretData {
  secret_name: string | null;
  secret_arn: string | null;
  region: string;
}

export interface TagSecretData {
  secret_id: string;
  tags_added: SecretTags;
}

export interface UntagSecretData {
  secret_id: string;
  tags_removed: string[];
}
