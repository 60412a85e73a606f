/**
 * Secrets Manager Service
 *
 * Nine operations over AWS Secrets Manager. Each one obtains a client from
 * the ClientCache for the caller's (roleArn, region, profile), issues one
 * remote call (list pages) and translates the response to snake_case.
 *
 * Rejections from the remote store, and role-assumption failures raised while
 * building the client, come back as an OperationFailure. Anything else (for
 * example a profile missing from ~/.aws, discovered when the client first
 * signs a request) is thrown.
 */

import type { ListSecretsCommandInput, Tag } from '@aws-sdk/client-secrets-manager';
import type { ClientCache } from '../core/client-cache.js';
import { toRemoteCallError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  SECRETS_MANAGER_SERVICE,
  type CallTarget,
  type CreateSecretData,
  type DeleteSecretData,
  type DescribeSecretData,
  type GetSecretValueData,
  type ListSecretsData,
  type OperationFailure,
  type OperationResult,
  type RestoreSecretData,
  type SecretListEntry,
  type SecretTags,
  type SecretsStoreClient,
  type TagSecretData,
  type UntagSecretData,
  type UpdateSecretData,
} from './types.js';

const logger = createLogger('SecretsManagerService');

/** Upper bound the service accepts for MaxResults on one ListSecrets page. */
export const LIST_PAGE_SIZE = 100;

export const DEFAULT_LIST_MAX_RESULTS = 500;
export const DEFAULT_RECOVERY_WINDOW_DAYS = 30;

export interface CreateSecretParams extends CallTarget {
  name: string;
  secretValue: string;
  description?: string;
  tags?: SecretTags;
}

export interface GetSecretValueParams extends CallTarget {
  secretId: string;
  versionId?: string;
  versionStage?: string;
}

export interface UpdateSecretParams extends CallTarget {
  secretId: string;
  secretValue: string;
  description?: string;
}

export interface DeleteSecretParams extends CallTarget {
  secretId: string;
  recoveryWindowInDays?: number;
  forceDeleteWithoutRecovery?: boolean;
}

export interface ListSecretsParams extends CallTarget {
  namePrefix?: string;
  maxResults?: number;
  includePlannedDeletion?: boolean;
}

export interface SecretIdParams extends CallTarget {
  secretId: string;
}

export interface TagSecretParams extends CallTarget {
  secretId: string;
  tags: SecretTags;
}

export interface UntagSecretParams extends CallTarget {
  secretId: string;
  tagKeys: string[];
}

type FailureIdentifier = Pick<OperationFailure, 'secret_id' | 'secret_name' | 'name_prefix'>;

function toIsoString(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

function toTagList(tags: SecretTags): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

function fromTagList(tags: Tag[] | undefined): SecretTags {
  const result: SecretTags = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      result[tag.Key] = tag.Value ?? '';
    }
  }
  return result;
}

/**
 * Parse a secret string as JSON, falling back to the raw string.
 */
export function parseSecretString(secretString: string | undefined): {
  value: unknown;
  isJson: boolean;
} {
  if (!secretString) {
    return { value: secretString ?? null, isJson: false };
  }

  try {
    return { value: JSON.parse(secretString), isJson: true };
  } catch {
    return { value: secretString, isJson: false };
  }
}

export class SecretsManagerService {
  constructor(
    private readonly clients: ClientCache<SecretsStoreClient>,
    private readonly defaultRegion: string
  ) {}

  async createSecret(params: CreateSecretParams): Promise<OperationResult<CreateSecretData>> {
    const { name, secretValue, description, tags } = params;

    return this.execute('createSecret', params, { secret_name: name }, async (client) => {
      const response = await client.createSecret({
        Name: name,
        SecretString: secretValue,
        ...(description ? { Description: description } : {}),
        ...(tags && Object.keys(tags).length > 0 ? { Tags: toTagList(tags) } : {}),
      });

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        version_id: response.VersionId ?? null,
        region: this.regionOf(params),
      };
    });
  }

  async getSecretValue(params: GetSecretValueParams): Promise<OperationResult<GetSecretValueData>> {
    const { secretId, versionId, versionStage } = params;

    return this.execute('getSecretValue', params, { secret_id: secretId }, async (client) => {
      const response = await client.getSecretValue({
        SecretId: secretId,
        ...(versionId ? { VersionId: versionId } : {}),
        ...(versionStage ? { VersionStage: versionStage } : {}),
      });

      const parsed = parseSecretString(response.SecretString);

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        secret_value: parsed.value,
        is_json: parsed.isJson,
        version_id: response.VersionId ?? null,
        version_stages: response.VersionStages ?? [],
        created_date: toIsoString(response.CreatedDate),
      };
    });
  }

  async updateSecret(params: UpdateSecretParams): Promise<OperationResult<UpdateSecretData>> {
    const { secretId, secretValue, description } = params;

    return this.execute('updateSecret', params, { secret_id: secretId }, async (client) => {
      const response = await client.updateSecret({
        SecretId: secretId,
        SecretString: secretValue,
        ...(description ? { Description: description } : {}),
      });

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        version_id: response.VersionId ?? null,
        region: this.regionOf(params),
      };
    });
  }

  /**
   * Schedule deletion, or delete immediately when forced. The service
   * rejects requests that carry both a recovery window and the force flag,
   * so exactly one is sent.
   */
  async deleteSecret(params: DeleteSecretParams): Promise<OperationResult<DeleteSecretData>> {
    const {
      secretId,
      recoveryWindowInDays = DEFAULT_RECOVERY_WINDOW_DAYS,
      forceDeleteWithoutRecovery = false,
    } = params;

    return this.execute('deleteSecret', params, { secret_id: secretId }, async (client) => {
      const response = await client.deleteSecret({
        SecretId: secretId,
        ...(forceDeleteWithoutRecovery
          ? { ForceDeleteWithoutRecovery: true }
          : { RecoveryWindowInDays: recoveryWindowInDays }),
      });

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        deletion_date: toIsoString(response.DeletionDate),
        force_deleted: forceDeleteWithoutRecovery,
      };
    });
  }

  /**
   * List secrets, following NextToken until the service stops returning one
   * or at least `maxResults` entries have been collected. The last page may
   * overshoot; the result is cut to `maxResults`.
   */
  async listSecrets(params: ListSecretsParams = {}): Promise<OperationResult<ListSecretsData>> {
    const {
      namePrefix,
      maxResults = DEFAULT_LIST_MAX_RESULTS,
      includePlannedDeletion = false,
    } = params;
    const identifier: FailureIdentifier = namePrefix ? { name_prefix: namePrefix } : {};

    return this.execute('listSecrets', params, identifier, async (client) => {
      const request: ListSecretsCommandInput = {
        MaxResults: Math.min(maxResults, LIST_PAGE_SIZE),
        ...(namePrefix ? { Filters: [{ Key: 'name', Values: [namePrefix] }] } : {}),
        ...(includePlannedDeletion ? { IncludePlannedDeletion: true } : {}),
      };

      const secrets: SecretListEntry[] = [];
      let nextToken: string | undefined;

      do {
        const response = await client.listSecrets(
          nextToken ? { ...request, NextToken: nextToken } : request
        );

        for (const entry of response.SecretList ?? []) {
          secrets.push({
            name: entry.Name ?? null,
            arn: entry.ARN ?? null,
            description: entry.Description ?? null,
            last_changed_date: toIsoString(entry.LastChangedDate),
            last_accessed_date: toIsoString(entry.LastAccessedDate),
            tags: fromTagList(entry.Tags),
            deletion_date: toIsoString(entry.DeletedDate),
          });
        }

        nextToken = response.NextToken;
      } while (nextToken && secrets.length < maxResults);

      const page = secrets.slice(0, maxResults);
      logger.debug(`Listed ${page.length} secret(s) in ${this.regionOf(params)}`);

      return {
        secrets: page,
        count: page.length,
        region: this.regionOf(params),
      };
    });
  }

  async describeSecret(params: SecretIdParams): Promise<OperationResult<DescribeSecretData>> {
    const { secretId } = params;

    return this.execute('describeSecret', params, { secret_id: secretId }, async (client) => {
      const response = await client.describeSecret({ SecretId: secretId });

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        description: response.Description ?? null,
        kms_key_id: response.KmsKeyId ?? null,
        rotation_enabled: response.RotationEnabled ?? false,
        rotation_lambda_arn: response.RotationLambdaARN ?? null,
        rotation_rules: response.RotationRules ?? null,
        last_rotated_date: toIsoString(response.LastRotatedDate),
        last_changed_date: toIsoString(response.LastChangedDate),
        last_accessed_date: toIsoString(response.LastAccessedDate),
        deleted_date: toIsoString(response.DeletedDate),
        tags: fromTagList(response.Tags),
        version_ids_to_stages: response.VersionIdsToStages ?? {},
      };
    });
  }

  async restoreSecret(params: SecretIdParams): Promise<OperationResult<RestoreSecretData>> {
    const { secretId } = params;

    return this.execute('restoreSecret', params, { secret_id: secretId }, async (client) => {
      const response = await client.restoreSecret({ SecretId: secretId });

      return {
        secret_name: response.Name ?? null,
        secret_arn: response.ARN ?? null,
        region: this.regionOf(params),
      };
    });
  }

  async tagSecret(params: TagSecretParams): Promise<OperationResult<TagSecretData>> {
    const { secretId, tags } = params;

    return this.execute('tagSecret', params, { secret_id: secretId }, async (client) => {
      await client.tagResource({ SecretId: secretId, Tags: toTagList(tags) });
      return { secret_id: secretId, tags_added: tags };
    });
  }

  async untagSecret(params: UntagSecretParams): Promise<OperationResult<UntagSecretData>> {
    const { secretId, tagKeys } = params;

    return this.execute('untagSecret', params, { secret_id: secretId }, async (client) => {
      await client.untagResource({ SecretId: secretId, TagKeys: tagKeys });
      return { secret_id: secretId, tags_removed: tagKeys };
    });
  }

  private regionOf(target: CallTarget): string {
    return target.region || this.defaultRegion;
  }

  private async execute<T extends object>(
    operation: string,
    target: CallTarget,
    identifier: FailureIdentifier,
    call: (client: SecretsStoreClient) => Promise<T>
  ): Promise<OperationResult<T>> {
    try {
      const client = await this.clients.getClient(
        SECRETS_MANAGER_SERVICE,
        target.roleArn,
        target.region,
        target.profile
      );
      const data = await call(client);
      return { success: true as const, ...data };
    } catch (error) {
      const remote = toRemoteCallError(error);
      if (!remote) {
        throw error;
      }

      logger.warn(`${operation} rejected: ${remote.code}`);
      return {
        success: false,
        error: remote.message,
        error_code: remote.code,
        ...identifier,
      };
    }
  }
}
