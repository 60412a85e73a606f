/**
 * Secret tool handlers
 *
 * Parameter defaults, result mapping and error masking, with CoreContext
 * built by the orchestrator around a fake Secrets Manager client.
 */

import { describe, it, expect, vi } from 'vitest';
import { ResourceNotFoundException } from '@aws-sdk/client-secrets-manager';
import { ConfigManager } from '../../../../src/config/manager.js';
import { InMemoryAuditStorage } from '../../../../src/core/audit-service.js';
import type { AssumeRoleFn } from '../../../../src/core/credential-resolver.js';
import type { AuditEntry, CoreContext } from '../../../../src/core/types.js';
import { ConfigOrchestrator } from '../../../../src/mcp/orchestrator.js';
import { toToolResult } from '../../../../src/mcp/server.js';
import {
  createClearCredentialCacheTool,
  createDeleteSecretTool,
  createGetSecretValueTool,
  createListAccountsTool,
  createListSecretsTool,
  createTagSecretTool,
  createUpdateSecretTool,
  getAllToolFactories,
} from '../../../../src/mcp/tools/index.js';
import { SERVER_ERROR_MESSAGE } from '../../../../src/mcp/utils/error-helpers.js';
import { TEST_ROLE_ARN, createFakeSecretsClient, stsResponse } from '../../../helpers/fakes.js';

async function setup(env: NodeJS.ProcessEnv = {}) {
  const client = createFakeSecretsClient();
  const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
  const configManager = new ConfigManager({ env, secretProviders: [] });
  await configManager.load();

  const context = new ConfigOrchestrator({
    configManager,
    assumeRole,
    clientFactory: () => client,
  }).buildCoreContext();

  return { context, client, assumeRole };
}

function auditEntries(context: CoreContext): AuditEntry[] {
  const storage = context.auditService._getStorage();
  return storage instanceof InMemoryAuditStorage ? storage.getEntries() : [];
}

describe('secret tools', () => {
  it('should register every tool in order', async () => {
    const { context } = await setup();

    expect(getAllToolFactories().map((factory) => factory(context).name)).toEqual([
      'list_accounts',
      'create_secret',
      'get_secret_value',
      'update_secret',
      'delete_secret',
      'list_secrets',
      'describe_secret',
      'restore_secret',
      'tag_secret',
      'untag_secret',
      'clear_credential_cache',
    ]);
  });

  describe('list_accounts', () => {
    it('should report configured accounts, profiles and the default region', async () => {
      const { context } = await setup({
        AWS_REGION: 'eu-west-1',
        ACCOUNT_PRODUCTION_ROLE_ARN: 'arn:aws:iam::111111111111:role/SecretsManagerAccess',
        ACCOUNT_DEV_PROFILE: 'dev-profile',
      });

      const result = await createListAccountsTool(context).handler({}, {});

      expect(result).toEqual({
        status: 'success',
        data: {
          success: true,
          accounts: { production: 'arn:aws:iam::111111111111:role/SecretsManagerAccess' },
          profiles: { dev: 'dev-profile' },
          accounts_count: 1,
          profiles_count: 1,
          default_region: 'eu-west-1',
        },
      });
    });

    it('should echo an explicit region', async () => {
      const { context } = await setup();

      const result = await createListAccountsTool(context).handler({ region: 'ap-south-1' }, {});

      expect(result).toMatchObject({ data: { default_region: 'ap-south-1', accounts_count: 0 } });
    });
  });

  describe('get_secret_value', () => {
    it('should return the facade result as data', async () => {
      const { context, client } = await setup();
      client.getSecretValue.mockResolvedValue({
        $metadata: {},
        Name: 'app/db',
        SecretString: '{"password":"test-secret"}',
      });

      const result = await createGetSecretValueTool(context).handler({ secret_id: 'app/db' }, {});

      expect(result).toMatchObject({
        status: 'success',
        data: { success: true, secret_value: { password: 'test-secret' }, is_json: true },
      });
    });

    it('should assume the requested role', async () => {
      const { context, client, assumeRole } = await setup();
      client.getSecretValue.mockResolvedValue({ $metadata: {}, SecretString: 'x' });

      await createGetSecretValueTool(context).handler(
        { secret_id: 'app/db', role_arn: TEST_ROLE_ARN },
        {}
      );

      expect(assumeRole).toHaveBeenCalledWith(expect.objectContaining({ RoleArn: TEST_ROLE_ARN }));
    });

    it('should map a remote rejection to a failure carrying the secret id', async () => {
      const { context, client } = await setup();
      client.getSecretValue.mockRejectedValue(
        new ResourceNotFoundException({ $metadata: {}, message: 'Secret not found' })
      );

      const result = await createGetSecretValueTool(context).handler({ secret_id: 'missing' }, {});

      expect(result).toEqual({
        status: 'failure',
        code: 'ResourceNotFoundException',
        message: 'Secret not found',
        details: { secret_id: 'missing' },
      });
      expect(toToolResult(result)).toEqual({
        content: [
          {
            type: 'text',
            text: JSON.stringify(
              {
                success: false,
                error: 'Secret not found',
                error_code: 'ResourceNotFoundException',
                secret_id: 'missing',
              },
              null,
              2
            ),
          },
        ],
        isError: true,
      });
    });

    it('should reject parameters that fail validation', async () => {
      const { context } = await setup();

      await expect(createGetSecretValueTool(context).handler({}, {})).rejects.toThrow();
    });
  });

  describe('unexpected faults', () => {
    it('should mask the error and audit redacted parameters', async () => {
      const { context, client } = await setup({ AUDIT_ENABLED: 'true' });
      client.updateSecret.mockRejectedValue(new Error('socket hang up'));

      const result = await createUpdateSecretTool(context).handler(
        { secret_id: 'app/db', secret_value: 'test-secret' },
        {}
      );

      expect(result).toEqual({
        status: 'failure',
        code: 'SERVER_ERROR',
        message: SERVER_ERROR_MESSAGE,
      });

      const entry = auditEntries(context).find((e) => e.source === 'mcp:tool:update_secret');
      expect(entry).toMatchObject({
        action: 'tool_execution_error',
        success: false,
        error: 'socket hang up',
        metadata: {
          params: { secret_id: 'app/db', secret_value: '[REDACTED]' },
          errorType: 'Error',
          authenticated: false,
        },
      });
    });

    it('should serialize SERVER_ERROR without details', () => {
      const result = toToolResult({
        status: 'failure',
        code: 'SERVER_ERROR',
        message: SERVER_ERROR_MESSAGE,
      });

      expect(JSON.parse(result.content[0].text)).toEqual({
        success: false,
        error: SERVER_ERROR_MESSAGE,
        error_code: 'SERVER_ERROR',
      });
    });
  });

  describe('parameter defaults', () => {
    it('delete_secret should schedule a 30-day recovery window', async () => {
      const { context, client } = await setup();
      client.deleteSecret.mockResolvedValue({ $metadata: {}, Name: 'app/db' });

      await createDeleteSecretTool(context).handler({ secret_id: 'app/db' }, {});

      expect(client.deleteSecret).toHaveBeenCalledWith({
        SecretId: 'app/db',
        RecoveryWindowInDays: 30,
      });
    });

    it('delete_secret should refuse a recovery window under 7 days', async () => {
      const { context, client } = await setup();

      await expect(
        createDeleteSecretTool(context).handler(
          { secret_id: 'app/db', recovery_window_in_days: 5 },
          {}
        )
      ).rejects.toThrow();
      expect(client.deleteSecret).not.toHaveBeenCalled();
    });

    it('list_secrets should request full pages without filters', async () => {
      const { context, client } = await setup();
      client.listSecrets.mockResolvedValue({ $metadata: {}, SecretList: [] });

      const result = await createListSecretsTool(context).handler({}, {});

      expect(client.listSecrets).toHaveBeenCalledWith({ MaxResults: 100 });
      expect(result).toEqual({
        status: 'success',
        data: { success: true, secrets: [], count: 0, region: 'us-east-1' },
      });
    });

    it('tag_secret should pass tags through', async () => {
      const { context, client } = await setup();
      client.tagResource.mockResolvedValue({ $metadata: {} });

      const result = await createTagSecretTool(context).handler(
        { secret_id: 'app/db', tags: { env: 'test' } },
        {}
      );

      expect(result).toEqual({
        status: 'success',
        data: { success: true, secret_id: 'app/db', tags_added: { env: 'test' } },
      });
    });
  });

  describe('clear_credential_cache', () => {
    it('should clear one role', async () => {
      const { context, client } = await setup();
      client.describeSecret.mockResolvedValue({ $metadata: {} });
      await context.secretsManager.describeSecret({ secretId: 'app/db', roleArn: TEST_ROLE_ARN });

      const result = await createClearCredentialCacheTool(context).handler(
        { role_arn: TEST_ROLE_ARN, profile: 'dev' },
        {}
      );

      expect(result).toEqual({
        status: 'success',
        data: { success: true, scope: 'role', role_arn: TEST_ROLE_ARN, clients_removed: 1 },
      });
    });

    it('should clear one profile', async () => {
      const { context } = await setup();

      const result = await createClearCredentialCacheTool(context).handler({ profile: 'dev' }, {});

      expect(result).toEqual({
        status: 'success',
        data: { success: true, scope: 'profile', profile: 'dev', clients_removed: 0 },
      });
    });

    it('should clear everything', async () => {
      const { context, client } = await setup();
      client.describeSecret.mockResolvedValue({ $metadata: {} });
      await context.secretsManager.describeSecret({ secretId: 'app/db' });
      await context.secretsManager.describeSecret({ secretId: 'app/db', region: 'eu-west-1' });

      const result = await createClearCredentialCacheTool(context).handler({}, {});

      expect(result).toEqual({
        status: 'success',
        data: { success: true, scope: 'all', clients_removed: 2 },
      });
      expect(context.clientCache.size).toBe(0);
    });
  });
});
