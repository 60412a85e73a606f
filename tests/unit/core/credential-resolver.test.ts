/**
 * CredentialResolver Tests
 *
 * STS AssumeRole caching, single-flight misses, expiry policies and error
 * classification.
 */

import { describe, it, expect, vi } from 'vitest';
import { STSServiceException } from '@aws-sdk/client-sts';
import {
  CredentialResolver,
  ROLE_DURATION_SECONDS,
  ROLE_SESSION_NAME,
  isExpired,
  isPastExpiration,
  type AssumeRoleFn,
} from '../../../src/core/credential-resolver.js';
import { AssumeRoleError } from '../../../src/utils/errors.js';
import {
  OTHER_ROLE_ARN,
  TEST_EXPIRATION,
  TEST_ROLE_ARN,
  createRecordingAudit,
  deferred,
  stsResponse,
} from '../../helpers/fakes.js';

describe('CredentialResolver', () => {
  describe('resolve', () => {
    it('should assume the role with the fixed session name and duration', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({ assumeRole });

      const credentials = await resolver.resolve(TEST_ROLE_ARN);

      expect(assumeRole).toHaveBeenCalledWith({
        RoleArn: TEST_ROLE_ARN,
        RoleSessionName: ROLE_SESSION_NAME,
        DurationSeconds: ROLE_DURATION_SECONDS,
      });
      expect(credentials).toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session-token',
        expiration: TEST_EXPIRATION,
      });
    });

    it('should reuse cached credentials for the same role', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({ assumeRole });

      const first = await resolver.resolve(TEST_ROLE_ARN);
      const second = await resolver.resolve(TEST_ROLE_ARN);

      expect(second).toBe(first);
      expect(assumeRole).toHaveBeenCalledTimes(1);
      expect(resolver.has(TEST_ROLE_ARN)).toBe(true);
      expect(resolver.size).toBe(1);
    });

    it('should cache each role separately', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({ assumeRole });

      await resolver.resolve(TEST_ROLE_ARN);
      await resolver.resolve(OTHER_ROLE_ARN);

      expect(assumeRole).toHaveBeenCalledTimes(2);
      expect(resolver.size).toBe(2);
    });

    it('should share one STS call between concurrent misses', async () => {
      const pending = deferred<Awaited<ReturnType<AssumeRoleFn>>>();
      const assumeRole = vi.fn<AssumeRoleFn>().mockReturnValue(pending.promise);
      const resolver = new CredentialResolver({ assumeRole });

      const first = resolver.resolve(TEST_ROLE_ARN);
      const second = resolver.resolve(TEST_ROLE_ARN);
      pending.resolve(stsResponse());

      const [a, b] = await Promise.all([first, second]);
      expect(a).toBe(b);
      expect(assumeRole).toHaveBeenCalledTimes(1);
    });

    it('should not store a result whose entry was cleared while in flight', async () => {
      const pending = deferred<Awaited<ReturnType<AssumeRoleFn>>>();
      const assumeRole = vi.fn<AssumeRoleFn>().mockReturnValue(pending.promise);
      const resolver = new CredentialResolver({ assumeRole });

      const inFlight = resolver.resolve(TEST_ROLE_ARN);
      resolver.clear(TEST_ROLE_ARN);
      pending.resolve(stsResponse());

      const credentials = await inFlight;
      expect(credentials.accessKeyId).toBe('test-access-key');
      expect(resolver.has(TEST_ROLE_ARN)).toBe(false);
    });
  });

  describe('expiry policy', () => {
    it('should keep returning cached credentials past their expiration by default', async () => {
      let now = new Date('2029-12-31T23:00:00.000Z');
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({ assumeRole, clock: () => now });

      const first = await resolver.resolve(TEST_ROLE_ARN);
      now = new Date('2031-06-01T00:00:00.000Z');
      const second = await resolver.resolve(TEST_ROLE_ARN);

      expect(second).toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session-token',
        expiration: TEST_EXPIRATION,
      });
      expect(second).toEqual(first);
      expect(assumeRole).toHaveBeenCalledTimes(1);
    });

    it('should assume the role again once expired under isPastExpiration', async () => {
      let now = new Date('2029-12-31T23:00:00.000Z');
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({
        assumeRole,
        expiryPolicy: isPastExpiration,
        clock: () => now,
      });

      await resolver.resolve(TEST_ROLE_ARN);
      await resolver.resolve(TEST_ROLE_ARN);
      expect(assumeRole).toHaveBeenCalledTimes(1);

      now = new Date('2030-01-01T00:00:00.000Z');
      await resolver.resolve(TEST_ROLE_ARN);
      expect(assumeRole).toHaveBeenCalledTimes(2);
    });

    it('isStale should report missing entries and entries the policy rejects', async () => {
      let now = new Date('2029-12-31T23:00:00.000Z');
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({
        assumeRole,
        expiryPolicy: isPastExpiration,
        clock: () => now,
      });

      expect(resolver.isStale(TEST_ROLE_ARN)).toBe(true);
      await resolver.resolve(TEST_ROLE_ARN);
      expect(resolver.isStale(TEST_ROLE_ARN)).toBe(false);

      now = new Date('2030-01-01T00:00:00.000Z');
      expect(resolver.isStale(TEST_ROLE_ARN)).toBe(true);
    });

    it('isStale should stay false for a cached entry under the default policy', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({
        assumeRole,
        clock: () => new Date('2031-06-01T00:00:00.000Z'),
      });

      await resolver.resolve(TEST_ROLE_ARN);

      expect(resolver.isStale(TEST_ROLE_ARN)).toBe(false);
    });

    it('isExpired should never report an entry as expired', () => {
      const credentials = {
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session-token',
        expiration: new Date('2000-01-01T00:00:00.000Z'),
      };

      expect(isExpired(credentials, new Date('2030-01-01T00:00:00.000Z'))).toBe(false);
    });

    it('isPastExpiration should treat credentials without an expiration as valid', () => {
      const credentials = {
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session-token',
      };

      expect(isPastExpiration(credentials, new Date('2030-01-01T00:00:00.000Z'))).toBe(false);
    });
  });

  describe('errors', () => {
    it('should raise AssumeRoleError carrying the STS error name', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockRejectedValue(
        new STSServiceException({
          name: 'AccessDenied',
          $fault: 'client',
          $metadata: {},
          message: 'not authorized to perform sts:AssumeRole',
        })
      );
      const resolver = new CredentialResolver({ assumeRole });

      const error = await resolver.resolve(TEST_ROLE_ARN).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AssumeRoleError);
      expect(error).toMatchObject({
        code: 'AccessDenied',
        roleArn: TEST_ROLE_ARN,
        statusCode: 403,
        message: `Failed to assume role ${TEST_ROLE_ARN}: not authorized to perform sts:AssumeRole`,
      });
      expect(resolver.has(TEST_ROLE_ARN)).toBe(false);
    });

    it('should classify other failures as AssumeRoleFailed', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockRejectedValue(new Error('connect ETIMEDOUT'));
      const resolver = new CredentialResolver({ assumeRole });

      await expect(resolver.resolve(TEST_ROLE_ARN)).rejects.toMatchObject({
        code: 'AssumeRoleFailed',
        message: `Failed to assume role ${TEST_ROLE_ARN}: connect ETIMEDOUT`,
      });
    });

    it('should reject a response without credentials', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue({ $metadata: {} });
      const resolver = new CredentialResolver({ assumeRole });

      await expect(resolver.resolve(TEST_ROLE_ARN)).rejects.toMatchObject({
        code: 'InvalidResponse',
      });
    });

    it('should retry after a failed attempt', async () => {
      const assumeRole = vi
        .fn<AssumeRoleFn>()
        .mockRejectedValueOnce(new Error('throttled'))
        .mockResolvedValueOnce(stsResponse());
      const resolver = new CredentialResolver({ assumeRole });

      await expect(resolver.resolve(TEST_ROLE_ARN)).rejects.toBeInstanceOf(AssumeRoleError);
      await expect(resolver.resolve(TEST_ROLE_ARN)).resolves.toMatchObject({
        accessKeyId: 'test-access-key',
      });
      expect(assumeRole).toHaveBeenCalledTimes(2);
    });
  });

  describe('clear', () => {
    it('should drop one role or every role', async () => {
      const assumeRole = vi.fn<AssumeRoleFn>().mockResolvedValue(stsResponse());
      const resolver = new CredentialResolver({ assumeRole });
      await resolver.resolve(TEST_ROLE_ARN);
      await resolver.resolve(OTHER_ROLE_ARN);

      resolver.clear(TEST_ROLE_ARN);
      expect(resolver.has(TEST_ROLE_ARN)).toBe(false);
      expect(resolver.has(OTHER_ROLE_ARN)).toBe(true);

      resolver.clear();
      expect(resolver.size).toBe(0);
    });
  });

  describe('audit', () => {
    it('should record successful and failed assumptions', async () => {
      const { auditService, storage } = createRecordingAudit();
      const assumeRole = vi
        .fn<AssumeRoleFn>()
        .mockResolvedValueOnce(stsResponse())
        .mockRejectedValueOnce(new Error('denied'));
      const resolver = new CredentialResolver({ assumeRole, auditService });

      await resolver.resolve(TEST_ROLE_ARN);
      await resolver.resolve(OTHER_ROLE_ARN).catch(() => undefined);

      const entries = storage.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatchObject({
        source: 'aws:sts',
        action: 'assume_role',
        success: true,
        metadata: { roleArn: TEST_ROLE_ARN },
      });
      expect(entries[1]).toMatchObject({
        source: 'aws:sts',
        action: 'assume_role',
        success: false,
        error: 'AssumeRoleFailed',
        metadata: { roleArn: OTHER_ROLE_ARN },
      });
    });
  });
});
