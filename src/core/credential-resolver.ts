/**
 * Credential Resolver
 *
 * Turns a cross-account role ARN into temporary credentials via STS
 * AssumeRole and keeps them for reuse. Entries are keyed by role ARN only.
 *
 * By default a cached entry is returned forever: the ExpiryPolicy below
 * answers "not expired" for every entry, so a long-lived process will keep
 * using credentials after STS's one-hour lifetime has passed. Pass
 * `isPastExpiration` to refresh instead.
 */

import {
  AssumeRoleCommand,
  STSClient,
  STSServiceException,
  type AssumeRoleCommandInput,
  type AssumeRoleCommandOutput,
} from '@aws-sdk/client-sts';
import { AssumeRoleError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AuditService } from './audit-service.js';
import type { CachedCredentials } from './types.js';

const logger = createLogger('CredentialResolver');

export const ROLE_SESSION_NAME = 'mcp-secrets-session';
export const ROLE_DURATION_SECONDS = 3600;

export type AssumeRoleFn = (input: AssumeRoleCommandInput) => Promise<AssumeRoleCommandOutput>;

/**
 * Decides whether a cached entry must be fetched again.
 */
export type ExpiryPolicy = (credentials: CachedCredentials, now: Date) => boolean;

/** Default policy: cached credentials never expire. */
export const isExpired: ExpiryPolicy = () => false;

/** Refresh once the expiration reported by STS has been reached. */
export const isPastExpiration: ExpiryPolicy = (credentials, now) =>
  credentials.expiration !== undefined && credentials.expiration.getTime() <= now.getTime();

export interface CredentialResolverOptions {
  /** STS AssumeRole call (default: a lazily created STSClient in `region`) */
  assumeRole?: AssumeRoleFn;

  /** Region for the default STS client */
  region?: string;

  expiryPolicy?: ExpiryPolicy;

  clock?: () => Date;

  auditService?: AuditService;
}

/**
 * Build an AssumeRoleFn backed by a single STSClient, created on first use.
 */
export function createStsAssumeRole(region?: string): AssumeRoleFn {
  let client: STSClient | undefined;

  return (input) => {
    client ??= new STSClient(region ? { region } : {});
    return client.send(new AssumeRoleCommand(input));
  };
}

export class CredentialResolver {
  private readonly cache = new Map<string, CachedCredentials>();
  private readonly inFlight = new Map<string, Promise<CachedCredentials>>();
  private readonly assumeRole: AssumeRoleFn;
  private readonly expiryPolicy: ExpiryPolicy;
  private readonly clock: () => Date;
  private readonly auditService?: AuditService;

  constructor(options: CredentialResolverOptions = {}) {
    this.assumeRole = options.assumeRole ?? createStsAssumeRole(options.region);
    this.expiryPolicy = options.expiryPolicy ?? isExpired;
    this.clock = options.clock ?? (() => new Date());
    this.auditService = options.auditService;
  }

  /**
   * Resolve credentials for a role, assuming it on a cache miss.
   *
   * Concurrent misses for the same role share one STS call. If the entry is
   * cleared while that call is in flight, its result is returned to the
   * waiting callers but not stored.
   *
   * @throws {AssumeRoleError} STS rejected the request or returned no credentials
   */
  async resolve(roleArn: string): Promise<CachedCredentials> {
    const cached = this.cache.get(roleArn);
    if (cached && !this.expiryPolicy(cached, this.clock())) {
      logger.debug(`Credential cache hit for ${roleArn}`);
      return cached;
    }

    const pending = this.inFlight.get(roleArn);
    if (pending) {
      return pending;
    }

    const request = this.assume(roleArn);
    this.inFlight.set(roleArn, request);

    try {
      const credentials = await request;
      if (this.inFlight.get(roleArn) === request) {
        this.cache.set(roleArn, credentials);
      }
      return credentials;
    } finally {
      if (this.inFlight.get(roleArn) === request) {
        this.inFlight.delete(roleArn);
      }
    }
  }

  /**
   * True when the next resolve() for this role would call STS: nothing is
   * cached, or the expiry policy rejects the cached entry.
   */
  isStale(roleArn: string): boolean {
    const cached = this.cache.get(roleArn);
    return !cached || this.expiryPolicy(cached, this.clock());
  }

  has(roleArn: string): boolean {
    return this.cache.has(roleArn);
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Drop one role's credentials, or every entry when no role is given.
   */
  clear(roleArn?: string): void {
    if (roleArn) {
      this.cache.delete(roleArn);
      this.inFlight.delete(roleArn);
      return;
    }

    this.cache.clear();
    this.inFlight.clear();
  }

  private async assume(roleArn: string): Promise<CachedCredentials> {
    let response: AssumeRoleCommandOutput;

    try {
      response = await this.assumeRole({
        RoleArn: roleArn,
        RoleSessionName: ROLE_SESSION_NAME,
        DurationSeconds: ROLE_DURATION_SECONDS,
      });
    } catch (error) {
      const failure =
        error instanceof STSServiceException
          ? new AssumeRoleError(roleArn, error.name, error.message, error)
          : new AssumeRoleError(
              roleArn,
              'AssumeRoleFailed',
              error instanceof Error ? error.message : String(error),
              error
            );

      logger.error(`Failed to assume role ${roleArn}: ${failure.code}`);
      await this.audit(roleArn, false, failure.code);
      throw failure;
    }

    const issued = response.Credentials;
    if (!issued?.AccessKeyId || !issued.SecretAccessKey || !issued.SessionToken) {
      await this.audit(roleArn, false, 'InvalidResponse');
      throw new AssumeRoleError(roleArn, 'InvalidResponse', 'STS response did not include credentials');
    }

    logger.info(`Successfully assumed role: ${roleArn}`);
    await this.audit(roleArn, true);

    return {
      accessKeyId: issued.AccessKeyId,
      secretAccessKey: issued.SecretAccessKey,
      sessionToken: issued.SessionToken,
      expiration: issued.Expiration,
    };
  }

  private async audit(roleArn: string, success: boolean, error?: string): Promise<void> {
    await this.auditService?.log({
      timestamp: new Date(),
      source: 'aws:sts',
      action: 'assume_role',
      success,
      error,
      metadata: { roleArn },
    });
  }
}
