/**
 * Client Cache
 *
 * Caches service clients per (service, profile, role, region). The key keeps
 * profile and role as separate parts even though only one of them drives
 * construction, so asking with both yields an entry distinct from asking
 * with the profile alone.
 *
 * Resolution order:
 * 1. profile set   → SessionRegistry session for that profile; roleArn ignored
 * 2. roleArn set   → CredentialResolver (STS AssumeRole)
 * 3. neither       → SDK default credential chain
 *
 * Invalidation runs the other way round: clearCache(roleArn, profile) takes
 * the role branch when both are given.
 *
 * A client built from assumed-role credentials is reused only while the
 * resolver still holds those credentials under its expiry policy; otherwise
 * it is rebuilt, which assumes the role again.
 */

import { createLogger } from '../utils/logger.js';
import type { AuditService } from './audit-service.js';
import type { CredentialResolver } from './credential-resolver.js';
import type { SessionRegistry } from './session-registry.js';
import { DEFAULT_KEY, type ClientBuildConfig, type ClientCacheKey } from './types.js';

const logger = createLogger('ClientCache');

export type ClientFactory<TClient> = (service: string, config: ClientBuildConfig) => TClient;

export interface ClientCacheOptions<TClient> {
  factory: ClientFactory<TClient>;
  credentialResolver: CredentialResolver;
  sessionRegistry: SessionRegistry;

  /** Region used when a call does not name one */
  defaultRegion: string;

  auditService?: AuditService;
}

interface CacheSlot<T> {
  key: ClientCacheKey;
  value: T;

  /** Role whose credentials the client was built from */
  assumedRole?: string;
}

function serializeKey(key: ClientCacheKey): string {
  return JSON.stringify([key.service, key.profile, key.roleArn, key.region]);
}

export class ClientCache<TClient> {
  private readonly clients = new Map<string, CacheSlot<TClient>>();
  private readonly building = new Map<string, CacheSlot<Promise<TClient>>>();
  private readonly factory: ClientFactory<TClient>;
  private readonly credentialResolver: CredentialResolver;
  private readonly sessionRegistry: SessionRegistry;
  private readonly defaultRegion: string;
  private readonly auditService?: AuditService;

  constructor(options: ClientCacheOptions<TClient>) {
    this.factory = options.factory;
    this.credentialResolver = options.credentialResolver;
    this.sessionRegistry = options.sessionRegistry;
    this.defaultRegion = options.defaultRegion;
    this.auditService = options.auditService;
  }

  /**
   * Get or create the client for this authentication context.
   *
   * @throws {AssumeRoleError} when a role is used and STS rejects it
   */
  async getClient(
    service: string,
    roleArn?: string,
    region?: string,
    profile?: string
  ): Promise<TClient> {
    const key: ClientCacheKey = {
      service,
      profile: profile || DEFAULT_KEY,
      roleArn: roleArn || DEFAULT_KEY,
      region: region || this.defaultRegion,
    };
    const id = serializeKey(key);

    const hit = this.clients.get(id);
    if (hit) {
      if (!hit.assumedRole || !this.credentialResolver.isStale(hit.assumedRole)) {
        return hit.value;
      }
      logger.debug(`Credentials behind ${key.service} client for ${hit.assumedRole} are stale, rebuilding`);
      this.clients.delete(id);
    }

    const pending = this.building.get(id);
    if (pending) {
      return pending.value;
    }

    const assumedRole = profile ? undefined : roleArn || undefined;
    const construction = this.build(key, roleArn || undefined, profile || undefined);
    this.building.set(id, { key, value: construction });

    try {
      const client = await construction;
      if (this.building.get(id)?.value === construction) {
        this.clients.set(id, { key, value: client, assumedRole });
      }
      return client;
    } finally {
      if (this.building.get(id)?.value === construction) {
        this.building.delete(id);
      }
    }
  }

  /**
   * Invalidate cached clients together with the credentials behind them.
   *
   * - roleArn: that role's credentials and every client keyed on it
   * - profile (no roleArn): that profile's session and every client keyed on it
   * - neither: everything
   *
   * @returns number of client entries removed
   */
  async clearCache(roleArn?: string, profile?: string): Promise<number> {
    let removed: number;
    let scope: Record<string, string>;

    if (roleArn) {
      this.credentialResolver.clear(roleArn);
      removed = this.evict((key) => key.roleArn === roleArn);
      scope = { roleArn };
    } else if (profile) {
      this.sessionRegistry.clear(profile);
      removed = this.evict((key) => key.profile === profile);
      scope = { profile };
    } else {
      this.credentialResolver.clear();
      this.sessionRegistry.clear();
      removed = this.clients.size;
      this.clients.clear();
      this.building.clear();
      scope = { all: 'true' };
    }

    logger.info(`Cleared ${removed} cached client(s)`, scope);
    await this.auditService?.log({
      timestamp: new Date(),
      source: 'aws:client-cache',
      action: 'clear_cache',
      success: true,
      metadata: { ...scope, removed },
    });

    return removed;
  }

  keys(): ClientCacheKey[] {
    return Array.from(this.clients.values(), (slot) => ({ ...slot.key }));
  }

  get size(): number {
    return this.clients.size;
  }

  private evict(matches: (key: ClientCacheKey) => boolean): number {
    let removed = 0;

    for (const [id, slot] of this.clients) {
      if (matches(slot.key)) {
        this.clients.delete(id);
        removed++;
      }
    }

    for (const [id, slot] of this.building) {
      if (matches(slot.key)) {
        this.building.delete(id);
      }
    }

    return removed;
  }

  private async build(key: ClientCacheKey, roleArn?: string, profile?: string): Promise<TClient> {
    let config: ClientBuildConfig;

    if (profile) {
      const session = this.sessionRegistry.getSession(profile);
      config = { region: key.region, credentials: session.credentials };
    } else if (roleArn) {
      const { accessKeyId, secretAccessKey, sessionToken } =
        await this.credentialResolver.resolve(roleArn);
      config = { region: key.region, credentials: { accessKeyId, secretAccessKey, sessionToken } };
    } else {
      config = { region: key.region };
    }

    const client = this.factory(key.service, config);
    logger.debug(
      `Created client for ${key.service} in ${key.region} (profile: ${key.profile}, role: ${key.roleArn})`
    );
    return client;
  }
}
