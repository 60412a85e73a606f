/**
 * Core credential-resolution types
 *
 * Architectural Rule: Core → Services → MCP
 * Files in src/core/ import from services/config for types only.
 */

import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { ConfigManager } from '../config/manager.js';
import type { SecretsManagerService } from '../services/secrets-manager.js';
import type { SecretsStoreClient } from '../services/types.js';
import type { AuditService } from './audit-service.js';
import type { ClientCache } from './client-cache.js';

/** Cache-key sentinel used for "no profile" and "no role". */
export const DEFAULT_KEY = 'default';

// ============================================================================
// Authentication material
// ============================================================================

/**
 * The identity to use for one remote call.
 *
 * `profile` and `roleArn` are alternative selectors; when both are present
 * `profile` wins.
 */
export interface AuthContext {
  profile?: string;
  roleArn?: string;
  region: string;
}

/**
 * Temporary credentials issued by STS for an assumed role.
 *
 * `expiration` is recorded when STS returns one; whether it is honoured is
 * up to the resolver's ExpiryPolicy.
 */
export interface CachedCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration?: Date;
}

/**
 * Profile-derived credential context.
 *
 * Building one never touches the filesystem; the wrapped provider reads the
 * shared config/credentials files on first use and fails there if the
 * profile is missing or broken.
 */
export interface ProfileSession {
  /** Registry key: the profile name, or `default` for ambient credentials */
  readonly key: string;

  /** Profile name, undefined for the ambient default chain */
  readonly profile?: string;

  /** Lazy credential provider handed to SDK clients */
  readonly credentials: AwsCredentialIdentityProvider;

  readonly createdAt: Date;
}

/**
 * Configuration handed to a client factory on a cache miss.
 *
 * `credentials` is undefined when the SDK's default chain should be used.
 */
export interface ClientBuildConfig {
  region: string;
  credentials?: AwsCredentialIdentity | AwsCredentialIdentityProvider;
}

/**
 * The composite key identifying one cached client.
 */
export interface ClientCacheKey {
  service: string;
  profile: string;
  roleArn: string;
  region: string;
}

// ============================================================================
// Audit Types
// ============================================================================

export interface AuditEntry {
  timestamp: Date;

  /** Origin of the entry (e.g. 'aws:sts', 'aws:client-cache', 'mcp:tool:get_secret_value') */
  source: string;

  action: string;
  success: boolean;
  reason?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Core Context (Dependency Injection Container)
// ============================================================================

/**
 * Services shared by every tool. Built once by the orchestrator.
 */
export interface CoreContext {
  configManager: ConfigManager;
  auditService: AuditService;
  clientCache: ClientCache<SecretsStoreClient>;
  secretsManager: SecretsManagerService;
}
