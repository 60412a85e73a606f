/**
 * Core Module Public API
 *
 * Credential resolution and client caching. CoreContext is exported from
 * here, not from the MCP layer.
 */

// ============================================================================
// Services
// ============================================================================

export {
  CredentialResolver,
  createStsAssumeRole,
  isExpired,
  isPastExpiration,
  ROLE_SESSION_NAME,
  ROLE_DURATION_SECONDS,
} from './credential-resolver.js';
export type {
  AssumeRoleFn,
  ExpiryPolicy,
  CredentialResolverOptions,
} from './credential-resolver.js';

export { SessionRegistry, defaultProfileProvider } from './session-registry.js';
export type { ProfileProviderFactory } from './session-registry.js';

export { ClientCache } from './client-cache.js';
export type { ClientFactory, ClientCacheOptions } from './client-cache.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Types
// ============================================================================

export type {
  CoreContext,
  AuthContext,
  CachedCredentials,
  ProfileSession,
  ClientBuildConfig,
  ClientCacheKey,
  AuditEntry,
} from './types.js';

export { DEFAULT_KEY } from './types.js';
