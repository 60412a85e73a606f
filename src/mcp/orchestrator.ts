/**
 * MCP Configuration Orchestrator
 *
 * Builds the CoreContext from a loaded ConfigManager: one AuditService, one
 * CredentialResolver, one SessionRegistry and one ClientCache per server,
 * wired together, plus the Secrets Manager facade on top.
 *
 * The context is built with `satisfies CoreContext` and validated by the
 * server after construction.
 */

import type { AuditEntry, CoreContext } from '../core/index.js';
import { AuditService } from '../core/audit-service.js';
import { ClientCache, type ClientFactory } from '../core/client-cache.js';
import {
  CredentialResolver,
  isExpired,
  isPastExpiration,
  type AssumeRoleFn,
} from '../core/credential-resolver.js';
import { SessionRegistry, type ProfileProviderFactory } from '../core/session-registry.js';
import { CoreContextValidator } from '../core/validators.js';
import type { ConfigManager } from '../config/manager.js';
import { createServiceClient } from '../services/aws-clients.js';
import { SecretsManagerService } from '../services/secrets-manager.js';
import type { SecretsStoreClient } from '../services/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ConfigOrchestrator');

export interface OrchestratorOptions {
  configManager: ConfigManager;

  /** Custom audit overflow handler */
  onAuditOverflow?: (entries: AuditEntry[]) => void;

  /** STS call used by the CredentialResolver (default: real STS client) */
  assumeRole?: AssumeRoleFn;

  /** Credential providers for profile sessions (default: fromIni / default chain) */
  profileProviderFactory?: ProfileProviderFactory;

  /** Secrets Manager client constructor (default: SDK client) */
  clientFactory?: ClientFactory<SecretsStoreClient>;
}

export class ConfigOrchestrator {
  private readonly configManager: ConfigManager;
  private readonly onAuditOverflow?: (entries: AuditEntry[]) => void;
  private readonly assumeRole?: AssumeRoleFn;
  private readonly profileProviderFactory?: ProfileProviderFactory;
  private readonly clientFactory: ClientFactory<SecretsStoreClient>;

  constructor(options: OrchestratorOptions) {
    this.configManager = options.configManager;
    this.onAuditOverflow = options.onAuditOverflow;
    this.assumeRole = options.assumeRole;
    this.profileProviderFactory = options.profileProviderFactory;
    this.clientFactory = options.clientFactory ?? createServiceClient;
  }

  /**
   * @throws {ConfigurationError} if the ConfigManager has not been loaded
   */
  buildCoreContext(): CoreContext {
    const defaultRegion = this.configManager.getDefaultRegion();
    const auditService = this.createAuditService();

    const credentialResolver = new CredentialResolver({
      assumeRole: this.assumeRole,
      region: defaultRegion,
      expiryPolicy: this.configManager.isCredentialExpiryCheckEnabled() ? isPastExpiration : isExpired,
      auditService,
    });

    const sessionRegistry = new SessionRegistry(this.profileProviderFactory);

    const clientCache = new ClientCache<SecretsStoreClient>({
      factory: this.clientFactory,
      credentialResolver,
      sessionRegistry,
      defaultRegion,
      auditService,
    });

    const coreContext = {
      configManager: this.configManager,
      auditService,
      clientCache,
      secretsManager: new SecretsManagerService(clientCache, defaultRegion),
    } satisfies CoreContext;

    logger.info(`CoreContext built (default region: ${defaultRegion})`);
    return coreContext;
  }

  /**
   * Null Object AuditService unless AUDIT_ENABLED is set.
   */
  private createAuditService(): AuditService {
    if (!this.configManager.isAuditEnabled()) {
      return new AuditService();
    }

    return new AuditService({
      enabled: true,
      onOverflow: this.onAuditOverflow,
    });
  }

  static validateCoreContext(coreContext: CoreContext): void {
    CoreContextValidator.validate(coreContext);
  }
}
