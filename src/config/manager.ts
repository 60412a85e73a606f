import type { AuditService } from '../core/audit-service.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_REGION, EnvironmentSchema, type EnvironmentConfig, type LogLevel, type SemVer } from './schema.js';
import {
  EnvProvider,
  FileSecretProvider,
  SecretResolver,
  type ISecretProvider,
} from './secrets/index.js';

const logger = createLogger('ConfigManager');

const ACCOUNT_PREFIX = 'ACCOUNT_';
const ROLE_ARN_SUFFIX = '_ROLE_ARN';
const PROFILE_SUFFIX = '_PROFILE';

export const AUTH_TOKEN_SECRET = 'MCP_AUTH_TOKEN';

export interface ConfigManagerOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Records bearer-token resolution */
  auditService?: AuditService;

  /**
   * Provider chain for the bearer token
   * (default: FileSecretProvider(SECRETS_DIR), then EnvProvider)
   */
  secretProviders?: ISecretProvider[];
}

/** `production-eu` → `PRODUCTION_EU` */
function toEnvName(accountName: string): string {
  return accountName.toUpperCase().replace(/-/g, '_');
}

/** `PRODUCTION_EU` → `production-eu` */
function toAccountName(envName: string): string {
  return envName.toLowerCase().replace(/_/g, '-');
}

export class ConfigManager {
  private config: EnvironmentConfig | null = null;
  private authToken: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly auditService?: AuditService;
  private readonly secretProviders?: ISecretProvider[];

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.auditService = options.auditService;
    this.secretProviders = options.secretProviders;
  }

  /**
   * Validate the environment and resolve the bearer token.
   *
   * @throws {ConfigurationError} when a variable fails validation
   */
  async load(): Promise<EnvironmentConfig> {
    if (this.config) {
      return this.config;
    }

    const parsed = EnvironmentSchema.safeParse(this.env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(issues.join('; '), { issues });
    }

    const resolver = new SecretResolver({ auditService: this.auditService });
    const providers = this.secretProviders ?? [
      new FileSecretProvider(parsed.data.SECRETS_DIR),
      new EnvProvider(this.env),
    ];
    for (const provider of providers) {
      resolver.addProvider(provider);
    }

    this.authToken = await resolver.resolve(AUTH_TOKEN_SECRET);
    this.config = parsed.data;

    if (!this.authToken) {
      logger.warn('MCP_AUTH_TOKEN is not set: any bearer token will be accepted over HTTP');
    }
    logger.info('Configuration loaded and validated successfully');

    return this.config;
  }

  getConfig(): EnvironmentConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  /** AWS_REGION, then AWS_DEFAULT_REGION, then us-east-1 */
  getDefaultRegion(): string {
    const config = this.getConfig();
    return config.AWS_REGION ?? config.AWS_DEFAULT_REGION ?? DEFAULT_REGION;
  }

  /** Configured bearer token; undefined means the gate accepts any token */
  getAuthToken(): string | undefined {
    this.getConfig();
    return this.authToken;
  }

  /**
   * Account name → role ARN, from every `ACCOUNT_{NAME}_ROLE_ARN` variable.
   */
  listConfiguredAccounts(): Record<string, string> {
    return this.collectAccounts(ROLE_ARN_SUFFIX);
  }

  /**
   * Account name → profile name, from every `ACCOUNT_{NAME}_PROFILE` variable.
   */
  listConfiguredProfiles(): Record<string, string> {
    return this.collectAccounts(PROFILE_SUFFIX);
  }

  getAccountRoleArn(accountName: string): string | undefined {
    return this.env[`${ACCOUNT_PREFIX}${toEnvName(accountName)}${ROLE_ARN_SUFFIX}`];
  }

  getAccountProfile(accountName: string): string | undefined {
    return this.env[`${ACCOUNT_PREFIX}${toEnvName(accountName)}${PROFILE_SUFFIX}`];
  }

  getServerPort(): number {
    return this.getConfig().SERVER_PORT;
  }

  /** METADATA_PORT, or the port after `serverPort` */
  getMetadataPort(serverPort: number = this.getServerPort()): number {
    return this.getConfig().METADATA_PORT ?? serverPort + 1;
  }

  /** MCP_PUBLIC_URL without a trailing slash, or http://localhost:{serverPort} */
  getPublicUrl(serverPort: number = this.getServerPort()): string {
    return this.getConfig().MCP_PUBLIC_URL?.replace(/\/+$/, '') ?? `http://localhost:${serverPort}`;
  }

  getLogLevel(): LogLevel {
    return this.getConfig().LOG_LEVEL;
  }

  isAuditEnabled(): boolean {
    return this.getConfig().AUDIT_ENABLED;
  }

  isCredentialExpiryCheckEnabled(): boolean {
    return this.getConfig().AWS_CREDENTIAL_EXPIRY_CHECK;
  }

  getServerInfo(): { name: string; version: SemVer } {
    const config = this.getConfig();
    return { name: config.MCP_SERVER_NAME, version: config.MCP_SERVER_VERSION };
  }

  private collectAccounts(suffix: string): Record<string, string> {
    const accounts: Record<string, string> = {};

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || !key.startsWith(ACCOUNT_PREFIX) || !key.endsWith(suffix)) {
        continue;
      }

      const namePart = key.slice(ACCOUNT_PREFIX.length, key.length - suffix.length);
      if (!namePart) {
        continue;
      }

      accounts[toAccountName(namePart)] = value;
    }

    return accounts;
  }
}
