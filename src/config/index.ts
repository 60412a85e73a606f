/**
 * Configuration Module - Public API
 */

export { ConfigManager, AUTH_TOKEN_SECRET, type ConfigManagerOptions } from './manager.js';

export {
  EnvironmentSchema,
  LogLevelSchema,
  DEFAULT_REGION,
  DEFAULT_SERVER_PORT,
  type EnvironmentConfig,
  type LogLevel,
  type SemVer,
} from './schema.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  DEFAULT_SECRETS_DIR,
  type ISecretProvider,
  type SecretResolverConfig,
} from './secrets/index.js';
