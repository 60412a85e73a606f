/**
 * Secret providers used to resolve the bearer token.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider, DEFAULT_SECRETS_DIR } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
