/**
 * Secret Resolver
 *
 * Looks a logical secret name up through an ordered provider chain and
 * returns the first value found. Lookups are audited without the value.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * const token = await resolver.resolve('MCP_AUTH_TOKEN');
 * ```
 */

import type { AuditService } from '../../core/audit-service.js';
import { createLogger } from '../../utils/logger.js';
import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';

const logger = createLogger('SecretResolver');

export interface SecretResolverConfig {
  auditService?: AuditService;
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
  }

  /**
   * Append a provider. Providers are queried in insertion order.
   *
   * @throws Error if the object does not implement ISecretProvider
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * @returns the first value any provider returns, or undefined
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          await this.audit(logicalName, true, provider.constructor.name);
          return value;
        }
      } catch (error) {
        logger.warn(
          `Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.audit(logicalName, false, 'none');
    return undefined;
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  private async audit(logicalName: string, success: boolean, provider: string): Promise<void> {
    await this.auditService?.log({
      source: 'secret:resolution',
      timestamp: new Date(),
      action: `resolve:${logicalName}`,
      success,
      metadata: { secretName: logicalName, provider },
    });
  }
}
