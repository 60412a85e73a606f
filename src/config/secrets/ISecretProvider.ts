/**
 * Secret Provider Interface
 *
 * A provider looks up a logical secret name (e.g. `MCP_AUTH_TOKEN`) in one
 * source. Providers are chained by SecretResolver and tried in order.
 */

export interface ISecretProvider {
  /**
   * Look up a secret by logical name.
   *
   * @returns the value, or undefined when this source does not have it
   * @throws only for unexpected failures; a missing secret is not one
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
