/**
 * Environment Variable Secret Provider
 *
 * Reads secrets from `process.env` (including values loaded from `.env` by
 * `dotenv/config`). Chained after FileSecretProvider as the fallback.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * @returns the trimmed value of `env[logicalName]`, or undefined when unset or empty
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value === '') {
      return undefined;
    }

    return value.trim();
  }
}
