/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout Docker and Kubernetes use for
 * mounted secrets. Takes priority over EnvProvider so a mounted
 * MCP_AUTH_TOKEN never has to appear in the process environment.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger } from '../../../utils/logger.js';
import type { ISecretProvider } from '../ISecretProvider.js';

const logger = createLogger('FileSecretProvider');

export const DEFAULT_SECRETS_DIR = '/run/secrets';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  constructor(private readonly secretDir: string = DEFAULT_SECRETS_DIR) {}

  /**
   * @returns the trimmed file contents, or undefined when the file is missing,
   *          unreadable, or the name would resolve outside `secretDir`
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || logicalName.startsWith('/')) {
      return undefined;
    }

    const filePath = path.join(this.secretDir, logicalName);

    // Resolved path must stay inside secretDir
    const normalizedSecretDir = path.resolve(this.secretDir);
    if (!path.resolve(filePath).startsWith(normalizedSecretDir + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');
      return secretValue.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'EACCES' && code !== 'ENOTDIR') {
        logger.warn(
          `Unexpected error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
