/**
 * Session Registry
 *
 * One ProfileSession per profile name for the life of the process. Sessions
 * are descriptors only: nothing is read from ~/.aws until a client built on
 * the session signs its first request.
 */

import { fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_KEY, type ProfileSession } from './types.js';

const logger = createLogger('SessionRegistry');

export type ProfileProviderFactory = (profile: string | undefined) => AwsCredentialIdentityProvider;

/**
 * Named profiles read the shared config/credentials files; no profile means
 * the SDK's default chain (environment, SSO, container or instance identity).
 */
export const defaultProfileProvider: ProfileProviderFactory = (profile) =>
  profile ? fromIni({ profile }) : fromNodeProviderChain();

export class SessionRegistry {
  private readonly sessions = new Map<string, ProfileSession>();

  constructor(private readonly providerFactory: ProfileProviderFactory = defaultProfileProvider) {}

  getSession(profile?: string): ProfileSession {
    const key = profile || DEFAULT_KEY;

    const existing = this.sessions.get(key);
    if (existing) {
      return existing;
    }

    const session: ProfileSession = {
      key,
      profile: profile || undefined,
      credentials: this.providerFactory(profile || undefined),
      createdAt: new Date(),
    };

    this.sessions.set(key, session);
    logger.debug(`Created session for profile: ${key}`);
    return session;
  }

  has(profile?: string): boolean {
    return this.sessions.has(profile || DEFAULT_KEY);
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(profile?: string): void {
    if (profile) {
      this.sessions.delete(profile);
      return;
    }
    this.sessions.clear();
  }
}
