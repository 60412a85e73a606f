/**
 * Audit Service
 *
 * Write-only audit trail for credential events (role assumptions, cache
 * clears) and tool faults. Follows the Null Object Pattern: a service built
 * without configuration accepts entries and drops them.
 */

import type { AuditEntry } from './types.js';

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Invoked with a copy of every stored entry when storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

/**
 * Bounded in-memory storage. Drops the oldest entry once full.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * @internal test access
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries, config?.onOverflow);
  }

  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
