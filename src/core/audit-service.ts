/**
 * Audit Service - write-only record of security events
 *
 * Disabled unless configured (Null Object Pattern), so every component can
 * log unconditionally.
 */

import type { AuditEntry } from './types.js';

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Capacity of the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Called with every retained entry before the default storage drops the oldest */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage for audit entries.
 *
 * Write-only: querying belongs to an indexed backend, not this interface.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

/**
 * Bounded in-memory storage. Drops the oldest entry once full.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * @internal For tests
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal For tests
   */
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

  /**
   * @throws {Error} If the entry has no source
   */
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
   * @internal For tests
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
