/**
 * In-memory State Store
 * Entries live only as long as the process
 */

import { createLogger, type Logger } from '../logging/logger.js';
import { expiryFor, isExpired, matchesPattern, type Clock, type StateStore } from './store.js';

interface Entry {
  value: unknown;
  expiresAt?: number;
}

export interface InMemoryStateStoreOptions {
  /** Milliseconds since epoch; injectable for tests */
  now?: Clock;
  logger?: Logger;
}

export class InMemoryStateStore implements StateStore {
  private entries = new Map<string, Entry>();
  private now: Clock;
  private logger: Logger;

  constructor(options: InMemoryStateStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: 'state-store' });
  }

  async get(key: string): Promise<unknown> {
    this.sweep();
    return this.entries.get(key)?.value;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.sweep();
    this.entries.set(key, { value, expiresAt: expiryFor(ttlSeconds, this.now()) });
    this.logger.debug({ key, ttlSeconds }, 'State set');
  }

  async delete(key: string): Promise<boolean> {
    this.sweep();
    const deleted = this.entries.delete(key);
    if (deleted) {
      this.logger.debug({ key }, 'State deleted');
    }
    return deleted;
  }

  async exists(key: string): Promise<boolean> {
    this.sweep();
    return this.entries.has(key);
  }

  async listKeys(pattern?: string): Promise<string[]> {
    this.sweep();
    return [...this.entries.keys()].filter((key) => matchesPattern(key, pattern));
  }

  async clear(): Promise<number> {
    this.sweep();
    const count = this.entries.size;
    this.entries.clear();
    this.logger.info({ count }, `State store cleared: ${count} keys removed`);
    return count;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (isExpired(entry.expiresAt, now)) {
        this.entries.delete(key);
      }
    }
  }
}
