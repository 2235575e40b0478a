/**
 * File-backed State Store
 * One JSON file per key under a state directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger, type Logger } from '../logging/logger.js';
import { expiryFor, isExpired, matchesPattern, type Clock, type StateStore } from './store.js';

export const DEFAULT_STATE_DIR = '.planwire-state';

const FILE_SUFFIX = '.json';

interface StoredEntry {
  key: string;
  value: unknown;
  expiresAt?: number;
}

function isStoredEntry(value: unknown): value is StoredEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('key' in value) || typeof value.key !== 'string') return false;
  if (!('value' in value)) return false;
  return !('expiresAt' in value) || value.expiresAt === undefined || typeof value.expiresAt === 'number';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface FileStateStoreOptions {
  dir?: string;
  now?: Clock;
  logger?: Logger;
}

/**
 * FileStateStore - durable StateStore.
 *
 * Values must be JSON-representable; dates come back as ISO strings.
 * Operations run one at a time through an internal queue.
 */
export class FileStateStore implements StateStore {
  private dir: string;
  private now: Clock;
  private logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: FileStateStoreOptions = {}) {
    this.dir = options.dir ?? path.join(process.cwd(), DEFAULT_STATE_DIR);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: 'file-state-store' });
  }

  async get(key: string): Promise<unknown> {
    return this.exclusive(async () => {
      await this.sweep();
      return (await this.read(this.fileFor(key)))?.value;
    });
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    return this.exclusive(async () => {
      await this.sweep();
      await fs.mkdir(this.dir, { recursive: true });
      const entry: StoredEntry = { key, value, expiresAt: expiryFor(ttlSeconds, this.now()) };
      await fs.writeFile(this.fileFor(key), JSON.stringify(entry, null, 2));
      this.logger.debug({ key, ttlSeconds }, 'State set');
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.exclusive(async () => {
      await this.sweep();
      return this.remove(this.fileFor(key));
    });
  }

  async exists(key: string): Promise<boolean> {
    return this.exclusive(async () => {
      await this.sweep();
      return (await this.read(this.fileFor(key))) !== undefined;
    });
  }

  async listKeys(pattern?: string): Promise<string[]> {
    return this.exclusive(async () => {
      const entries = await this.sweep();
      return entries.map((entry) => entry.key).filter((key) => matchesPattern(key, pattern));
    });
  }

  async clear(): Promise<number> {
    return this.exclusive(async () => {
      const entries = await this.sweep();
      for (const entry of entries) {
        await this.remove(this.fileFor(entry.key));
      }
      this.logger.info({ count: entries.length }, `State store cleared: ${entries.length} keys removed`);
      return entries.length;
    });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /**
   * Chain `operation` after every earlier one, so no two operations overlap
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    // The next operation waits for this one whether it succeeds or fails
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private fileFor(key: string): string {
    return path.join(this.dir, `${encodeURIComponent(key)}${FILE_SUFFIX}`);
  }

  private async read(filePath: string): Promise<StoredEntry | undefined> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isStoredEntry(parsed)) return parsed;
      this.logger.warn({ file: filePath }, 'Skipping state file with unexpected shape');
    } catch (error) {
      this.logger.warn({ file: filePath, err: error }, 'Skipping corrupt state file');
    }
    return undefined;
  }

  private async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /**
   * Delete expired files and return the live entries
   */
  private async sweep(): Promise<StoredEntry[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      // Nothing has been written yet
      if (isMissingFile(error)) return [];
      throw error;
    }

    const now = this.now();
    const live: StoredEntry[] = [];

    for (const file of files) {
      if (!file.endsWith(FILE_SUFFIX)) continue;
      const filePath = path.join(this.dir, file);
      const entry = await this.read(filePath);
      if (!entry) continue;

      if (isExpired(entry.expiresAt, now)) {
        await this.remove(filePath);
      } else {
        live.push(entry);
      }
    }

    return live;
  }
}
