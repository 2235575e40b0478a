import type { Logger } from '../logging/logger.js';
import { FileStateStore } from './file-store.js';
import { InMemoryStateStore } from './memory-store.js';
import type { StateStore } from './store.js';

export * from './store.js';
export * from './memory-store.js';
export * from './file-store.js';

export type StateBackend = 'memory' | 'file';

export interface StateStoreConfig {
  backend: StateBackend;
  /** Directory for the file backend */
  dir?: string;
  logger?: Logger;
}

export function createStateStore(config: StateStoreConfig): StateStore {
  switch (config.backend) {
    case 'memory':
      return new InMemoryStateStore({ logger: config.logger });
    case 'file':
      return new FileStateStore({ dir: config.dir, logger: config.logger });
  }
}
