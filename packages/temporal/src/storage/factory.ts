/**
 * Storage Factory
 *
 * Creates an initialized fact storage from configuration.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { StorageConfig } from '../config/types.js';
import type { IFactStorage } from './interface.js';
import { SQLiteFactStorage } from './sqlite/storage.js';

/**
 * Create and initialize a fact storage
 */
export function createFactStorage(config: StorageConfig): IFactStorage {
  if (config.dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
  }

  const storage = new SQLiteFactStorage({ dbPath: config.dbPath, walMode: config.walMode });
  storage.initialize();
  return storage;
}

/**
 * Create an initialized in-memory fact storage
 */
export function createInMemoryFactStorage(): IFactStorage {
  return createFactStorage({ dbPath: ':memory:', walMode: false });
}
