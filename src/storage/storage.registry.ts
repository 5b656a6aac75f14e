// src/storage/storage.registry.ts

import { ConfigurationError } from '../attachments/errors';
import { StorageService } from './storage.service';

export const CACHE_STORAGE = 'cache';
export const STORE_STORAGE = 'store';

/**
 * Storage key -> backend. Built once at startup and handed to uploaders and
 * uploaded files; it cannot be changed afterwards.
 */
export class StorageRegistry {
  private readonly storages: ReadonlyMap<string, StorageService>;

  constructor(storages: Record<string, StorageService>) {
    this.storages = new Map(Object.entries(storages));
  }

  get(key: string): StorageService {
    const storage = this.storages.get(key);
    if (!storage) {
      throw new ConfigurationError(`storage "${key}" isn't registered (known: ${this.keys().join(', ') || 'none'})`);
    }
    return storage;
  }

  has(key: string): boolean {
    return this.storages.has(key);
  }

  keys(): string[] {
    return [...this.storages.keys()];
  }

  /** Throws unless every key is registered. */
  require(...keys: string[]): this {
    for (const key of keys) this.get(key);
    return this;
  }
}
