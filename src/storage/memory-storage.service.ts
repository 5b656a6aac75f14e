// src/storage/memory-storage.service.ts
import { Logger } from '@nestjs/common';
import { Readable } from 'stream';

import { FileNotFoundError } from '../attachments/errors';
import { UploadedFile } from '../attachments/uploaded-file';
import { StorageDriver, StorageService, UploadOptions, UploadSource, UrlOptions } from './storage.service';

/**
 * Keeps everything in a Map. Meant for tests and throwaway setups; there is
 * no locking, callers serialize access themselves.
 */
export class MemoryStorageService extends StorageService {
  private readonly log = new Logger(MemoryStorageService.name);
  private readonly store = new Map<string, Buffer>();

  driver(): StorageDriver {
    return 'memory';
  }

  canMove(source: UploadSource): boolean {
    return source instanceof UploadedFile && source.storage instanceof MemoryStorageService;
  }

  async upload(source: UploadSource, id: string, options: UploadOptions = {}): Promise<void> {
    const content = Buffer.from(await source.read());
    this.store.set(id, content);

    if (options.move && source instanceof UploadedFile && this.canMove(source)) {
      await source.delete();
    }
    this.log.debug(`[upload] id=${id} bytes=${content.length} move=${!!options.move}`);
  }

  async open(id: string): Promise<Readable> {
    const content = this.store.get(id);
    if (!content) throw new FileNotFoundError(id);
    return Readable.from([content]);
  }

  async exists(id: string): Promise<boolean> {
    return this.store.has(id);
  }

  async delete(id: string): Promise<void> {
    this.store.delete(id);
  }

  async deletePrefixed(prefix: string): Promise<void> {
    const normalized = prefix.replace(/\/+$/, '') + '/';
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(normalized)) this.store.delete(key);
    }
  }

  async url(id: string, _options?: UrlOptions): Promise<string> {
    return `memory://${id}`;
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  clear(): void {
    this.store.clear();
  }
}
