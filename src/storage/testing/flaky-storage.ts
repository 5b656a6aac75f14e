// src/storage/testing/flaky-storage.ts
import type { Readable } from 'stream';

import { StorageIOError } from '../../attachments/errors';
import { MemoryStorageService } from '../memory-storage.service';
import type { UploadOptions, UploadSource } from '../storage.service';

/**
 * Memory backend for failure tests: uploads fail once `writesLeft` reaches
 * zero, reads fail while `unreadable` is set.
 */
export class FlakyStorageService extends MemoryStorageService {
  writesLeft = Infinity;
  unreadable = false;

  async upload(source: UploadSource, id: string, options?: UploadOptions): Promise<void> {
    if (this.writesLeft <= 0) throw new StorageIOError('upload', id, new Error('connection reset'));
    this.writesLeft -= 1;
    return super.upload(source, id, options);
  }

  async open(id: string): Promise<Readable> {
    if (this.unreadable) throw new StorageIOError('open', id, new Error('connection reset'));
    return super.open(id);
  }
}
