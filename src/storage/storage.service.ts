// src/storage/storage.service.ts (interface)
import type { Readable } from 'stream';
import type { Metadata } from '../attachments/metadata';
import type { UploadIo } from '../attachments/upload-io';
import type { UploadedFile } from '../attachments/uploaded-file';

export type StorageDriver = 'memory' | 'local' | 's3';

/** Either fresh input or a file already held by some storage. */
export type UploadSource = UploadIo | UploadedFile;

export type UploadOptions = {
  /**
   * The source is an uploaded file that may be moved instead of copied. Only
   * honoured when `canMove(source)` is true; otherwise the source is left alone.
   */
  move?: boolean;
  metadata?: Metadata;
};

/**
 * Options accepted by `url`. Backends read what they understand and ignore
 * the rest.
 */
export type UrlOptions = {
  /** Seconds a signed URL stays valid (object store only). */
  expiresIn?: number;
  host?: string;
  [option: string]: unknown;
};

export abstract class StorageService {
  abstract driver(): StorageDriver;

  abstract upload(source: UploadSource, id: string, options?: UploadOptions): Promise<void>;
  /** Lazy stream over the stored bytes; rejects with FileNotFoundError for unknown ids. */
  abstract open(id: string): Promise<Readable>;
  abstract exists(id: string): Promise<boolean>;
  /** Deleting an id that does not exist is not an error. */
  abstract delete(id: string): Promise<void>;
  abstract deletePrefixed(prefix: string): Promise<void>;
  abstract url(id: string, options?: UrlOptions): Promise<string>;

  canMove(_source: UploadSource): boolean {
    return false;
  }
}
