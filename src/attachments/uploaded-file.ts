// src/attachments/uploaded-file.ts

import { createWriteStream } from 'fs';
import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';

import type { StorageRegistry } from '../storage/storage.registry';
import type { StorageService, UrlOptions } from '../storage/storage.service';
import {
  extensionOf,
  freezeMetadata,
  Metadata,
  MetadataValue,
  parseMetadata,
  SerializedMetadata,
  serializeMetadata,
} from './metadata';

/** Persisted representation of one attachment. */
export type UploadedFileData = {
  id: string;
  storage_key: string;
  metadata: SerializedMetadata;
};

/**
 * Immutable reference to one stored object. Identity is `id` + `storageKey`;
 * metadata is informational.
 */
export class UploadedFile {
  readonly metadata: Metadata;

  constructor(
    readonly id: string,
    readonly storageKey: string,
    metadata: Metadata,
    private readonly registry: StorageRegistry,
  ) {
    this.metadata = freezeMetadata(metadata);
    Object.freeze(this);
  }

  static fromJSON(data: UploadedFileData, registry: StorageRegistry): UploadedFile {
    return new UploadedFile(data.id, data.storage_key, parseMetadata(data.metadata), registry);
  }

  get storage(): StorageService {
    return this.registry.get(this.storageKey);
  }

  get size(): number | null {
    return this.metadata.size;
  }

  get mimeType(): string | null {
    return this.metadata.mimeType;
  }

  get contentType(): string | null {
    return this.metadata.mimeType;
  }

  get originalFilename(): string | null {
    return this.metadata.filename;
  }

  get extension(): string | null {
    return extensionOf(this.id, this.metadata.filename);
  }

  /** Shorthand for metadata lookups by their persisted key. */
  get(key: string): MetadataValue | undefined {
    return serializeMetadata(this.metadata)[key];
  }

  open(): Promise<Readable> {
    return this.storage.open(this.id);
  }

  async read(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of await this.open()) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  async stream(destination: Writable): Promise<void> {
    await pipeline(await this.open(), destination);
  }

  /** Copies the content into a new temp file and returns its path. The caller removes it. */
  async download(): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'filebinder-'));
    const ext = this.extension;
    const path = join(dir, ext ? `download.${ext}` : 'download');
    await this.stream(createWriteStream(path));
    return path;
  }

  url(options?: UrlOptions): Promise<string> {
    return this.storage.url(this.id, options);
  }

  exists(): Promise<boolean> {
    return this.storage.exists(this.id);
  }

  delete(): Promise<void> {
    return this.storage.delete(this.id);
  }

  equals(other: UploadedFile | null | undefined): boolean {
    return !!other && other.id === this.id && other.storageKey === this.storageKey;
  }

  toJSON(): UploadedFileData {
    return {
      id: this.id,
      storage_key: this.storageKey,
      metadata: serializeMetadata(this.metadata),
    };
  }
}

/** Validates an untrusted value (a database column, a form field) as persisted file data. */
export function parseUploadedFileData(value: unknown): UploadedFileData | null {
  let data = value;
  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch {
      return null;
    }
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return null;
  if (!('id' in data) || !('storage_key' in data)) return null;

  const { id, storage_key } = data;
  if (typeof id !== 'string' || !id || typeof storage_key !== 'string' || !storage_key) return null;

  const metadata = 'metadata' in data ? data.metadata : undefined;
  return { id, storage_key, metadata: serializeMetadata(parseMetadata(metadata)) };
}
