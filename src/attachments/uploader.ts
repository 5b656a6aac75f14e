// src/attachments/uploader.ts

import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import type { StorageRegistry } from '../storage/storage.registry';
import type { UploadContext } from './extractor/analyzer';
import { MetadataExtractor } from './extractor/metadata-extractor';
import { extensionOf, Metadata } from './metadata';
import { UploadedFile } from './uploaded-file';
import type { UploadIo } from './upload-io';

export type LocationGenerator = (
  source: UploadIo | UploadedFile,
  metadata: Metadata,
  context: UploadContext,
) => string;

export type UploaderOptions = {
  extractor?: MetadataExtractor;
  generateLocation?: LocationGenerator;
};

/** Random token, suffixed with the extension when one can be derived. */
export function defaultLocation(source: UploadIo | UploadedFile, metadata: Metadata): string {
  const token = randomUUID().replace(/-/g, '');
  const ext = extensionOf(source instanceof UploadedFile ? source.id : '', metadata.filename);
  return ext ? `${token}.${ext}` : token;
}

/** `<prefix>/YYYY/MM/<token>.<ext>`, month taken in UTC. */
export function datePartitionedLocation(prefix: string, now: () => Date = () => new Date()): LocationGenerator {
  const base = prefix.replace(/^\/+|\/+$/g, '');
  return (source, metadata) => {
    const date = now();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return [base, String(date.getUTCFullYear()), month, defaultLocation(source, metadata)]
      .filter(Boolean)
      .join('/');
  };
}

export class Uploader {
  private readonly log = new Logger(Uploader.name);
  readonly extractor: MetadataExtractor;
  private readonly locationGenerator?: LocationGenerator;

  constructor(
    readonly registry: StorageRegistry,
    options: UploaderOptions = {},
  ) {
    this.extractor = options.extractor ?? MetadataExtractor.standard();
    this.locationGenerator = options.generateLocation;
  }

  /**
   * Extracts metadata (the validation checkpoint), then writes the bytes.
   * Nothing is stored when extraction throws.
   */
  async upload(io: UploadIo, storageKey: string, context: UploadContext = {}): Promise<UploadedFile> {
    const storage = this.registry.get(storageKey);
    const metadata = await this.extractor.extract(io, context);
    const id = context.location ?? this.generateLocation(io, metadata, context);

    await storage.upload(io, id, { metadata });

    this.log.debug(`[upload] storage=${storageKey} id=${id} size=${metadata.size ?? '-'}`);
    return new UploadedFile(id, storageKey, metadata, this.registry);
  }

  /**
   * Re-stores `file` in `toStorageKey` under a fresh id. Backends of the same
   * kind move it; otherwise it is copied and the source deleted afterwards.
   */
  async move(file: UploadedFile, toStorageKey: string): Promise<UploadedFile> {
    const storage = this.registry.get(toStorageKey);
    const id = this.generateLocation(file, file.metadata, {});

    const movable = storage.canMove(file);
    await storage.upload(file, id, { move: true, metadata: file.metadata });
    if (!movable) await file.delete();

    this.log.debug(`[move] ${file.storageKey}:${file.id} -> ${toStorageKey}:${id}`);
    return new UploadedFile(id, toStorageKey, file.metadata, this.registry);
  }

  /** Override point for structured paths; subclasses may replace it too. */
  generateLocation(source: UploadIo | UploadedFile, metadata: Metadata, context: UploadContext): string {
    return this.locationGenerator
      ? this.locationGenerator(source, metadata, context)
      : defaultLocation(source, metadata);
  }
}
