// src/attachments/uploader.factory.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { StorageRegistry } from '../storage/storage.registry';
import type { Analyzer } from './extractor/analyzer';
import type { MimeTypeStrategy } from './extractor/analyzers';
import { MetadataExtractor } from './extractor/metadata-extractor';
import { maxSizeValidator } from './extractor/validators';
import { datePartitionedLocation, Uploader } from './uploader';

export type UploaderProfile = {
  /** Files go under `<prefix>/YYYY/MM/`; random top-level ids when omitted. */
  prefix?: string;
  /** Per-uploader limit, capped by MAX_UPLOAD_BYTES. */
  maxBytes?: number;
  /** Extra analyzers and validators, run after the built-ins. */
  analyzers?: Analyzer[];
};

/** Builds uploaders on the shared registry with the configured extraction defaults. */
@Injectable()
export class UploaderFactory {
  constructor(
    private readonly registry: StorageRegistry,
    private readonly config: ConfigService,
  ) {}

  create(profile: UploaderProfile = {}): Uploader {
    const globalMax = this.config.get<number>('MAX_UPLOAD_BYTES') ?? 50 * 1024 * 1024;
    const maxBytes = Math.min(profile.maxBytes ?? globalMax, globalMax);
    const mimeType = this.config.get<MimeTypeStrategy>('MIME_ANALYZER') ?? 'sniff';

    const extractor = MetadataExtractor.standard({
      mimeType,
      analyzers: [maxSizeValidator(maxBytes), ...(profile.analyzers ?? [])],
    });

    return new Uploader(this.registry, {
      extractor,
      generateLocation: profile.prefix ? datePartitionedLocation(profile.prefix) : undefined,
    });
  }
}
