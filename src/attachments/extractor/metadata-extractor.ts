// src/attachments/extractor/metadata-extractor.ts

import { applyMetadataPatch, emptyMetadata, Metadata } from '../metadata';
import type { UploadIo } from '../upload-io';
import type { Analyzer, UploadContext } from './analyzer';
import { filenameAnalyzer, MimeTypeStrategy, mimeTypeAnalyzer, sizeAnalyzer } from './analyzers';

export type StandardExtractorOptions = {
  mimeType?: MimeTypeStrategy;
  /** Runs after the built-ins, in order. */
  analyzers?: Analyzer[];
};

/**
 * Ordered analyzer pipeline. Each analyzer sees the input from its first byte
 * and the metadata gathered so far; the first one to throw aborts extraction.
 */
export class MetadataExtractor {
  readonly analyzers: readonly Analyzer[];

  constructor(analyzers: Analyzer[]) {
    this.analyzers = Object.freeze([...analyzers]);
  }

  static standard(options: StandardExtractorOptions = {}): MetadataExtractor {
    return new MetadataExtractor([
      filenameAnalyzer(),
      sizeAnalyzer(),
      mimeTypeAnalyzer(options.mimeType ?? 'sniff'),
      ...(options.analyzers ?? []),
    ]);
  }

  /** New extractor with `analyzers` appended. */
  with(...analyzers: Analyzer[]): MetadataExtractor {
    return new MetadataExtractor([...this.analyzers, ...analyzers]);
  }

  async extract(io: UploadIo, upload: UploadContext = {}): Promise<Metadata> {
    let metadata = emptyMetadata();
    for (const analyzer of this.analyzers) {
      const patch = await analyzer.analyze(io, { metadata, upload });
      if (patch) metadata = applyMetadataPatch(metadata, patch);
    }
    if (upload.metadata) {
      metadata = applyMetadataPatch(metadata, { extra: upload.metadata });
    }
    return metadata;
  }
}
