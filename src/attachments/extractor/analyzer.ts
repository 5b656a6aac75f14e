// src/attachments/extractor/analyzer.ts

import type { Metadata, MetadataPatch, MetadataValue } from '../metadata';
import type { UploadIo } from '../upload-io';

/** What the caller knows about an upload beyond its bytes. */
export type UploadContext = {
  filename?: string | null;
  /** Content type as reported by the client, only trusted by the "trust" strategy. */
  contentType?: string | null;
  /** Fixed storage id, skips location generation. */
  location?: string;
  /** Extra metadata merged after all analyzers ran. */
  metadata?: Record<string, MetadataValue>;
};

export type AnalyzerContext = {
  /** Metadata produced by the analyzers that ran before this one. */
  metadata: Metadata;
  upload: UploadContext;
};

export interface Analyzer {
  readonly name: string;
  /**
   * Reads `io` from the start and returns the fields it contributes. Throwing
   * InvalidFileError rejects the upload.
   */
  analyze(io: UploadIo, context: AnalyzerContext): Promise<MetadataPatch | void>;
}
