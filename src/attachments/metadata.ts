// src/attachments/metadata.ts

import { extname } from 'path';

export type MetadataValue = string | number | boolean | null;

export type Metadata = {
  size: number | null;
  mimeType: string | null;
  filename: string | null;
  /** Analyzer-contributed fields (checksum, width, height, ...), in insertion order. */
  extra: Readonly<Record<string, MetadataValue>>;
};

/** What a single analyzer contributes. */
export type MetadataPatch = {
  size?: number | null;
  mimeType?: string | null;
  filename?: string | null;
  extra?: Record<string, MetadataValue>;
};

/** Persisted form: well-known keys always present (null when unknown), extras flattened beside them. */
export type SerializedMetadata = {
  size: number | null;
  mime_type: string | null;
  filename: string | null;
  [key: string]: MetadataValue;
};

const WELL_KNOWN_KEYS = new Set(['size', 'mime_type', 'filename']);

export function emptyMetadata(): Metadata {
  return { size: null, mimeType: null, filename: null, extra: {} };
}

export function applyMetadataPatch(base: Metadata, patch: MetadataPatch): Metadata {
  return {
    size: patch.size !== undefined ? patch.size : base.size,
    mimeType: patch.mimeType !== undefined ? patch.mimeType : base.mimeType,
    filename: patch.filename !== undefined ? patch.filename : base.filename,
    extra: patch.extra ? { ...base.extra, ...patch.extra } : base.extra,
  };
}

export function freezeMetadata(metadata: Metadata): Metadata {
  return Object.freeze({ ...metadata, extra: Object.freeze({ ...metadata.extra }) });
}

export function serializeMetadata(metadata: Metadata): SerializedMetadata {
  const out: SerializedMetadata = {
    size: metadata.size,
    mime_type: metadata.mimeType,
    filename: metadata.filename,
  };
  for (const [key, value] of Object.entries(metadata.extra)) {
    if (WELL_KNOWN_KEYS.has(key)) continue;
    out[key] = value;
  }
  return out;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/**
 * Reads a persisted metadata object. Missing well-known keys become null,
 * extras that are not scalars are dropped.
 */
export function parseMetadata(value: unknown): Metadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return emptyMetadata();
  }

  const extra: Record<string, MetadataValue> = {};
  let size: number | null = null;
  let mimeType: string | null = null;
  let filename: string | null = null;

  for (const [key, raw] of Object.entries(value)) {
    switch (key) {
      case 'size':
        size = typeof raw === 'number' && Number.isInteger(raw) && raw >= 0 ? raw : null;
        break;
      case 'mime_type':
        mimeType = typeof raw === 'string' ? raw : null;
        break;
      case 'filename':
        filename = typeof raw === 'string' ? raw : null;
        break;
      default:
        if (isMetadataValue(raw)) extra[key] = raw;
    }
  }

  return { size, mimeType, filename, extra };
}

/**
 * Extension (lower case, without the dot) taken from the id, falling back to
 * the original filename. Returns null whenever neither carries one.
 */
export function extensionOf(id: string, filename?: string | null): string | null {
  const fromId = suffix(id);
  if (fromId) return fromId;
  return filename ? suffix(filename) : null;
}

function suffix(name: string): string | null {
  const ext = extname(name);
  if (ext.length <= 1) return null;
  return ext.slice(1).toLowerCase();
}
