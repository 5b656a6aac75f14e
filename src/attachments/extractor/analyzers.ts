// src/attachments/extractor/analyzers.ts

import { createHash } from 'crypto';
import { fromBuffer } from 'file-type';
import { imageSize } from 'image-size';

import { describeError, InvalidFileError } from '../errors';
import { extensionOf, MetadataValue } from '../metadata';
import type { UploadIo } from '../upload-io';
import type { Analyzer, AnalyzerContext } from './analyzer';
import mimeTypes from './mime-types.json';

export type MimeTypeStrategy = 'sniff' | 'extension' | 'trust';

/* ========================================================================== */
/*                                 BUILT-INS                                   */
/* ========================================================================== */

export function sizeAnalyzer(): Analyzer {
  return {
    name: 'size',
    analyze: async (io) => ({ size: await io.size() }),
  };
}

/** Caller-supplied filename, path segments stripped. */
export function filenameAnalyzer(): Analyzer {
  return {
    name: 'filename',
    analyze: async (io, { upload }) => {
      const raw = upload.filename ?? io.filename;
      if (!raw) return { filename: null };
      const base = raw.replace(/\\/g, '/').split('/').pop() ?? '';
      return { filename: base || null };
    },
  };
}

/** file-type needs at most this many bytes to recognise a format. */
const SNIFF_BYTES = 4100;

const EXTENSION_TYPES: Readonly<Record<string, string>> = mimeTypes;

export function mimeTypeFromExtension(filename: string | null | undefined): string | null {
  if (!filename) return null;
  const ext = extensionOf('', filename);
  return ext ? (EXTENSION_TYPES[ext] ?? null) : null;
}

function normalizeContentType(value: string | null | undefined): string | null {
  const type = value?.split(';')[0]?.trim().toLowerCase();
  return type ? type : null;
}

export function mimeTypeAnalyzer(strategy: MimeTypeStrategy = 'sniff'): Analyzer {
  return {
    name: `mime_type:${strategy}`,
    analyze: async (io, { metadata, upload }) => {
      switch (strategy) {
        case 'trust':
          return { mimeType: normalizeContentType(upload.contentType ?? io.contentType) };
        case 'extension':
          return { mimeType: mimeTypeFromExtension(metadata.filename ?? upload.filename ?? io.filename) };
        case 'sniff': {
          const head = await io.head(SNIFF_BYTES);
          if (!head.length) return { mimeType: null };
          const detected = await fromBuffer(head);
          if (detected) return { mimeType: detected.mime };
          // no known signature: text unless the head has NUL bytes
          return { mimeType: head.includes(0) ? null : 'text/plain' };
        }
      }
    },
  };
}

/* ========================================================================== */
/*                                  PLUGINS                                    */
/* ========================================================================== */

export function checksumAnalyzer(
  algorithm: 'md5' | 'sha1' | 'sha256' | 'sha512' = 'sha256',
  encoding: 'hex' | 'base64' = 'hex',
): Analyzer {
  return {
    name: `checksum:${algorithm}`,
    analyze: async (io) => {
      const hash = createHash(algorithm);
      for await (const chunk of io.open()) hash.update(chunk);
      return { extra: { [algorithm]: hash.digest(encoding) } };
    },
  };
}

/** Width and height for images; other types are left alone. */
export function dimensionsAnalyzer(): Analyzer {
  return {
    name: 'dimensions',
    analyze: async (io, { metadata }) => {
      if (!metadata.mimeType?.startsWith('image/')) return;
      let width: number | undefined;
      let height: number | undefined;
      try {
        ({ width, height } = imageSize(await io.read()));
      } catch (err) {
        throw new InvalidFileError(`could not read image dimensions: ${describeError(err)}`);
      }
      if (width === undefined || height === undefined) {
        throw new InvalidFileError('could not read image dimensions');
      }
      return { extra: { width, height } };
    },
  };
}

export type CustomAnalyzerResult = MetadataValue | Record<string, MetadataValue>;

/**
 * Declares an extra metadata field. A scalar result is stored under `name`,
 * an object result is merged key by key.
 */
export function customAnalyzer(
  name: string,
  fn: (io: UploadIo, context: AnalyzerContext) => CustomAnalyzerResult | Promise<CustomAnalyzerResult>,
): Analyzer {
  return {
    name,
    analyze: async (io, context) => {
      const result = await fn(io, context);
      if (result !== null && typeof result === 'object') return { extra: result };
      return { extra: { [name]: result } };
    },
  };
}
