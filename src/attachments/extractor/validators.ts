// src/attachments/extractor/validators.ts

import { InvalidFileError } from '../errors';
import type { Analyzer } from './analyzer';

/** `image/*` style wildcard match, case-insensitive. */
export function matchesContentType(actual: string, pattern: string): boolean {
  const a = actual.toLowerCase();
  const p = pattern.toLowerCase();
  if (!p.includes('*')) return a === p;
  const escaped = p.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\/]/g, '\\$&'));
  return new RegExp(`^${escaped.join('.*')}$`).test(a);
}

export function maxSizeValidator(maxBytes: number, message?: string): Analyzer {
  return {
    name: 'validate:max_size',
    analyze: async (io, { metadata }) => {
      const size = metadata.size ?? (await io.size());
      if (size > maxBytes) {
        throw new InvalidFileError(message ?? `file is too large (maximum is ${maxBytes} bytes)`);
      }
    },
  };
}

export function minSizeValidator(minBytes: number, message?: string): Analyzer {
  return {
    name: 'validate:min_size',
    analyze: async (io, { metadata }) => {
      const size = metadata.size ?? (await io.size());
      if (size < minBytes) {
        throw new InvalidFileError(message ?? `file is too small (minimum is ${minBytes} bytes)`);
      }
    },
  };
}

/** Rejects anything whose detected type matches none of `patterns`, including undetected types. */
export function allowedMimeTypesValidator(patterns: readonly string[], message?: string): Analyzer {
  return {
    name: 'validate:mime_type',
    analyze: async (_io, { metadata }) => {
      const type = metadata.mimeType;
      if (!type || !patterns.some((pattern) => matchesContentType(type, pattern))) {
        throw new InvalidFileError(message ?? `file type ${type ?? 'unknown'} is not allowed`);
      }
    },
  };
}
