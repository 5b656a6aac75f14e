// src/attachments/mongoose/attachment-validators.ts

import { matchesContentType } from '../extractor/validators';
import type { UploadedFile } from '../uploaded-file';

/**
 * Record-level check over the files currently attached to one field.
 * Returns the messages to report; empty means valid.
 */
export type AttachmentValidator = (files: readonly UploadedFile[]) => string[];

export type DimensionRange = readonly [min: number, max: number];

function perFile(files: readonly UploadedFile[], check: (file: UploadedFile) => string | null): string[] {
  const messages: string[] = [];
  for (const file of files) {
    const message = check(file);
    if (message && !messages.includes(message)) messages.push(message);
  }
  return messages;
}

export function required(message = 'must be attached'): AttachmentValidator {
  return (files) => (files.length ? [] : [message]);
}

export function maxSize(bytes: number, message?: string): AttachmentValidator {
  return (files) =>
    perFile(files, (file) =>
      file.size !== null && file.size > bytes ? message ?? `is too large (maximum is ${bytes} bytes)` : null,
    );
}

export function minSize(bytes: number, message?: string): AttachmentValidator {
  return (files) =>
    perFile(files, (file) =>
      file.size !== null && file.size < bytes ? message ?? `is too small (minimum is ${bytes} bytes)` : null,
    );
}

/** Files without a detected type pass; pair with an extraction-time check to reject those. */
export function contentTypes(accept: readonly string[], message = 'has invalid content type'): AttachmentValidator {
  return (files) =>
    perFile(files, (file) => {
      const type = file.mimeType;
      if (!type) return null;
      return accept.some((pattern) => matchesContentType(type, pattern)) ? null : message;
    });
}

export function rejectContentTypes(
  reject: readonly string[],
  message = 'has forbidden content type',
): AttachmentValidator {
  return (files) =>
    perFile(files, (file) => {
      const type = file.mimeType;
      if (!type) return null;
      return reject.some((pattern) => matchesContentType(type, pattern)) ? message : null;
    });
}

function checkDimension(axis: 'width' | 'height', actual: number, expected: number | DimensionRange): string | null {
  if (typeof expected === 'number') {
    return actual === expected ? null : `${axis} must be ${expected} pixels`;
  }
  const [min, max] = expected;
  return actual >= min && actual <= max ? null : `${axis} must be between ${min} and ${max} pixels`;
}

/** Uses the width/height extras written by the dimensions analyzer; files without them pass. */
export function dimensions(
  expected: { width?: number | DimensionRange; height?: number | DimensionRange },
  message?: string,
): AttachmentValidator {
  return (files) => {
    const messages: string[] = [];
    for (const file of files) {
      const width = file.get('width');
      const height = file.get('height');
      if (typeof width !== 'number' || typeof height !== 'number') continue;

      const failures = [
        expected.width === undefined ? null : checkDimension('width', width, expected.width),
        expected.height === undefined ? null : checkDimension('height', height, expected.height),
      ];
      for (const failure of failures) {
        const text = failure && (message ?? failure);
        if (text && !messages.includes(text)) messages.push(text);
      }
    }
    return messages;
  };
}

export function maxCount(count: number, message?: string): AttachmentValidator {
  return (files) => (files.length > count ? [message ?? `too many files (maximum is ${count})`] : []);
}

export function minCount(count: number, message?: string): AttachmentValidator {
  return (files) => (files.length < count ? [message ?? `too few files (minimum is ${count})`] : []);
}
