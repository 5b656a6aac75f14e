// src/attachments/errors.ts

export abstract class AttachmentError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by `open` when the id does not exist on the storage. */
export class FileNotFoundError extends AttachmentError {
  readonly code = 'file_not_found';

  constructor(
    readonly id: string,
    readonly storageKey?: string,
  ) {
    super(`file ${JSON.stringify(id)} not found on storage${storageKey ? ` "${storageKey}"` : ''}`);
  }
}

/**
 * Rejection raised while extracting metadata. Nothing has been written to a
 * storage when this is thrown.
 */
export class InvalidFileError extends AttachmentError {
  readonly code = 'invalid_file';

  constructor(readonly reason: string) {
    super(reason);
  }
}

export class ConfigurationError extends AttachmentError {
  readonly code = 'configuration_error';
}

export class StorageIOError extends AttachmentError {
  readonly code = 'storage_io_error';
  readonly retryable = true;

  constructor(
    readonly operation: string,
    readonly id: string,
    cause: unknown,
  ) {
    super(`${operation} ${JSON.stringify(id)} failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}
