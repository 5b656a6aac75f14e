// src/attachments/attacher.ts

import { Logger } from '@nestjs/common';

import { CACHE_STORAGE, STORE_STORAGE } from '../storage/storage.registry';
import type { UrlOptions } from '../storage/storage.service';
import type { AttachmentField } from './attachment-field';
import { InvalidFileError } from './errors';
import type { UploadContext } from './extractor/analyzer';
import { parseUploadedFileData, UploadedFile, UploadedFileData } from './uploaded-file';
import type { Uploader } from './uploader';
import type { UploadIo } from './upload-io';

export type AttacherState = 'empty' | 'cached' | 'stored';

export type AttacherOptions = {
  cache?: string;
  store?: string;
};

function sameFile(a: UploadedFile | null, b: UploadedFile | null): boolean {
  return a === null ? b === null : a.equals(b);
}

/**
 * Lifecycle of a single attachment:
 *
 *   attach(io)  -> cached     upload to cache, superseded file kept as `previous`
 *   attach(null)-> empty
 *   promote()   cached -> stored (no-op otherwise)
 *   persist()   drop `previous`; only after the record write succeeded
 *
 * Operations must be awaited one after another; there is no locking.
 */
export class Attacher implements AttachmentField<UploadedFile | null> {
  private readonly log = new Logger(Attacher.name);
  readonly cardinality = 'single' as const;
  readonly cacheKey: string;
  readonly storeKey: string;

  private current: UploadedFile | null;
  /** What the owning record last saved. */
  private persisted: UploadedFile | null;

  constructor(
    readonly uploader: Uploader,
    options: AttacherOptions = {},
    file: UploadedFile | null = null,
  ) {
    this.cacheKey = options.cache ?? CACHE_STORAGE;
    this.storeKey = options.store ?? STORE_STORAGE;
    this.current = file;
    this.persisted = file;
  }

  /** Loads a persisted column value; null or unreadable data gives an empty attacher. */
  static fromData(uploader: Uploader, data: unknown, options?: AttacherOptions): Attacher {
    const parsed = parseUploadedFileData(data);
    const file = parsed ? UploadedFile.fromJSON(parsed, uploader.registry) : null;
    return new Attacher(uploader, options, file);
  }

  get file(): UploadedFile | null {
    return this.current;
  }

  get value(): UploadedFile | null {
    return this.current;
  }

  /** The persisted file a pending change supersedes; deleted by `persist()`. */
  get previous(): UploadedFile | null {
    return this.dirty ? this.persisted : null;
  }

  get dirty(): boolean {
    return !sameFile(this.current, this.persisted);
  }

  get state(): AttacherState {
    if (!this.current) return 'empty';
    return this.current.storageKey === this.cacheKey ? 'cached' : 'stored';
  }

  isCached(): boolean {
    return this.state === 'cached';
  }

  isStored(): boolean {
    return this.state === 'stored';
  }

  /**
   * Uploads `io` to the cache storage and makes it current; `null` empties the
   * field. If the upload fails nothing changes.
   */
  attach(io: UploadIo, context?: UploadContext): Promise<UploadedFile>;
  attach(io: null, context?: UploadContext): Promise<null>;
  attach(io: UploadIo | null, context?: UploadContext): Promise<UploadedFile | null>;
  async attach(io: UploadIo | null, context: UploadContext = {}): Promise<UploadedFile | null> {
    const next = io ? await this.uploader.upload(io, this.cacheKey, context) : null;
    await this.replaceCurrent(next);
    return next;
  }

  /**
   * Assigns a file that is already in the cache storage, given in its
   * persisted form (object or JSON string), e.g. from a previous form submit.
   */
  async attachCached(value: unknown): Promise<UploadedFile> {
    const data = parseUploadedFileData(value);
    if (!data) throw new InvalidFileError('attachment data is not a valid file reference');
    if (data.storage_key !== this.cacheKey) {
      throw new InvalidFileError(`expected a file in "${this.cacheKey}" storage, got "${data.storage_key}"`);
    }
    const file = UploadedFile.fromJSON(data, this.uploader.registry);
    if (!(await file.exists())) {
      throw new InvalidFileError('cached file no longer exists');
    }
    await this.replaceCurrent(file);
    return file;
  }

  async promote(): Promise<void> {
    const file = this.current;
    if (!file || !this.isCached()) return;
    this.current = await this.uploader.move(file, this.storeKey);
    this.log.debug(`[promote] ${file.id} -> ${this.storeKey}:${this.current.id}`);
  }

  /** Deletes the superseded file. Call only once the record write is durable. */
  async persist(): Promise<void> {
    if (!this.dirty) return;
    const previous = this.persisted;
    if (previous) {
      await previous.delete();
      this.log.debug(`[persist] deleted previous ${previous.storageKey}:${previous.id}`);
    }
    this.persisted = this.current;
  }

  /** Removes the attached file (and a still-pending superseded one) from storage. */
  async destroyAttached(): Promise<void> {
    if (this.current) await this.current.delete();
    const previous = this.previous;
    if (previous) await previous.delete();
  }

  async url(options?: UrlOptions): Promise<string | null> {
    return this.current ? this.current.url(options) : null;
  }

  toJSON(): UploadedFileData | null {
    return this.current ? this.current.toJSON() : null;
  }

  beforeSave(): Promise<void> {
    return this.promote();
  }

  afterSave(): Promise<void> {
    return this.persist();
  }

  afterDestroy(): Promise<void> {
    return this.destroyAttached();
  }

  /**
   * A superseded file that was never persisted is referenced by nothing, so
   * it goes right away; the persisted one waits for `persist()`.
   */
  private async replaceCurrent(next: UploadedFile | null): Promise<void> {
    const superseded = this.current;
    if (superseded && !superseded.equals(this.persisted) && !superseded.equals(next)) {
      await superseded.delete();
    }
    this.current = next;
  }
}
