// src/attachments/attachment-collection.ts

import { Logger } from '@nestjs/common';

import type { UrlOptions } from '../storage/storage.service';
import { Attacher, AttacherOptions } from './attacher';
import type { AttachmentField } from './attachment-field';
import type { UploadContext } from './extractor/analyzer';
import { parseUploadedFileData, UploadedFile, UploadedFileData } from './uploaded-file';
import type { Uploader } from './uploader';
import type { UploadIo } from './upload-io';

function parseCollectionData(data: unknown): unknown[] {
  let value = data;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return [];
    }
  }
  return Array.isArray(value) ? value : [];
}

/**
 * Ordered list of attachments, each with its own cache/store lifecycle.
 * `add`, `remove` and `clear` act on storage immediately; `assign` defers
 * deletion of already-saved files until `afterSave`.
 */
export class AttachmentCollection implements AttachmentField<UploadedFile[]> {
  private readonly log = new Logger(AttachmentCollection.name);
  readonly cardinality = 'many' as const;

  private items: Attacher[];
  /** Saved files dropped by `assign`, deleted once the record is saved. */
  private replaced: UploadedFile[] = [];
  private changed = false;

  constructor(
    readonly uploader: Uploader,
    private readonly options: AttacherOptions = {},
    files: UploadedFile[] = [],
  ) {
    this.items = files.map((file) => new Attacher(uploader, options, file));
  }

  static fromData(uploader: Uploader, data: unknown, options?: AttacherOptions): AttachmentCollection {
    const files: UploadedFile[] = [];
    for (const entry of parseCollectionData(data)) {
      const parsed = parseUploadedFileData(entry);
      if (parsed) files.push(UploadedFile.fromJSON(parsed, uploader.registry));
    }
    return new AttachmentCollection(uploader, options, files);
  }

  get files(): UploadedFile[] {
    const files: UploadedFile[] = [];
    for (const item of this.items) {
      if (item.file) files.push(item.file);
    }
    return files;
  }

  get value(): UploadedFile[] {
    return this.files;
  }

  get size(): number {
    return this.items.length;
  }

  get dirty(): boolean {
    return this.changed || this.items.some((item) => item.dirty);
  }

  find(id: string): UploadedFile | null {
    return this.files.find((file) => file.id === id) ?? null;
  }

  /** Uploads `io` to the cache storage and appends it. */
  async add(io: UploadIo, context: UploadContext = {}): Promise<UploadedFile> {
    const item = new Attacher(this.uploader, this.options);
    const file = await item.attach(io, context);
    this.items.push(item);
    this.changed = true;
    return file;
  }

  /**
   * Drops the matching element and deletes its object right away.
   * Returns false when nothing matches.
   */
  async remove(target: UploadedFile | string): Promise<boolean> {
    const index = this.items.findIndex((item) =>
      typeof target === 'string' ? item.file?.id === target : target.equals(item.file),
    );
    if (index < 0) return false;

    const [item] = this.items.splice(index, 1);
    this.changed = true;
    await item.destroyAttached();
    return true;
  }

  /** Empties the list and deletes every object it referenced. */
  async clear(): Promise<void> {
    const items = this.items;
    const replaced = this.replaced;
    this.items = [];
    this.replaced = [];
    this.changed = true;

    for (const item of items) await item.destroyAttached();
    for (const file of replaced) await file.delete();
  }

  /**
   * Replaces the whole list. The new files are uploaded first; if one fails,
   * the ones already uploaded are deleted and the list is left as it was.
   */
  async assign(ios: UploadIo[], context: UploadContext = {}): Promise<UploadedFile[]> {
    const next: Attacher[] = [];
    try {
      for (const io of ios) {
        const item = new Attacher(this.uploader, this.options);
        await item.attach(io, context);
        next.push(item);
      }
    } catch (err) {
      for (const item of next) await item.destroyAttached();
      throw err;
    }

    for (const item of this.items) {
      const saved = item.dirty ? item.previous : item.file;
      if (item.dirty && item.file) await item.file.delete();
      if (saved) this.replaced.push(saved);
    }

    this.items = next;
    this.changed = true;
    return this.files;
  }

  async promote(): Promise<void> {
    for (const item of this.items) await item.promote();
  }

  async persist(): Promise<void> {
    for (const item of this.items) await item.persist();

    const replaced = this.replaced;
    this.replaced = [];
    for (const file of replaced) await file.delete();
    if (replaced.length) this.log.debug(`[persist] deleted ${replaced.length} replaced file(s)`);

    this.changed = false;
  }

  async destroyAttached(): Promise<void> {
    for (const item of this.items) await item.destroyAttached();
    for (const file of this.replaced) await file.delete();
  }

  async urls(options?: UrlOptions): Promise<string[]> {
    const urls: string[] = [];
    for (const file of this.files) urls.push(await file.url(options));
    return urls;
  }

  toJSON(): UploadedFileData[] {
    return this.files.map((file) => file.toJSON());
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
}
