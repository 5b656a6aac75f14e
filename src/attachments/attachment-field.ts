// src/attachments/attachment-field.ts

import { AttachmentCollection } from './attachment-collection';
import { Attacher, AttacherOptions } from './attacher';
import type { UploadedFile, UploadedFileData } from './uploaded-file';
import type { Uploader } from './uploader';

export type Cardinality = 'single' | 'many';

/**
 * The three callbacks a record layer invokes around its own write:
 * beforeSave -> (record write) -> afterSave, and afterDestroy once the record is gone.
 * afterSave must only run after the write succeeded.
 */
export interface AttachmentLifecycle {
  beforeSave(): Promise<void>;
  afterSave(): Promise<void>;
  afterDestroy(): Promise<void>;
}

/** One attachment field on one record instance. */
export interface AttachmentField<T> extends AttachmentLifecycle {
  readonly cardinality: Cardinality;
  readonly value: T;
  readonly dirty: boolean;
  toJSON(): UploadedFileData | null | UploadedFileData[];
}

export type SingleAttachmentField = AttachmentField<UploadedFile | null>;
export type CollectionAttachmentField = AttachmentField<UploadedFile[]>;

export type AttachmentDefinition<C extends Cardinality = Cardinality> = {
  cardinality: C;
  uploader: Uploader;
  storages?: AttacherOptions;
};

export function createAttachmentField(definition: AttachmentDefinition<'single'>, data?: unknown): Attacher;
export function createAttachmentField(definition: AttachmentDefinition<'many'>, data?: unknown): AttachmentCollection;
export function createAttachmentField(
  definition: AttachmentDefinition,
  data?: unknown,
): Attacher | AttachmentCollection;
export function createAttachmentField(
  definition: AttachmentDefinition,
  data?: unknown,
): Attacher | AttachmentCollection {
  return definition.cardinality === 'single'
    ? Attacher.fromData(definition.uploader, data, definition.storages)
    : AttachmentCollection.fromData(definition.uploader, data, definition.storages);
}
