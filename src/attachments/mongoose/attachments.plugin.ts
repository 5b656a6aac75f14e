// src/attachments/mongoose/attachments.plugin.ts

import { Document, Error as MongooseError, Schema } from 'mongoose';

import { AttachmentCollection } from '../attachment-collection';
import { createAttachmentField, AttachmentDefinition, Cardinality } from '../attachment-field';
import { Attacher } from '../attacher';
import { ConfigurationError } from '../errors';
import type { AttachmentValidator } from './attachment-validators';

export type AttachmentFieldConfig = AttachmentDefinition & {
  validate?: AttachmentValidator[];
};

export type AttachmentsPluginOptions = {
  fields: Record<string, AttachmentFieldConfig>;
};

type FieldInstance = Attacher | AttachmentCollection;

const schemaFields = new WeakMap<object, Record<string, AttachmentFieldConfig>>();
const documentFields = new WeakMap<Document, Map<string, FieldInstance>>();

/** `avatar` -> `avatarData` */
export function attachmentColumn(name: string): string {
  return `${name}Data`;
}

function configFor(doc: Document, name: string): AttachmentFieldConfig {
  const config = schemaFields.get(doc.schema)?.[name];
  if (!config) throw new ConfigurationError(`no attachment "${name}" on this schema`);
  return config;
}

function loadedFields(doc: Document): Map<string, FieldInstance> {
  let fields = documentFields.get(doc);
  if (!fields) {
    fields = new Map();
    documentFields.set(doc, fields);
  }
  return fields;
}

function fieldOf(doc: Document, name: string): FieldInstance {
  const fields = loadedFields(doc);
  const existing = fields.get(name);
  if (existing) return existing;

  const config = configFor(doc, name);
  const data: unknown = doc.get(attachmentColumn(name));
  const field = createAttachmentField(config, data);
  fields.set(name, field);
  return field;
}

function wrongCardinality(name: string, expected: Cardinality): ConfigurationError {
  const kind = expected === 'single' ? 'single-file' : 'collection';
  return new ConfigurationError(`attachment "${name}" is not a ${kind} attachment`);
}

/** The single-file attacher behind `name`, loaded from its column on first use. */
export function singleAttachment(doc: Document, name: string): Attacher {
  const field = fieldOf(doc, name);
  if (!(field instanceof Attacher)) throw wrongCardinality(name, 'single');
  return field;
}

export function collectionAttachment(doc: Document, name: string): AttachmentCollection {
  const field = fieldOf(doc, name);
  if (!(field instanceof AttachmentCollection)) throw wrongCardinality(name, 'many');
  return field;
}

/**
 * Stores each attachment field as a Mixed `<name>Data` column and wires the
 * attacher lifecycle into document middleware:
 *
 *   pre('validate')  attachment validators
 *   pre('save')      promote, then write the column
 *   post('save')     delete superseded files
 *   post('deleteOne', document) delete attached files
 */
export function attachmentsPlugin<T>(schema: Schema<T>, options: AttachmentsPluginOptions): void {
  const names = Object.keys(options.fields);
  schemaFields.set(schema, { ...schemaFields.get(schema), ...options.fields });

  for (const name of names) {
    const column = attachmentColumn(name);
    if (!schema.path(column)) {
      const many = options.fields[name].cardinality === 'many';
      schema.add(new Schema({ [column]: { type: Schema.Types.Mixed, default: many ? () => [] : null } }, { _id: false }));
    }
  }

  schema.pre<Document>('validate', async function () {
    let error: MongooseError.ValidationError | null = null;
    for (const name of names) {
      const validators = options.fields[name].validate ?? [];
      if (!validators.length) continue;

      const field = fieldOf(this, name);
      const files = field instanceof Attacher ? (field.file ? [field.file] : []) : field.files;
      const messages = validators.flatMap((validator) => validator(files));
      if (!messages.length) continue;

      error ??= new MongooseError.ValidationError();
      error.addError(
        name,
        new MongooseError.ValidatorError({ message: messages.join(', '), path: name, type: 'attachment' }),
      );
    }
    if (error) throw error;
  });

  schema.pre<Document>('save', async function () {
    for (const [name, field] of loadedFields(this)) {
      if (!names.includes(name) || !field.dirty) continue;
      await field.beforeSave();
      this.set(attachmentColumn(name), field.toJSON());
      this.markModified(attachmentColumn(name));
    }
  });

  schema.post<Document>('save', async function () {
    for (const [name, field] of loadedFields(this)) {
      if (names.includes(name)) await field.afterSave();
    }
  });

  schema.post<Document>('deleteOne', { document: true, query: false }, async function () {
    for (const name of names) await fieldOf(this, name).afterDestroy();
  });
}
