// src/profiles/profile.schema.ts
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Schema as MongooseSchema } from 'mongoose';

import { dimensionsAnalyzer } from '../attachments/extractor/analyzers';
import { allowedMimeTypesValidator } from '../attachments/extractor/validators';
import { attachmentsPlugin } from '../attachments/mongoose/attachments.plugin';
import { contentTypes, dimensions, maxCount, maxSize } from '../attachments/mongoose/attachment-validators';
import type { Uploader } from '../attachments/uploader';
import type { UploaderProfile } from '../attachments/uploader.factory';

export type ProfileDocument = HydratedDocument<Profile>;

export const AVATAR_MAX_BYTES = 5 * 1024 * 1024;
export const DOCUMENT_MAX_BYTES = 20 * 1024 * 1024;
export const MAX_DOCUMENTS = 10;

export const AVATAR_UPLOADER: UploaderProfile = {
  prefix: 'avatars',
  maxBytes: AVATAR_MAX_BYTES,
  analyzers: [allowedMimeTypesValidator(['image/*'], 'avatar must be an image'), dimensionsAnalyzer()],
};

export const DOCUMENTS_UPLOADER: UploaderProfile = {
  prefix: 'documents',
  maxBytes: DOCUMENT_MAX_BYTES,
};

@Schema({ timestamps: true })
export class Profile {
  @Prop({ type: String, required: true, trim: true, minlength: 2, maxlength: 100 })
  name!: string;

  @Prop({ type: String, required: true, trim: true, lowercase: true, index: true, unique: true })
  email!: string;

  // written by the attachments plugin
  @Prop({ type: MongooseSchema.Types.Mixed, default: null })
  avatarData!: unknown;

  @Prop({ type: MongooseSchema.Types.Mixed, default: () => [] })
  documentsData!: unknown;

  createdAt?: Date;
  updatedAt?: Date;
}

export type ProfileUploaders = {
  avatar: Uploader;
  documents: Uploader;
};

/** A fresh schema with the avatar and documents attachments wired to `uploaders`. */
export function createProfileSchema(uploaders: ProfileUploaders): MongooseSchema<Profile> {
  const schema = SchemaFactory.createForClass(Profile);
  attachmentsPlugin(schema, {
    fields: {
      avatar: {
        cardinality: 'single',
        uploader: uploaders.avatar,
        validate: [
          contentTypes(['image/*']),
          maxSize(AVATAR_MAX_BYTES),
          dimensions({ width: [16, 4096], height: [16, 4096] }),
        ],
      },
      documents: {
        cardinality: 'many',
        uploader: uploaders.documents,
        validate: [maxCount(MAX_DOCUMENTS, `you can upload a maximum of ${MAX_DOCUMENTS} documents`)],
      },
    },
  });
  return schema;
}
