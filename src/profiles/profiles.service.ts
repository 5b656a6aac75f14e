// src/profiles/profiles.service.ts
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';

import type { UploadContext } from '../attachments/extractor/analyzer';
import { collectionAttachment, singleAttachment } from '../attachments/mongoose/attachments.plugin';
import type { UploadedFile } from '../attachments/uploaded-file';
import type { UploadIo } from '../attachments/upload-io';
import type { UrlOptions } from '../storage/storage.service';
import { Profile, ProfileDocument } from './profile.schema';
import { AttachmentView, CreateProfileDto, ProfileView } from './profiles.dto';

@Injectable()
export class ProfilesService {
  private readonly log = new Logger(ProfilesService.name);

  constructor(@InjectModel(Profile.name) private readonly profiles: Model<Profile>) {}

  async create(dto: CreateProfileDto): Promise<ProfileDocument> {
    const doc = new this.profiles({ name: dto.name, email: dto.email });
    await doc.save();
    this.log.log(`[create] profile=${doc._id.toString()}`);
    return doc;
  }

  async findOne(id: string): Promise<ProfileDocument> {
    if (!isValidObjectId(id)) throw new NotFoundException('Profile not found');
    const doc = await this.profiles.findById(id).exec();
    if (!doc) throw new NotFoundException('Profile not found');
    return doc;
  }

  /** Caches the upload, then promotes it as part of the save; the old avatar goes once the save succeeded. */
  async setAvatar(id: string, io: UploadIo, context: UploadContext = {}): Promise<ProfileDocument> {
    const doc = await this.findOne(id);
    await singleAttachment(doc, 'avatar').attach(io, context);
    await doc.save();
    return doc;
  }

  async removeAvatar(id: string): Promise<ProfileDocument> {
    const doc = await this.findOne(id);
    const avatar = singleAttachment(doc, 'avatar');
    if (!avatar.file) return doc;
    await avatar.attach(null);
    await doc.save();
    return doc;
  }

  async addDocument(id: string, io: UploadIo, context: UploadContext = {}): Promise<ProfileDocument> {
    const doc = await this.findOne(id);
    await collectionAttachment(doc, 'documents').add(io, context);
    await doc.save();
    return doc;
  }

  async removeDocument(id: string, fileId: string): Promise<ProfileDocument> {
    const doc = await this.findOne(id);
    const removed = await collectionAttachment(doc, 'documents').remove(fileId);
    if (!removed) throw new NotFoundException('Document not found');
    await doc.save();
    return doc;
  }

  async remove(id: string): Promise<void> {
    const doc = await this.findOne(id);
    await doc.deleteOne();
    this.log.log(`[remove] profile=${id}`);
  }

  async present(doc: ProfileDocument, options?: UrlOptions): Promise<ProfileView> {
    const avatar = singleAttachment(doc, 'avatar').file;
    const documents = collectionAttachment(doc, 'documents').files;
    return {
      id: doc._id.toString(),
      name: doc.name,
      email: doc.email,
      avatar: avatar ? await presentFile(avatar, options) : null,
      documents: await Promise.all(documents.map((file) => presentFile(file, options))),
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }
}

export async function presentFile(file: UploadedFile, options?: UrlOptions): Promise<AttachmentView> {
  const view: AttachmentView = {
    id: file.id,
    filename: file.originalFilename,
    mimeType: file.mimeType,
    size: file.size,
    url: await file.url(options),
  };
  const width = file.get('width');
  const height = file.get('height');
  if (typeof width === 'number' && typeof height === 'number') {
    view.width = width;
    view.height = height;
  }
  return view;
}
