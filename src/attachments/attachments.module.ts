// src/attachments/attachments.module.ts
import { Module } from '@nestjs/common';

import { StorageModule } from '../storage/storage.module';
import { UploaderFactory } from './uploader.factory';

@Module({
  imports: [StorageModule],
  providers: [UploaderFactory],
  exports: [UploaderFactory],
})
export class AttachmentsModule {}
