import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AttachmentsModule } from '../attachments/attachments.module';
import { UploaderFactory } from '../attachments/uploader.factory';
import { AVATAR_UPLOADER, createProfileSchema, DOCUMENTS_UPLOADER, Profile } from './profile.schema';
import { ProfilesController } from './profiles.controller';
import { ProfilesService } from './profiles.service';

@Module({
  imports: [
    MongooseModule.forFeatureAsync([
      {
        name: Profile.name,
        imports: [AttachmentsModule],
        inject: [UploaderFactory],
        useFactory: (uploaders: UploaderFactory) =>
          createProfileSchema({
            avatar: uploaders.create(AVATAR_UPLOADER),
            documents: uploaders.create(DOCUMENTS_UPLOADER),
          }),
      },
    ]),
  ],
  controllers: [ProfilesController],
  providers: [ProfilesService],
})
export class ProfilesModule {}
