import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';

import { AttachmentsModule } from './attachments/attachments.module';
import { validateEnvironment } from './config/env.validation';
import { databaseFromUri, maskMongoUri } from './config/mongo-uri';
import { ProfilesModule } from './profiles/profiles.module';
import { StorageModule } from './storage/storage.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnvironment }),

    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => {
        const uri = cfg.getOrThrow<string>('MONGODB_URI');
        const isSrv = uri.startsWith('mongodb+srv://'); // Atlas-style SRV
        const dbName = databaseFromUri(uri) || cfg.get<string>('MONGODB_DB') || 'filebinder';

        new Logger('MongooseModule').log(`connecting to ${maskMongoUri(uri)} db=${dbName}`);

        return {
          uri,
          dbName,
          serverSelectionTimeoutMS: 8000,
          // single host (local, docker) skips replica discovery
          directConnection: !isSrv,
          tls: isSrv,
          maxPoolSize: 10,
          autoIndex: (cfg.get<string>('NODE_ENV') ?? 'development') !== 'production',
          appName: 'filebinder',
        };
      },
    }),

    StorageModule,
    AttachmentsModule,
    ProfilesModule,
  ],
})
export class AppModule {}
