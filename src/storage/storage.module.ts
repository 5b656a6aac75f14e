// src/storage/storage.module.ts
import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';

import { ConfigurationError } from '../attachments/errors';
import { LocalStorageService } from './local-storage.service';
import { MemoryStorageService } from './memory-storage.service';
import { S3StorageService } from './s3-storage.service';
import { CACHE_STORAGE, STORE_STORAGE, StorageRegistry } from './storage.registry';
import type { StorageDriver, StorageService } from './storage.service';

export type StorageSettings = {
  driver: StorageDriver;
  uploadsDir: string;
  publicBase?: string;
  s3?: {
    bucket?: string;
    region: string;
    endpoint?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    forcePathStyle: boolean;
  };
};

/** `cache` and `store` on the configured driver, each under its own prefix. */
export function createStorageRegistry(settings: StorageSettings): StorageRegistry {
  const build = (prefix: string): StorageService => {
    switch (settings.driver) {
      case 'memory':
        return new MemoryStorageService();
      case 'local':
        return new LocalStorageService({
          directory: settings.uploadsDir,
          prefix,
          publicBase: settings.publicBase ?? '/uploads',
        });
      case 's3':
        return createS3Storage(settings, prefix);
    }
  };
  return new StorageRegistry({ [CACHE_STORAGE]: build(CACHE_STORAGE), [STORE_STORAGE]: build(STORE_STORAGE) });
}

function createS3Storage(settings: StorageSettings, prefix: string): S3StorageService {
  const s3 = settings.s3;
  if (!s3?.bucket) throw new ConfigurationError('S3_BUCKET is required for the s3 storage driver');

  const credentials =
    s3.accessKeyId && s3.secretAccessKey
      ? { accessKeyId: s3.accessKeyId, secretAccessKey: s3.secretAccessKey }
      : undefined;
  const client = new S3Client({
    region: s3.region,
    endpoint: s3.endpoint,
    forcePathStyle: s3.forcePathStyle,
    credentials,
  });

  return new S3StorageService({
    client,
    bucket: s3.bucket,
    prefix,
    region: s3.region,
    endpoint: s3.endpoint,
    forcePathStyle: s3.forcePathStyle,
    publicBase: settings.publicBase,
  });
}

export function storageSettingsFrom(config: ConfigService): StorageSettings {
  return {
    driver: config.getOrThrow<StorageDriver>('STORAGE_DRIVER'),
    uploadsDir: config.getOrThrow<string>('UPLOADS_DIR'),
    publicBase: config.get<string>('PUBLIC_BASE'),
    s3: {
      bucket: config.get<string>('S3_BUCKET'),
      region: config.getOrThrow<string>('S3_REGION'),
      endpoint: config.get<string>('S3_ENDPOINT'),
      accessKeyId: config.get<string>('S3_ACCESS_KEY_ID'),
      secretAccessKey: config.get<string>('S3_SECRET_ACCESS_KEY'),
      forcePathStyle: config.get<boolean>('S3_FORCE_PATH_STYLE') ?? false,
    },
  };
}

@Global()
@Module({
  providers: [
    {
      provide: StorageRegistry,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const settings = storageSettingsFrom(config);
        const registry = createStorageRegistry(settings).require(CACHE_STORAGE, STORE_STORAGE);
        new Logger('StorageModule').log(`storage driver=${settings.driver} keys=${registry.keys().join(',')}`);
        return registry;
      },
    },
  ],
  exports: [StorageRegistry],
})
export class StorageModule {}
