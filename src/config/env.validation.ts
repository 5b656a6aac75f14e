// src/config/env.validation.ts
import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Min, ValidateIf, validateSync } from 'class-validator';

import { ConfigurationError } from '../attachments/errors';
import type { MimeTypeStrategy } from '../attachments/extractor/analyzers';
import type { StorageDriver } from '../storage/storage.service';

export const STORAGE_DRIVERS: StorageDriver[] = ['memory', 'local', 's3'];
export const MIME_ANALYZERS: MimeTypeStrategy[] = ['sniff', 'extension', 'trust'];

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  PORT: number = 4000;

  @IsString()
  MONGODB_URI: string = 'mongodb://127.0.0.1:27017/filebinder';

  @IsOptional()
  @IsString()
  MONGODB_DB?: string;

  @IsIn(STORAGE_DRIVERS)
  STORAGE_DRIVER: StorageDriver = 'local';

  @IsString()
  UPLOADS_DIR: string = 'uploads';

  @IsOptional()
  @IsString()
  PUBLIC_BASE?: string;

  // required only for the s3 driver
  @ValidateIf((env: EnvironmentVariables) => env.STORAGE_DRIVER === 's3')
  @IsString()
  S3_BUCKET?: string;

  @IsString()
  S3_REGION: string = 'us-east-1';

  @IsOptional()
  @IsString()
  S3_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  S3_ACCESS_KEY_ID?: string;

  @IsOptional()
  @IsString()
  S3_SECRET_ACCESS_KEY?: string;

  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  S3_FORCE_PATH_STYLE: boolean = false;

  @IsIn(MIME_ANALYZERS)
  MIME_ANALYZER: MimeTypeStrategy = 'sniff';

  @IsInt()
  @Min(1)
  MAX_UPLOAD_BYTES: number = 50 * 1024 * 1024;

  @IsOptional()
  @IsString()
  ORIGINS?: string;
}

/** `ConfigModule.forRoot({ validate })` hook: applies defaults and rejects bad values at boot. */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length) {
    const details = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new ConfigurationError(`invalid environment: ${details.join('; ')}`);
  }
  return env;
}
