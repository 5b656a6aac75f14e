// src/storage/s3-storage.service.ts
import { Logger } from '@nestjs/common';
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  paginateListObjectsV2,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { Readable } from 'stream';

import { FileNotFoundError, StorageIOError } from '../attachments/errors';
import { UploadedFile } from '../attachments/uploaded-file';
import { StorageDriver, StorageService, UploadOptions, UploadSource, UrlOptions } from './storage.service';

export type S3StorageOptions = {
  client: S3Client;
  bucket: string;
  /** Key namespace inside the bucket ("cache", "store"). */
  prefix?: string;
  region?: string;
  /** Custom endpoint (MinIO, R2, ...). */
  endpoint?: string;
  forcePathStyle?: boolean;
  /** CDN or public bucket URL used for unsigned urls. */
  publicBase?: string;
};

const DELETE_BATCH = 1000;

/** Percent-encodes each segment of an object key, keeping the slashes. */
function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

export function isMissingObject(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === 'NoSuchKey' || err.name === 'NotFound' || err.$metadata?.httpStatusCode === 404;
}

export class S3StorageService extends StorageService {
  private readonly log = new Logger(S3StorageService.name);
  readonly client: S3Client;
  readonly bucket: string;
  readonly prefix: string;

  constructor(private readonly options: S3StorageOptions) {
    super();
    this.client = options.client;
    this.bucket = options.bucket;
    this.prefix = (options.prefix ?? '').replace(/^\/+|\/+$/g, '');
  }

  driver(): StorageDriver {
    return 's3';
  }

  key(id: string): string {
    return this.prefix ? `${this.prefix}/${id}` : id;
  }

  canMove(source: UploadSource): boolean {
    return source instanceof UploadedFile && source.storage instanceof S3StorageService;
  }

  async upload(source: UploadSource, id: string, options: UploadOptions = {}): Promise<void> {
    const key = this.key(id);
    const contentType = options.metadata?.mimeType ?? undefined;
    const filename = options.metadata?.filename;
    const contentDisposition = filename
      ? `inline; filename*=UTF-8''${encodeURIComponent(filename)}`
      : undefined;

    const sourceStorage = source instanceof UploadedFile ? source.storage : null;
    if (source instanceof UploadedFile && sourceStorage instanceof S3StorageService) {
      // server side copy; S3 has no rename, so a move is copy + delete
      try {
        await this.client.send(
          new CopyObjectCommand({
            Bucket: this.bucket,
            Key: key,
            CopySource: `${sourceStorage.bucket}/${encodeKey(sourceStorage.key(source.id))}`,
            ContentType: contentType,
            ContentDisposition: contentDisposition,
            MetadataDirective: 'REPLACE',
          }),
        );
      } catch (err) {
        if (isMissingObject(err)) throw new FileNotFoundError(source.id, source.storageKey);
        throw new StorageIOError('copy', id, err);
      }
      if (options.move) await source.delete();
      this.log.debug(`[upload] copied ${source.storageKey}:${source.id} -> ${key} move=${!!options.move}`);
      return;
    }

    const body = source instanceof UploadedFile ? await source.open() : source.open();
    try {
      await new Upload({
        client: this.client,
        params: {
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          ContentDisposition: contentDisposition,
        },
      }).done();
    } catch (err) {
      body.destroy();
      throw new StorageIOError('upload', id, err);
    }
    this.log.debug(`[upload] key=${key}`);
  }

  async open(id: string): Promise<Readable> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.key(id) }));
      if (!(res.Body instanceof Readable)) {
        throw new Error('response body is not a stream');
      }
      return res.Body;
    } catch (err) {
      if (isMissingObject(err)) throw new FileNotFoundError(id);
      throw new StorageIOError('open', id, err);
    }
  }

  async exists(id: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.key(id) }));
      return true;
    } catch (err) {
      if (isMissingObject(err)) return false;
      throw new StorageIOError('exists', id, err);
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.key(id) }));
    } catch (err) {
      if (isMissingObject(err)) return;
      throw new StorageIOError('delete', id, err);
    }
    this.log.debug(`[delete] key=${this.key(id)}`);
  }

  async deletePrefixed(prefix: string): Promise<void> {
    const keyPrefix = this.key(prefix.replace(/\/+$/, '') + '/');
    try {
      let batch: string[] = [];
      const pages = paginateListObjectsV2({ client: this.client }, { Bucket: this.bucket, Prefix: keyPrefix });
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (!object.Key) continue;
          batch.push(object.Key);
          if (batch.length === DELETE_BATCH) {
            await this.deleteKeys(batch);
            batch = [];
          }
        }
      }
      if (batch.length) await this.deleteKeys(batch);
    } catch (err) {
      throw new StorageIOError('deletePrefixed', prefix, err);
    }
  }

  async url(id: string, options: UrlOptions = {}): Promise<string> {
    const key = this.key(id);

    if (typeof options.expiresIn === 'number' && options.expiresIn > 0) {
      const command = new GetObjectCommand({ Bucket: this.bucket, Key: key });
      return getSignedUrl(this.client, command, { expiresIn: options.expiresIn });
    }

    const path = encodeKey(key);
    const base = this.options.publicBase ?? options.host;
    if (base) return `${base.replace(/\/+$/, '')}/${path}`;

    if (this.options.endpoint) {
      const endpoint = this.options.endpoint.replace(/\/+$/, '');
      if (this.options.forcePathStyle) return `${endpoint}/${this.bucket}/${path}`;
      const url = new URL(endpoint);
      return `${url.protocol}//${this.bucket}.${url.host}/${path}`;
    }

    const region = this.options.region ?? 'us-east-1';
    return `https://${this.bucket}.s3.${region}.amazonaws.com/${path}`;
  }

  private async deleteKeys(keys: string[]): Promise<void> {
    const res = await this.client.send(
      new DeleteObjectsCommand({
        Bucket: this.bucket,
        Delete: { Objects: keys.map((Key) => ({ Key })), Quiet: true },
      }),
    );
    const failed = res.Errors ?? [];
    if (failed.length) {
      throw new Error(`${failed.length} object(s) could not be deleted, first: ${failed[0].Key} ${failed[0].Code}`);
    }
  }
}
