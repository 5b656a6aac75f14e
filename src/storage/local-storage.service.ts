// src/storage/local-storage.service.ts
import { Logger } from '@nestjs/common';
import { createReadStream, createWriteStream } from 'fs';
import { copyFile, mkdir, readdir, rename, rm, rmdir, stat, unlink } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { randomUUID } from 'crypto';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

import { errorCode, FileNotFoundError, InvalidFileError, StorageIOError } from '../attachments/errors';
import { UploadedFile } from '../attachments/uploaded-file';
import { StorageDriver, StorageService, UploadOptions, UploadSource, UrlOptions } from './storage.service';

export type LocalStorageOptions = {
  /** Base directory, relative paths resolve against the working directory. */
  directory: string;
  /** Subdirectory inside `directory` holding this storage's files ("cache", "store"). */
  prefix?: string;
  /** Public URL the directory is served under, e.g. http://localhost:4000/uploads */
  publicBase?: string;
};

export class LocalStorageService extends StorageService {
  private readonly log = new Logger(LocalStorageService.name);
  readonly root: string;
  readonly prefix: string;
  private readonly publicBase?: string;

  constructor(options: LocalStorageOptions) {
    super();
    this.prefix = (options.prefix ?? '').replace(/^\/+|\/+$/g, '');
    this.root = resolve(process.cwd(), options.directory, this.prefix);
    this.publicBase = options.publicBase?.replace(/\/+$/, '');
  }

  driver(): StorageDriver {
    return 'local';
  }

  /** Absolute path of an id; ids may not leave the storage directory. */
  path(id: string): string {
    const abs = resolve(this.root, id);
    const rel = relative(this.root, abs);
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      throw new InvalidFileError(`id ${JSON.stringify(id)} is outside the storage directory`);
    }
    return abs;
  }

  canMove(source: UploadSource): boolean {
    return source instanceof UploadedFile && source.storage instanceof LocalStorageService;
  }

  async upload(source: UploadSource, id: string, options: UploadOptions = {}): Promise<void> {
    const dest = this.path(id);

    try {
      await mkdir(dirname(dest), { recursive: true });

      const sourceStorage = source instanceof UploadedFile ? source.storage : null;
      if (options.move && source instanceof UploadedFile && sourceStorage instanceof LocalStorageService) {
        await this.moveFile(sourceStorage.path(source.id), dest, source.id);
        await sourceStorage.prune(dirname(sourceStorage.path(source.id)));
        this.log.debug(`[upload] moved ${source.storageKey}:${source.id} -> ${id}`);
        return;
      }

      // write next to the target and rename, a failed write leaves nothing behind
      const tmp = `${dest}.${randomUUID()}.tmp`;
      const input = source instanceof UploadedFile ? await source.open() : source.open();
      try {
        await pipeline(input, createWriteStream(tmp));
        await rename(tmp, dest);
      } catch (err) {
        await rm(tmp, { force: true });
        throw err;
      }
      this.log.debug(`[upload] id=${id}`);
    } catch (err) {
      if (err instanceof FileNotFoundError || err instanceof InvalidFileError) throw err;
      throw new StorageIOError('upload', id, err);
    }
  }

  async open(id: string): Promise<Readable> {
    const path = this.path(id);
    try {
      const st = await stat(path);
      if (!st.isFile()) throw new FileNotFoundError(id);
    } catch (err) {
      if (err instanceof FileNotFoundError) throw err;
      if (errorCode(err) === 'ENOENT') throw new FileNotFoundError(id);
      throw new StorageIOError('open', id, err);
    }
    return createReadStream(path);
  }

  async exists(id: string): Promise<boolean> {
    try {
      return (await stat(this.path(id))).isFile();
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false;
      throw new StorageIOError('exists', id, err);
    }
  }

  async delete(id: string): Promise<void> {
    const path = this.path(id);
    try {
      await rm(path, { force: true });
      await this.prune(dirname(path));
    } catch (err) {
      throw new StorageIOError('delete', id, err);
    }
    this.log.debug(`[delete] id=${id}`);
  }

  async deletePrefixed(prefix: string): Promise<void> {
    const normalized = prefix.replace(/\/+$/, '');
    if (!normalized) return;
    const path = this.path(normalized);
    try {
      await rm(path, { recursive: true, force: true });
      await this.prune(dirname(path));
    } catch (err) {
      throw new StorageIOError('deletePrefixed', prefix, err);
    }
  }

  async url(id: string, options: UrlOptions = {}): Promise<string> {
    const base = this.publicBase ?? options.host?.replace(/\/+$/, '') ?? '';
    const segments = [...this.prefix.split('/'), ...id.split('/')].filter(Boolean);
    return `${base}/${segments.map(encodeURIComponent).join('/')}`;
  }

  private async moveFile(from: string, to: string, sourceId: string): Promise<void> {
    try {
      await rename(from, to);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') throw new FileNotFoundError(sourceId);
      if (errorCode(err) !== 'EXDEV') throw err;
      // different devices
      await copyFile(from, to);
      await unlink(from);
    }
  }

  /** Removes empty directories between `dir` and the storage root. */
  private async prune(dir: string): Promise<void> {
    let current = dir;
    while (current.startsWith(this.root + sep)) {
      const entries = await readdir(current).catch(() => null);
      if (!entries || entries.length > 0) return;
      await rmdir(current).catch(() => undefined);
      current = dirname(current);
    }
  }
}
