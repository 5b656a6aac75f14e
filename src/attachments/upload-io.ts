// src/attachments/upload-io.ts

import { createReadStream, createWriteStream } from 'fs';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

export type UploadIoOptions = {
  filename?: string | null;
  contentType?: string | null;
};

/**
 * Input handed to the uploader. Every `open()` starts again from the first
 * byte, so analyzers and the storage can each read the whole content.
 */
export abstract class UploadIo {
  readonly filename: string | null;
  readonly contentType: string | null;

  protected constructor(options: UploadIoOptions = {}) {
    this.filename = options.filename ?? null;
    this.contentType = options.contentType ?? null;
  }

  abstract open(): Readable;
  abstract size(): Promise<number>;

  /** Releases anything the input owns (spooled temp files). */
  async dispose(): Promise<void> {}

  async head(bytes: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let total = 0;
    const stream = this.open();
    try {
      for await (const chunk of stream) {
        const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        chunks.push(buf);
        total += buf.length;
        if (total >= bytes) break;
      }
    } finally {
      stream.destroy();
    }
    return Buffer.concat(chunks).subarray(0, bytes);
  }

  async read(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.open()) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  static fromBuffer(content: Buffer | string, options?: UploadIoOptions): UploadIo {
    return new BufferIo(Buffer.isBuffer(content) ? content : Buffer.from(content), options);
  }

  static fromPath(path: string, options: UploadIoOptions = {}): UploadIo {
    return new FileIo(path, { filename: basename(path), ...options });
  }

  /**
   * Spools a one-shot stream into a temp file so it can be re-read.
   * Call `dispose()` once the upload is done.
   */
  static async fromStream(stream: Readable, options?: UploadIoOptions): Promise<UploadIo> {
    const dir = await mkdtemp(join(tmpdir(), 'filebinder-'));
    const path = join(dir, 'upload');
    try {
      await pipeline(stream, createWriteStream(path));
    } catch (err) {
      await rm(dir, { recursive: true, force: true });
      throw err;
    }
    return new FileIo(path, options, dir);
  }
}

class BufferIo extends UploadIo {
  constructor(
    private readonly content: Buffer,
    options?: UploadIoOptions,
  ) {
    super(options);
  }

  open(): Readable {
    return Readable.from([this.content]);
  }

  async size(): Promise<number> {
    return this.content.length;
  }

  async read(): Promise<Buffer> {
    return this.content;
  }
}

class FileIo extends UploadIo {
  constructor(
    readonly path: string,
    options?: UploadIoOptions,
    private readonly spoolDir?: string,
  ) {
    super(options);
  }

  open(): Readable {
    return createReadStream(this.path);
  }

  async size(): Promise<number> {
    return (await stat(this.path)).size;
  }

  async dispose(): Promise<void> {
    if (this.spoolDir) await rm(this.spoolDir, { recursive: true, force: true });
  }
}
