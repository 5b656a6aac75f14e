import { FileNotFoundError } from '../attachments/errors';
import { emptyMetadata } from '../attachments/metadata';
import { UploadedFile } from '../attachments/uploaded-file';
import { UploadIo } from '../attachments/upload-io';
import { MemoryStorageService } from './memory-storage.service';
import { StorageRegistry } from './storage.registry';

async function readAll(storage: MemoryStorageService, id: string): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of await storage.open(id)) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString('utf8');
}

describe('MemoryStorageService', () => {
  let cache: MemoryStorageService;
  let store: MemoryStorageService;
  let registry: StorageRegistry;

  beforeEach(() => {
    cache = new MemoryStorageService();
    store = new MemoryStorageService();
    registry = new StorageRegistry({ cache, store });
  });

  it('returns the uploaded bytes', async () => {
    await cache.upload(UploadIo.fromBuffer('hello'), 'a/b.txt');
    expect(await cache.exists('a/b.txt')).toBe(true);
    expect(await readAll(cache, 'a/b.txt')).toBe('hello');
  });

  it('does not share memory with the uploaded buffer', async () => {
    const content = Buffer.from('abc');
    await cache.upload(UploadIo.fromBuffer(content), 'x');
    content.write('zzz');
    expect(await readAll(cache, 'x')).toBe('abc');
  });

  it('rejects open on an unknown id with FileNotFoundError', async () => {
    await expect(cache.open('missing')).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('deletes idempotently', async () => {
    await cache.upload(UploadIo.fromBuffer('x'), 'x');
    await cache.delete('x');
    await cache.delete('x');
    expect(await cache.exists('x')).toBe(false);
  });

  it('deletes by prefix without touching lookalike keys', async () => {
    await cache.upload(UploadIo.fromBuffer('1'), 'docs/1');
    await cache.upload(UploadIo.fromBuffer('2'), 'docs/2');
    await cache.upload(UploadIo.fromBuffer('3'), 'docs-old/3');
    await cache.deletePrefixed('docs');
    expect(cache.keys()).toEqual(['docs-old/3']);
    await cache.deletePrefixed('nothing-here/');
    expect(cache.keys()).toEqual(['docs-old/3']);
  });

  it('moves between memory storages', async () => {
    await cache.upload(UploadIo.fromBuffer('moved'), 'src');
    const file = new UploadedFile('src', 'cache', emptyMetadata(), registry);

    expect(store.canMove(file)).toBe(true);
    await store.upload(file, 'dest', { move: true });

    expect(await cache.exists('src')).toBe(false);
    expect(await readAll(store, 'dest')).toBe('moved');
  });

  it('copies when move is not requested', async () => {
    await cache.upload(UploadIo.fromBuffer('kept'), 'src');
    const file = new UploadedFile('src', 'cache', emptyMetadata(), registry);
    await store.upload(file, 'dest');
    expect(await cache.exists('src')).toBe(true);
  });

  it('builds memory:// urls and ignores url options', async () => {
    expect(await cache.url('a/b.png', { expiresIn: 60, anything: true })).toBe('memory://a/b.png');
  });

  it('clear empties the storage', async () => {
    await cache.upload(UploadIo.fromBuffer('x'), 'x');
    cache.clear();
    expect(cache.keys()).toEqual([]);
  });
});
