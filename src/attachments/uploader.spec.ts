import { MemoryStorageService } from '../storage/memory-storage.service';
import { StorageRegistry } from '../storage/storage.registry';
import { ConfigurationError, InvalidFileError } from './errors';
import { MetadataExtractor } from './extractor/metadata-extractor';
import { maxSizeValidator } from './extractor/validators';
import { emptyMetadata } from './metadata';
import { UploadedFile } from './uploaded-file';
import { datePartitionedLocation, defaultLocation, Uploader } from './uploader';
import { UploadIo } from './upload-io';

describe('location generation', () => {
  it('is a dashless uuid with the extension of the original filename', () => {
    const id = defaultLocation(UploadIo.fromBuffer('x'), { ...emptyMetadata(), filename: 'Photo.JPG' });
    expect(id).toMatch(/^[0-9a-f]{32}\.jpg$/);
  });

  it('has no extension when none can be derived', () => {
    expect(defaultLocation(UploadIo.fromBuffer('x'), emptyMetadata())).toMatch(/^[0-9a-f]{32}$/);
  });

  it('keeps the extension of an already stored file', () => {
    const registry = new StorageRegistry({});
    const file = new UploadedFile('old/abc.pdf', 'cache', emptyMetadata(), registry);
    expect(defaultLocation(file, emptyMetadata())).toMatch(/^[0-9a-f]{32}\.pdf$/);
  });

  it('partitions by UTC year and month', () => {
    const generate = datePartitionedLocation('/avatars/', () => new Date(Date.UTC(2026, 0, 31, 23, 59)));
    const id = generate(UploadIo.fromBuffer('x'), { ...emptyMetadata(), filename: 'a.png' }, {});
    expect(id).toMatch(/^avatars\/2026\/01\/[0-9a-f]{32}\.png$/);
  });
});

describe('Uploader', () => {
  let cache: MemoryStorageService;
  let store: MemoryStorageService;
  let registry: StorageRegistry;
  let uploader: Uploader;

  beforeEach(() => {
    cache = new MemoryStorageService();
    store = new MemoryStorageService();
    registry = new StorageRegistry({ cache, store });
    uploader = new Uploader(registry);
  });

  it('stores the bytes and returns a reference with extracted metadata', async () => {
    const file = await uploader.upload(UploadIo.fromBuffer('hello', { filename: 'a.txt' }), 'cache');

    expect(file.storageKey).toBe('cache');
    expect(file.id).toMatch(/^[0-9a-f]{32}\.txt$/);
    expect(file.metadata).toEqual({ size: 5, mimeType: 'text/plain', filename: 'a.txt', extra: {} });
    expect((await file.read()).toString('utf8')).toBe('hello');
  });

  it('uses an explicit location', async () => {
    const file = await uploader.upload(UploadIo.fromBuffer('x'), 'cache', { location: 'fixed/id.bin' });
    expect(file.id).toBe('fixed/id.bin');
    expect(cache.keys()).toEqual(['fixed/id.bin']);
  });

  it('uses the configured location generator', async () => {
    const custom = new Uploader(registry, { generateLocation: (_io, metadata) => `by-name/${metadata.filename}` });
    const file = await custom.upload(UploadIo.fromBuffer('x', { filename: 'n.txt' }), 'cache');
    expect(file.id).toBe('by-name/n.txt');
  });

  it('can be subclassed to generate locations', async () => {
    class FixedUploader extends Uploader {
      generateLocation(): string {
        return 'always-here';
      }
    }
    const file = await new FixedUploader(registry).upload(UploadIo.fromBuffer('x'), 'store');
    expect(file.id).toBe('always-here');
  });

  it('stores nothing when extraction rejects the file', async () => {
    const strict = new Uploader(registry, { extractor: MetadataExtractor.standard().with(maxSizeValidator(2)) });
    await expect(strict.upload(UploadIo.fromBuffer('too long'), 'cache')).rejects.toBeInstanceOf(InvalidFileError);
    expect(cache.keys()).toEqual([]);
  });

  it('fails on an unknown storage key before reading the input', async () => {
    const io = UploadIo.fromBuffer('x');
    const open = jest.spyOn(io, 'open');
    await expect(uploader.upload(io, 'nowhere')).rejects.toBeInstanceOf(ConfigurationError);
    expect(open).not.toHaveBeenCalled();
  });

  it('moves a file to another storage under a new id with the same metadata', async () => {
    const cached = await uploader.upload(UploadIo.fromBuffer('hello', { filename: 'a.txt' }), 'cache');
    const stored = await uploader.move(cached, 'store');

    expect(stored.storageKey).toBe('store');
    expect(stored.id).not.toBe(cached.id);
    expect(stored.metadata).toEqual(cached.metadata);
    expect(await cached.exists()).toBe(false);
    expect((await stored.read()).toString('utf8')).toBe('hello');
  });

  it('deletes the source after copying across storage kinds', async () => {
    const other = new MemoryStorageService();
    class CopyOnlyStorage extends MemoryStorageService {
      canMove(): boolean {
        return false;
      }
    }
    const copyOnly = new CopyOnlyStorage();
    const mixed = new StorageRegistry({ cache: other, store: copyOnly });
    const mixedUploader = new Uploader(mixed);

    const cached = await mixedUploader.upload(UploadIo.fromBuffer('data'), 'cache');
    const stored = await mixedUploader.move(cached, 'store');

    expect(other.keys()).toEqual([]);
    expect(copyOnly.keys()).toEqual([stored.id]);
  });
});
