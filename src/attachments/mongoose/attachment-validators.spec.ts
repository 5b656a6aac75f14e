import { MemoryStorageService } from '../../storage/memory-storage.service';
import { StorageRegistry } from '../../storage/storage.registry';
import { applyMetadataPatch, emptyMetadata, MetadataPatch } from '../metadata';
import { UploadedFile } from '../uploaded-file';
import {
  contentTypes,
  dimensions,
  maxCount,
  maxSize,
  minCount,
  minSize,
  rejectContentTypes,
  required,
} from './attachment-validators';

const registry = new StorageRegistry({ store: new MemoryStorageService() });

function file(patch: MetadataPatch, id = 'f'): UploadedFile {
  return new UploadedFile(id, 'store', applyMetadataPatch(emptyMetadata(), patch), registry);
}

describe('attachment validators', () => {
  it('required', () => {
    expect(required()([])).toEqual(['must be attached']);
    expect(required('add one')([])).toEqual(['add one']);
    expect(required()([file({})])).toEqual([]);
  });

  it('maxSize and minSize skip files of unknown size', () => {
    expect(maxSize(10)([file({ size: 11 })])).toEqual(['is too large (maximum is 10 bytes)']);
    expect(maxSize(10)([file({ size: 10 }), file({})])).toEqual([]);
    expect(minSize(2)([file({ size: 1 })])).toEqual(['is too small (minimum is 2 bytes)']);
  });

  it('reports a message once for several offending files', () => {
    expect(maxSize(1)([file({ size: 5 }, 'a'), file({ size: 6 }, 'b')])).toEqual([
      'is too large (maximum is 1 bytes)',
    ]);
  });

  it('contentTypes accepts matching types and skips unknown ones', () => {
    const accept = contentTypes(['image/*', 'application/pdf']);
    expect(accept([file({ mimeType: 'image/png' }), file({ mimeType: 'application/pdf' }), file({})])).toEqual([]);
    expect(accept([file({ mimeType: 'text/html' })])).toEqual(['has invalid content type']);
  });

  it('rejectContentTypes', () => {
    const reject = rejectContentTypes(['application/x-msdownload'], 'no executables');
    expect(reject([file({ mimeType: 'application/x-msdownload' })])).toEqual(['no executables']);
    expect(reject([file({ mimeType: 'image/png' })])).toEqual([]);
  });

  it('dimensions checks exact values and ranges', () => {
    const image = file({ extra: { width: 50, height: 300 } });
    expect(dimensions({ width: 50 })([image])).toEqual([]);
    expect(dimensions({ width: 64 })([image])).toEqual(['width must be 64 pixels']);
    expect(dimensions({ width: [10, 100], height: [10, 200] })([image])).toEqual([
      'height must be between 10 and 200 pixels',
    ]);
    expect(dimensions({ width: 1 }, 'wrong size')([image])).toEqual(['wrong size']);
    expect(dimensions({ width: 1 })([file({})])).toEqual([]);
  });

  it('maxCount and minCount', () => {
    const files = [file({}, 'a'), file({}, 'b')];
    expect(maxCount(1)(files)).toEqual(['too many files (maximum is 1)']);
    expect(maxCount(2)(files)).toEqual([]);
    expect(minCount(3)(files)).toEqual(['too few files (minimum is 3)']);
  });
});
