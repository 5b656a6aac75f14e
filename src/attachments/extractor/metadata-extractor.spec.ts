import { InvalidFileError } from '../errors';
import { UploadIo } from '../upload-io';
import {
  checksumAnalyzer,
  customAnalyzer,
  dimensionsAnalyzer,
  filenameAnalyzer,
  mimeTypeAnalyzer,
  mimeTypeFromExtension,
  sizeAnalyzer,
} from './analyzers';
import { MetadataExtractor } from './metadata-extractor';
import { allowedMimeTypesValidator } from './validators';

// 1x1 transparent PNG
const PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64',
);

describe('MetadataExtractor', () => {
  it('extracts filename, size and sniffed type by default', async () => {
    const io = UploadIo.fromBuffer(PNG, { filename: 'pixel.png', contentType: 'text/plain' });
    const metadata = await MetadataExtractor.standard().extract(io);
    expect(metadata).toEqual({ filename: 'pixel.png', size: PNG.length, mimeType: 'image/png', extra: {} });
  });

  it('reports unrecognized text as text/plain', async () => {
    const io = UploadIo.fromBuffer('hello', { filename: 'a.txt' });
    const metadata = await MetadataExtractor.standard().extract(io);
    expect(metadata).toEqual({ filename: 'a.txt', size: 5, mimeType: 'text/plain', extra: {} });
  });

  it('lets plain text through a text/* allow list', async () => {
    const extractor = MetadataExtractor.standard().with(allowedMimeTypesValidator(['text/*']));
    const metadata = await extractor.extract(UploadIo.fromBuffer('a'.repeat(1024)));
    expect(metadata.mimeType).toBe('text/plain');
  });

  it('leaves unrecognized binary content untyped', async () => {
    const io = UploadIo.fromBuffer(Buffer.from([0x01, 0x00, 0x02, 0x03]));
    const metadata = await new MetadataExtractor([mimeTypeAnalyzer('sniff')]).extract(io);
    expect(metadata.mimeType).toBeNull();
  });

  it('prefers the context filename and strips directories', async () => {
    const io = UploadIo.fromBuffer('x', { filename: 'ignored.bin' });
    const metadata = await new MetadataExtractor([filenameAnalyzer()]).extract(io, {
      filename: 'C:\\Users\\me\\report.pdf',
    });
    expect(metadata.filename).toBe('report.pdf');
  });

  it('merges caller metadata last', async () => {
    const io = UploadIo.fromBuffer('x');
    const metadata = await new MetadataExtractor([sizeAnalyzer()]).extract(io, { metadata: { source: 'import' } });
    expect(metadata).toEqual({ size: 1, mimeType: null, filename: null, extra: { source: 'import' } });
  });

  it('gives every analyzer the input from the first byte', async () => {
    const io = UploadIo.fromBuffer('abc');
    const seen: string[] = [];
    const reader = (name: string) =>
      customAnalyzer(name, async (input) => {
        seen.push((await input.read()).toString('utf8'));
        return null;
      });
    await new MetadataExtractor([reader('first'), reader('second')]).extract(io);
    expect(seen).toEqual(['abc', 'abc']);
  });

  it('stops at the first analyzer that throws', async () => {
    const after = jest.fn(async () => undefined);
    const extractor = new MetadataExtractor([
      sizeAnalyzer(),
      {
        name: 'reject',
        analyze: async () => {
          throw new InvalidFileError('nope');
        },
      },
      { name: 'after', analyze: after },
    ]);
    await expect(extractor.extract(UploadIo.fromBuffer('x'))).rejects.toThrow('nope');
    expect(after).not.toHaveBeenCalled();
  });

  it('with() appends without changing the original', () => {
    const base = new MetadataExtractor([sizeAnalyzer()]);
    const extended = base.with(checksumAnalyzer());
    expect(base.analyzers.map((a) => a.name)).toEqual(['size']);
    expect(extended.analyzers.map((a) => a.name)).toEqual(['size', 'checksum:sha256']);
  });
});

describe('mime type strategies', () => {
  it('trusts the declared content type without parameters', async () => {
    const io = UploadIo.fromBuffer('x', { contentType: 'Text/HTML; charset=utf-8' });
    const metadata = await new MetadataExtractor([mimeTypeAnalyzer('trust')]).extract(io);
    expect(metadata.mimeType).toBe('text/html');
  });

  it('derives the type from the extension', async () => {
    const io = UploadIo.fromBuffer(PNG, { filename: 'scan.PDF' });
    const metadata = await new MetadataExtractor([filenameAnalyzer(), mimeTypeAnalyzer('extension')]).extract(io);
    expect(metadata.mimeType).toBe('application/pdf');
  });

  it('looks up extensions case-insensitively and returns null for unknown ones', () => {
    expect(mimeTypeFromExtension('photo.JPG')).toBe('image/jpeg');
    expect(mimeTypeFromExtension('archive.unknownext')).toBeNull();
    expect(mimeTypeFromExtension(null)).toBeNull();
  });

  it('sniffs an empty input as unknown', async () => {
    const metadata = await new MetadataExtractor([mimeTypeAnalyzer('sniff')]).extract(UploadIo.fromBuffer(''));
    expect(metadata.mimeType).toBeNull();
  });
});

describe('plugin analyzers', () => {
  it('computes checksums', async () => {
    const io = UploadIo.fromBuffer('hello');
    const metadata = await new MetadataExtractor([checksumAnalyzer('md5')]).extract(io);
    expect(metadata.extra).toEqual({ md5: '5d41402abc4b2a76b9719d911017c592' });
  });

  it('reads image dimensions', async () => {
    const metadata = await MetadataExtractor.standard({ analyzers: [dimensionsAnalyzer()] }).extract(
      UploadIo.fromBuffer(PNG),
    );
    expect(metadata.extra).toEqual({ width: 1, height: 1 });
  });

  it('skips dimensions for non-images', async () => {
    const metadata = await MetadataExtractor.standard({ analyzers: [dimensionsAnalyzer()] }).extract(
      UploadIo.fromBuffer('plain text'),
    );
    expect(metadata.extra).toEqual({});
  });

  it('rejects a corrupt image', async () => {
    const extractor = new MetadataExtractor([mimeTypeAnalyzer('trust'), dimensionsAnalyzer()]);
    const io = UploadIo.fromBuffer('not an image', { contentType: 'image/png' });
    await expect(extractor.extract(io)).rejects.toBeInstanceOf(InvalidFileError);
  });

  it('stores a scalar custom result under its name and merges objects', async () => {
    const extractor = new MetadataExtractor([
      customAnalyzer('lines', async (io) => (await io.read()).toString('utf8').split('\n').length),
      customAnalyzer('flags', () => ({ reviewed: false, source: 'spec' })),
    ]);
    const metadata = await extractor.extract(UploadIo.fromBuffer('a\nb\nc'));
    expect(metadata.extra).toEqual({ lines: 3, reviewed: false, source: 'spec' });
  });
});
