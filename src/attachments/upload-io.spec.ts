import { mkdtemp, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Readable } from 'stream';

import { UploadIo } from './upload-io';

describe('UploadIo', () => {
  it('re-reads a buffer from the start on every open', async () => {
    const io = UploadIo.fromBuffer('hello', { filename: 'a.txt', contentType: 'text/plain' });
    expect((await io.read()).toString('utf8')).toBe('hello');
    expect((await io.head(2)).toString('utf8')).toBe('he');
    expect((await io.read()).toString('utf8')).toBe('hello');
    expect(await io.size()).toBe(5);
    expect(io.filename).toBe('a.txt');
    expect(io.contentType).toBe('text/plain');
  });

  it('reads files from disk and names them after the file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'upload-io-spec-'));
    try {
      const path = join(dir, 'notes.md');
      await writeFile(path, '# notes');
      const io = UploadIo.fromPath(path);
      expect(io.filename).toBe('notes.md');
      expect(await io.size()).toBe(7);
      expect((await io.head(1)).toString('utf8')).toBe('#');
      expect((await io.read()).toString('utf8')).toBe('# notes');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('spools a one-shot stream so it can be read repeatedly, and removes the spool on dispose', async () => {
    const io = await UploadIo.fromStream(Readable.from([Buffer.from('ab'), Buffer.from('cd')]), { filename: 's.bin' });
    expect((await io.read()).toString('utf8')).toBe('abcd');
    expect((await io.read()).toString('utf8')).toBe('abcd');
    expect(await io.size()).toBe(4);

    const spooled = 'path' in io && typeof io.path === 'string' ? io.path : '';
    expect(spooled).not.toBe('');
    await io.dispose();
    await expect(stat(dirname(spooled))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects when the source stream fails', async () => {
    const failing = new Readable({
      read() {
        this.destroy(new Error('client aborted'));
      },
    });
    await expect(UploadIo.fromStream(failing)).rejects.toThrow('client aborted');
  });
});
