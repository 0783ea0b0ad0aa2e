import fs from 'node:fs/promises';
import fsSync from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DiskAdapter } from '../src/storage/DiskAdapter.storage.js';
import { expectImageError, loggedEvents } from './helpers/fakes.js';

describe('DiskAdapter', () => {
  let root: string;
  let dir: string;
  let adapter: DiskAdapter;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'product-images-'));
    dir = path.join(root, 'uploads');
    adapter = new DiskAdapter(dir, 'http://localhost:4000/uploads/');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('writes the stream under a generated name', async () => {
    const name = await adapter.save(Readable.from(Buffer.from('jpeg-bytes')), 'Cat.JPG', 10);

    expect(name).toMatch(/^\d+_[0-9a-f]{8}\.jpg$/);
    await expect(fs.readFile(path.join(dir, name), 'utf8')).resolves.toBe('jpeg-bytes');
  });

  it('rejects oversize and unsupported files without creating anything', async () => {
    await expectImageError(adapter.save(Readable.from(Buffer.from('x')), 'a.png', 20_000_000), 'SIZE_EXCEEDED');
    await expectImageError(adapter.save(Readable.from(Buffer.from('x')), 'a.bmp', 1), 'UNSUPPORTED_TYPE');
    expect(fsSync.existsSync(dir)).toBe(false);
  });

  it('removes the partial file when the source stream fails', async () => {
    const broken = new Readable({
      read() {
        this.push(Buffer.from('abc'));
        this.destroy(new Error('client went away'));
      },
    });

    await expectImageError(adapter.save(broken, 'a.png', 3), 'IO_FAILURE', 'failed to save file: client went away');
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it('reports the write failure even when partial cleanup fails', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(fsSync.promises, 'rm').mockRejectedValueOnce(new Error('device busy'));
    const broken = new Readable({
      read() {
        this.destroy(new Error('client went away'));
      },
    });

    await expectImageError(adapter.save(broken, 'a.png', 3), 'IO_FAILURE', 'failed to save file: client went away');
    const warn = loggedEvents(logSpy.mock.calls).find((e) => e.event === 'storage.disk.partial_cleanup_failed');
    expect(warn).toMatchObject({ level: 'warn', error: 'device busy' });
  });

  it('deletes by bare name or full URL and reports NOT_FOUND afterwards', async () => {
    const first = await adapter.save(Readable.from(Buffer.from('1')), 'a.png', 1);
    const second = await adapter.save(Readable.from(Buffer.from('2')), 'b.png', 1);

    await adapter.delete(first);
    await adapter.delete(adapter.resolveUrl(second));
    await expect(fs.readdir(dir)).resolves.toEqual([]);

    await expectImageError(adapter.delete(first), 'NOT_FOUND', 'file not found');
  });

  it('rejects traversal references', async () => {
    await expectImageError(adapter.delete('../../etc/passwd'), 'INVALID_REFERENCE', 'invalid filename');
  });

  it('resolves URLs idempotently', () => {
    const url = adapter.resolveUrl('1700000000_abcd1234.png');
    expect(url).toBe('http://localhost:4000/uploads/1700000000_abcd1234.png');
    expect(adapter.resolveUrl(url)).toBe(url);
  });

  it('exposes the absolute directory', () => {
    expect(adapter.directory).toBe(path.resolve(dir));
    expect(adapter.kind).toBe('local');
  });
});
