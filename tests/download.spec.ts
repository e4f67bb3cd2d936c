import axios from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildLayout, downloadCover, downloadParts } from '../src/odm/download';
import { parseManifest } from '../src/odm/manifest';
import type { License, Manifest } from '../src/odm/types';

const FIXTURES = path.join(__dirname, 'fixtures');
const LICENSE: License = { xml: '<License>test</License>', clientId: 'TEST-CLIENT' };

function audioResponse(body: string) {
  const data = Buffer.from(body);
  return {
    status: 200,
    headers: { 'content-length': String(data.length) },
    data: Readable.from([data]),
  };
}

function droppedResponse(head: string) {
  const data = new Readable({ read() {} });
  data.push(head);
  setImmediate(() => data.destroy(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' })));
  return { status: 200, headers: {}, data };
}

describe('part downloads', () => {
  let tempDir: string;
  let manifest: Manifest;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'odm-download-'));
    manifest = parseManifest(await fs.readFile(path.join(FIXTURES, 'sample.odm'), 'utf8'), 'sample.odm');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tempDir);
  });

  function layout(lowercase = true) {
    return buildLayout(manifest, { downloadDir: tempDir, lowercaseFilenames: lowercase });
  }

  it('lays the book out by author and title', () => {
    const { authorDir, bookDir, coverPath, targets } = layout();
    expect(authorDir).toBe(path.join(tempDir, 'elena marsh'));
    expect(bookDir).toBe(path.join(tempDir, 'elena marsh', 'the lighthouse keeper'));
    expect(coverPath).toBe(path.join(bookDir, 'the lighthouse keeper.jpg'));
    expect(targets.map((t) => path.basename(t.filePath))).toEqual(['part01.mp3', 'part02.mp3', 'part03.mp3']);
    expect(targets.map((t) => t.part.number)).toEqual([1, 2, 3]);
  });

  it('names the author directory after all authors', () => {
    const coauthored = { ...manifest, authors: ['A One', 'B Two'], author: 'A One;B Two' };
    const { authorDir } = buildLayout(coauthored, { downloadDir: tempDir, lowercaseFilenames: true });
    expect(authorDir).toBe(path.join(tempDir, 'a one;b two'));
  });

  it('keeps the original case when lower-casing is off', () => {
    expect(layout(false).bookDir).toBe(path.join(tempDir, 'Elena Marsh', 'The Lighthouse Keeper'));
  });

  it('fetches every part with the license headers', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    const get = vi.spyOn(axios, 'get').mockImplementation(async () => audioResponse('0123456789'));

    const summary = await downloadParts(targets, LICENSE, { force: false });

    expect(summary).toEqual({ downloaded: 3, skipped: 0 });
    expect(get.mock.calls.map(([url]) => url)).toEqual([
      'https://files.example.test/books/lighthouse/Lighthouse-Part01.mp3',
      'https://files.example.test/books/lighthouse/Lighthouse-Part02.mp3',
      'https://files.example.test/books/lighthouse/Lighthouse-Part03.mp3',
    ]);
    expect(get.mock.calls[0]?.[1]).toMatchObject({
      responseType: 'stream',
      headers: { License: '<License>test</License>', ClientID: 'TEST-CLIENT', 'User-Agent': 'OverDrive Media Console' },
    });
    expect(await fs.readFile(targets[2]?.filePath ?? '', 'utf8')).toBe('0123456789');
  });

  it('skips parts already on disk with the expected size', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    await fs.writeFile(path.join(bookDir, 'part01.mp3'), 'complete!!');
    await fs.writeFile(path.join(bookDir, 'part02.mp3'), 'short');
    const get = vi.spyOn(axios, 'get').mockImplementation(async () => audioResponse('0123456789'));

    const summary = await downloadParts(targets, LICENSE, { force: false });

    expect(summary).toEqual({ downloaded: 2, skipped: 1 });
    expect(get).toHaveBeenCalledTimes(2);
    expect(await fs.readFile(path.join(bookDir, 'part01.mp3'), 'utf8')).toBe('complete!!');
    expect(await fs.readFile(path.join(bookDir, 'part02.mp3'), 'utf8')).toBe('0123456789');
  });

  it('downloads everything again when forced', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    for (const target of targets) await fs.writeFile(target.filePath, 'complete!!');
    const get = vi.spyOn(axios, 'get').mockImplementation(async () => audioResponse('9876543210'));

    const summary = await downloadParts(targets, LICENSE, { force: true });

    expect(summary).toEqual({ downloaded: 3, skipped: 0 });
    expect(get).toHaveBeenCalledTimes(3);
    expect(await fs.readFile(path.join(bookDir, 'part01.mp3'), 'utf8')).toBe('9876543210');
  });

  it('stops at the first failing part and keeps the earlier ones', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    const get = vi.spyOn(axios, 'get')
      .mockImplementationOnce(async () => audioResponse('0123456789'))
      .mockRejectedValueOnce(Object.assign(new Error('Request failed with status code 404'), {
        isAxiosError: true,
        response: { status: 404 },
        config: {},
      }));

    await expect(downloadParts(targets, LICENSE, { force: false })).rejects.toMatchObject({
      code: 'ERR_NETWORK',
      message: 'Failed to download Part 2: HTTP 404',
    });
    expect(get).toHaveBeenCalledTimes(2);
    expect(await fs.pathExists(path.join(bookDir, 'part01.mp3'))).toBe(true);
    expect(await fs.pathExists(path.join(bookDir, 'part03.mp3'))).toBe(false);
  });

  it('leaves nothing behind when a transfer breaks off', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    const first = targets[0];
    if (!first) throw new Error('sample has no parts');
    const unsized = [{ part: { ...first.part, fileSize: undefined }, filePath: first.filePath }];
    const get = vi.spyOn(axios, 'get').mockImplementationOnce(async () => droppedResponse('HALF'));

    await expect(downloadParts(unsized, LICENSE, { force: false })).rejects.toMatchObject({
      code: 'ERR_NETWORK',
      message: 'Failed to download Part 1: ECONNRESET',
    });
    expect(await fs.readdir(bookDir)).toEqual([]);

    get.mockImplementationOnce(async () => audioResponse('0123456789'));
    const summary = await downloadParts(unsized, LICENSE, { force: false });

    expect(summary).toEqual({ downloaded: 1, skipped: 0 });
    expect(await fs.readFile(first.filePath, 'utf8')).toBe('0123456789');
  });

  it('reports progress for each downloaded part', async () => {
    const { bookDir, targets } = layout();
    await fs.ensureDir(bookDir);
    vi.spyOn(axios, 'get').mockImplementation(async () => audioResponse('0123456789'));
    const progress = { start: vi.fn(), update: vi.fn(), finish: vi.fn() };

    await downloadParts(targets.slice(0, 1), LICENSE, { force: false, progress });

    expect(progress.start).toHaveBeenCalledWith('Part 1', 10);
    expect(progress.update).toHaveBeenCalledWith(10);
    expect(progress.finish).toHaveBeenCalledTimes(1);
  });
});

describe('downloadCover', () => {
  let tempDir: string;
  let manifest: Manifest;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'odm-cover-'));
    manifest = parseManifest(await fs.readFile(path.join(FIXTURES, 'sample.odm'), 'utf8'), 'sample.odm');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tempDir);
  });

  it('saves the cover image', async () => {
    const coverPath = path.join(tempDir, 'cover.jpg');
    const get = vi.spyOn(axios, 'get').mockResolvedValue({ status: 200, data: Buffer.from('jpeg-bytes') });

    await expect(downloadCover(manifest, coverPath, false)).resolves.toBe(true);

    expect(get).toHaveBeenCalledWith('https://images.example.test/cover.jpg', expect.objectContaining({
      responseType: 'arraybuffer',
    }));
    expect(await fs.readFile(coverPath, 'utf8')).toBe('jpeg-bytes');
  });

  it('keeps an existing cover unless forced', async () => {
    const coverPath = path.join(tempDir, 'cover.jpg');
    await fs.writeFile(coverPath, 'old');
    const get = vi.spyOn(axios, 'get');

    await expect(downloadCover(manifest, coverPath, false)).resolves.toBe(true);
    expect(get).not.toHaveBeenCalled();
  });

  it('treats a failed cover download as non-fatal', async () => {
    vi.spyOn(axios, 'get').mockRejectedValue(new Error('socket hang up'));

    await expect(downloadCover(manifest, path.join(tempDir, 'cover.jpg'), false)).resolves.toBe(false);
  });
});
