import axios from 'axios';
import * as fs from 'fs-extra';
import * as NodeID3 from 'node-id3';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { main, type CliIo } from '../src/cli';

vi.mock('node-id3', () => ({
  Promise: { update: vi.fn() },
}));

const FIXTURES = path.join(__dirname, 'fixtures');

function captureIo() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = {
    stdout: { write: (chunk: string) => out.push(chunk) > 0, isTTY: false },
    stderr: { write: (chunk: string) => err.push(chunk) > 0 },
  };
  return { io, stdout: () => out.join(''), stderr: () => err.join('') };
}

describe('odm-fetch command', () => {
  let tempDir: string;
  let odmPath: string;
  let configPath: string;
  let licenseXml: string;
  let bookDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'odm-cli-'));
    odmPath = path.join(tempDir, 'loan.odm');
    await fs.copy(path.join(FIXTURES, 'sample.odm'), odmPath);
    licenseXml = await fs.readFile(path.join(FIXTURES, 'license.xml'), 'utf8');
    configPath = path.join(tempDir, 'config.toml');
    await fs.writeFile(
      configPath,
      [`download_dir = ${JSON.stringify(path.join(tempDir, 'library'))}`, '', '[tags]', 'album = "{title}"'].join('\n')
    );
    bookDir = path.join(tempDir, 'library', 'elena marsh', 'the lighthouse keeper');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.mocked(NodeID3.Promise.update).mockReset();
    await fs.remove(tempDir);
  });

  function serveBook() {
    return vi.spyOn(axios, 'get').mockImplementation(async (url: string) => {
      if (url.startsWith('https://license.example.test/')) return { status: 200, data: licenseXml };
      if (url.startsWith('https://images.example.test/')) return { status: 200, data: Buffer.from('jpeg') };
      return {
        status: 200,
        headers: { 'content-length': '10' },
        data: Readable.from([Buffer.from('0123456789')]),
      };
    });
  }

  async function placeDownloadedBook() {
    await fs.ensureDir(bookDir);
    for (const n of ['01', '02', '03']) await fs.writeFile(path.join(bookDir, `part${n}.mp3`), '0123456789');
    await fs.writeFile(path.join(bookDir, 'the lighthouse keeper.jpg'), 'jpeg');
  }

  function partRequests(get: ReturnType<typeof serveBook>) {
    return get.mock.calls.filter(([url]) => url.startsWith('https://files.example.test/')).length;
  }

  it('prints the metadata without contacting any server', async () => {
    const get = serveBook();
    const { io, stdout } = captureIo();

    expect(await main(['--print-metadata', odmPath], io)).toBe(0);

    expect(stdout().split('\n')[0]).toBe('Title:     The Lighthouse Keeper');
    expect(stdout()).toContain('Parts:     3 (1:19:33)\n');
    expect(get).not.toHaveBeenCalled();
  });

  it('downloads a book end to end', async () => {
    const get = serveBook();
    const { io, stderr } = captureIo();

    expect(await main(['-c', configPath, odmPath], io)).toBe(0);

    expect(stderr()).toBe('');
    expect(partRequests(get)).toBe(3);
    expect(await fs.readFile(path.join(bookDir, 'part03.mp3'), 'utf8')).toBe('0123456789');
    expect(NodeID3.Promise.update).not.toHaveBeenCalled();
  });

  it('makes no requests with --skip-download when the files exist', async () => {
    await placeDownloadedBook();
    const get = serveBook();
    const { io } = captureIo();

    expect(await main(['--skip-download', '--tags', '-c', configPath, odmPath], io)).toBe(0);

    expect(get).not.toHaveBeenCalled();
    expect(vi.mocked(NodeID3.Promise.update).mock.calls).toEqual([
      [{ album: 'The Lighthouse Keeper' }, path.join(bookDir, 'part01.mp3')],
      [{ album: 'The Lighthouse Keeper' }, path.join(bookDir, 'part02.mp3')],
      [{ album: 'The Lighthouse Keeper' }, path.join(bookDir, 'part03.mp3')],
    ]);
  });

  it('leaves complete files alone without --force', async () => {
    await placeDownloadedBook();
    const get = serveBook();
    const { io } = captureIo();

    expect(await main(['-c', configPath, odmPath], io)).toBe(0);

    expect(get.mock.calls.map(([url]) => url)).toEqual(['https://license.example.test/AcquireLicense']);
  });

  it('requests every part once with --force', async () => {
    await placeDownloadedBook();
    const get = serveBook();
    const { io } = captureIo();

    expect(await main(['--force', '-c', configPath, odmPath], io)).toBe(0);

    expect(partRequests(get)).toBe(3);
  });

  it('fails on a malformed loan file before any request', async () => {
    const broken = path.join(tempDir, 'missing-acquisition.odm');
    await fs.copy(path.join(FIXTURES, 'missing-acquisition.odm'), broken);
    const get = serveBook();
    const { io, stderr } = captureIo();

    expect(await main(['-c', configPath, broken], io)).toBe(1);

    expect(stderr()).toBe('ERROR: Bad ODM file: no License/AcquisitionUrl in missing-acquisition.odm\n');
    expect(get).not.toHaveBeenCalled();
  });

  it('rejects --skip-download on its own', async () => {
    const { io, stderr } = captureIo();

    expect(await main(['--skip-download', odmPath], io)).toBe(2);

    expect(stderr()).toBe("ERROR: Must include '--tags' or '--owner' options when specifying '--skip-download'\n");
  });

  it('requires the loan file argument', async () => {
    const { io, stderr } = captureIo();

    expect(await main([], io)).toBe(1);
    expect(stderr()).toContain("missing required argument 'filename'");
  });
});
