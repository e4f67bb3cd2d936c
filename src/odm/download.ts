import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { config } from '../core/config';
import { toFileSystemError, toNetworkError } from '../core/errors';
import { fileExists } from '../core/fs';
import { logger } from '../core/logger';
import { paths, toPathSegment } from '../core/paths';
import type { Settings } from '../core/settings';
import type { ProgressReporter } from './progress';
import type { BookLayout, DownloadTarget, License, Manifest } from './types';

const COVER_USER_AGENT = 'OverDrive Media Console (unknown version) CFNetwork/976 Darwin/18.2.0 (x86_64)';

export interface DownloadOptions {
  /** Download even when a complete file is already on disk. */
  force: boolean;
  progress?: ProgressReporter | undefined;
}

export interface DownloadSummary {
  downloaded: number;
  skipped: number;
}

/**
 * Where every file of the book goes:
 * `<download_dir>/<author>/<title>/partNN.mp3` plus `<title>.jpg`.
 */
export function buildLayout(manifest: Manifest, settings: Pick<Settings, 'downloadDir' | 'lowercaseFilenames'>): BookLayout {
  const authorSegment = toPathSegment(manifest.author, settings.lowercaseFilenames);
  const titleSegment = toPathSegment(manifest.title, settings.lowercaseFilenames);
  const bookDir = paths.book.dir(settings.downloadDir, authorSegment, titleSegment);

  return {
    authorDir: path.dirname(bookDir),
    bookDir,
    coverPath: paths.book.cover(bookDir, titleSegment),
    targets: manifest.parts.map((part) => ({ part, filePath: paths.book.part(bookDir, part.number) })),
  };
}

async function streamToFile(
  url: string,
  headers: Record<string, string>,
  filePath: string,
  label: string,
  progress?: ProgressReporter
): Promise<number> {
  const response = await axios.get<Readable>(url, {
    responseType: 'stream',
    headers,
    timeout: config.HTTP_TIMEOUT_MS,
  });

  const lengthHeader = Number(response.headers['content-length']);
  const totalBytes = Number.isFinite(lengthHeader) && lengthHeader > 0 ? lengthHeader : undefined;
  progress?.start(label, totalBytes);

  // partNN.mp3 only appears once the whole body is on disk
  const tempPath = `${filePath}.part`;
  let received = 0;
  try {
    const done = pipeline(response.data, fs.createWriteStream(tempPath));
    response.data.on('data', (chunk: Buffer) => {
      received += chunk.length;
      progress?.update(received);
    });
    await done;
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }

  progress?.finish();
  return received;
}

function isWriteFailure(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error && ['open', 'write', 'rename'].includes(String(error.syscall));
}

/**
 * Downloads the parts one after another. A part already on disk with the
 * size the manifest declares is skipped unless `force` is set; a failure
 * stops the run and leaves the parts fetched so far in place.
 */
export async function downloadParts(
  targets: readonly DownloadTarget[],
  license: License,
  options: DownloadOptions
): Promise<DownloadSummary> {
  const headers = {
    License: license.xml,
    ClientID: license.clientId,
    'User-Agent': config.USER_AGENT,
  };
  const summary: DownloadSummary = { downloaded: 0, skipped: 0 };

  logger.info({ parts: targets.length }, `Downloading ${targets.length} parts`);
  for (const { part, filePath } of targets) {
    logger.debug(
      { fileName: part.fileName, fileSize: part.fileSize, duration: part.duration, filePath },
      `Part ${part.number} of ${targets.length}`
    );

    if (await fileExists(filePath, part.fileSize)) {
      if (!options.force) {
        logger.info({ filePath }, `${part.name} already exists, skipping`);
        summary.skipped++;
        continue;
      }
      logger.info({ filePath }, `Overwriting ${part.name}`);
    }

    logger.info(`Downloading ${part.name} (${part.number} of ${targets.length})`);
    try {
      const bytes = await streamToFile(part.downloadUrl, headers, filePath, part.name, options.progress);
      logger.debug({ filePath, bytes }, 'Part saved');
    } catch (error) {
      logger.error({ part: part.name, url: part.downloadUrl, error: error instanceof Error ? error.message : String(error) }, 'Part download failed');
      if (isWriteFailure(error)) throw toFileSystemError(error, 'write', filePath);
      throw toNetworkError(error, part.name);
    }
    summary.downloaded++;
  }

  return summary;
}

/**
 * Saves the cover image next to the parts. Failures are logged and ignored;
 * returns whether a cover is on disk afterwards.
 */
export async function downloadCover(manifest: Manifest, coverPath: string, force: boolean): Promise<boolean> {
  if (!manifest.coverUrl) return false;

  if (await fileExists(coverPath)) {
    if (!force) {
      logger.debug({ coverPath }, 'Cover image already exists, skipping');
      return true;
    }
    logger.info({ coverPath }, 'Overwriting cover image');
  }

  try {
    const response = await axios.get<ArrayBuffer>(manifest.coverUrl, {
      responseType: 'arraybuffer',
      headers: { 'User-Agent': COVER_USER_AGENT },
      timeout: config.HTTP_TIMEOUT_MS,
    });
    await fs.writeFile(coverPath, Buffer.from(response.data));
    logger.debug({ coverPath }, 'Saved cover image');
    return true;
  } catch (error) {
    logger.warn(
      { coverUrl: manifest.coverUrl, error: error instanceof Error ? error.message : String(error) },
      'Could not download cover image'
    );
    return false;
  }
}
