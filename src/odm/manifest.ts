import * as fs from 'fs-extra';
import * as path from 'path';
import { AppError, ERROR_CODES, toFileSystemError } from '../core/errors';
import { logger } from '../core/logger';
import type { Manifest, Part } from './types';
import { attr, childElements, childText, descendants, parseXml, textOf } from './xml';

const ODM_SIGNATURE = /<OverDriveMedia/;
const METADATA_BLOCK = /<Metadata>[\s\S]*<\/Metadata>/;
const BARE_AMPERSAND = /&(?!(?:amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);)/g;

function parseError(message: string, details?: unknown): AppError {
  return new AppError(ERROR_CODES.ERR_PARSE, message, details);
}

/**
 * Checks that `odmPath` is a readable file that looks like an ODM manifest
 * (the root element shows up in its first 100 characters).
 */
export async function verifyOdmFile(odmPath: string): Promise<void> {
  const name = path.basename(odmPath);
  logger.debug({ odmPath }, 'Verifying ODM file');

  let stats: fs.Stats;
  try {
    stats = await fs.stat(odmPath);
  } catch (error) {
    throw new AppError(
      ERROR_CODES.ERR_FILESYSTEM,
      `Expected ODM file. Specified file "${name}" does not exist`,
      { odmPath, cause: error instanceof Error ? error.message : String(error) }
    );
  }
  if (stats.isDirectory()) {
    throw parseError(`Expected ODM file. Given directory: ${name}`, { odmPath });
  }

  let head: string;
  try {
    head = (await fs.readFile(odmPath, 'utf8')).slice(0, 100);
  } catch (error) {
    throw toFileSystemError(error, 'read', odmPath);
  }
  if (!ODM_SIGNATURE.test(head)) {
    throw parseError(`Expected ODM file. Specified file "${name}" is not in the OverDriveMedia format`, { odmPath });
  }
}

/** "1:02:03" or "12:34" to seconds. */
export function parseDuration(value: string): number | undefined {
  const pieces = value.split(':');
  if (pieces.length < 2 || pieces.length > 3) return undefined;
  let seconds = 0;
  for (const piece of pieces) {
    if (!/^\d+(\.\d+)?$/.test(piece)) return undefined;
    seconds = seconds * 60 + Number(piece);
  }
  return seconds;
}

function parseMetadata(source: string, odmName: string) {
  const match = METADATA_BLOCK.exec(source);
  if (!match) {
    throw parseError(`Could not find Metadata in ${odmName}`);
  }
  const metadata = parseXml(match[0].replace(BARE_AMPERSAND, '&amp;'), `${odmName} metadata`);

  const title = childText(metadata, 'Title');
  if (!title) {
    throw parseError(`Bad ODM file: no Title in the metadata of ${odmName}`);
  }

  const creators = descendants(metadata, 'Creator');
  const byRole = (role: string) =>
    creators
      .filter((el) => attr(el, 'role') === role)
      .map((el) => textOf(el))
      .filter((name): name is string => name !== undefined);
  let authors = byRole('Author');
  if (authors.length === 0) {
    // Anthologies list editors instead of authors
    authors = byRole('Editor');
  }

  const series = descendants(metadata, 'Series')[0];

  return {
    title,
    subtitle: childText(metadata, 'SubTitle'),
    authors,
    publisher: childText(metadata, 'Publisher'),
    series: series ? textOf(series) : undefined,
    language: textOf(descendants(metadata, 'Language')[0]),
    description: childText(metadata, 'Description'),
    coverUrl: childText(metadata, 'CoverUrl'),
  };
}

function parsePart(el: Element, baseUrl: string, odmName: string): Part {
  const numberAttr = attr(el, 'number');
  const fileName = attr(el, 'filename');
  const number = numberAttr !== undefined ? Number.parseInt(numberAttr, 10) : Number.NaN;
  if (!Number.isInteger(number) || number < 1) {
    throw parseError(`Bad ODM file: part without a valid number in ${odmName}`, { number: numberAttr });
  }
  if (!fileName) {
    throw parseError(`Bad ODM file: part ${number} has no filename in ${odmName}`);
  }

  const sizeAttr = attr(el, 'filesize');
  const fileSize = sizeAttr !== undefined && /^\d+$/.test(sizeAttr) ? Number(sizeAttr) : undefined;
  const duration = attr(el, 'duration') ?? '';

  return {
    number,
    name: attr(el, 'name') ?? `Part ${number}`,
    fileName,
    fileSize,
    duration,
    durationSeconds: parseDuration(duration),
    downloadUrl: `${baseUrl}/${fileName}`,
  };
}

/**
 * Parses the text of an ODM file. `source` names the file in error messages.
 */
export function parseManifest(xml: string, source = 'ODM file'): Manifest {
  const odmName = path.basename(source);
  const root = parseXml(xml, odmName);
  if (root.nodeName !== 'OverDriveMedia') {
    throw parseError(`Expected OverDriveMedia root element in ${odmName}, found ${root.nodeName}`);
  }

  const metadata = parseMetadata(xml, odmName);

  const mediaId = attr(root, 'id');
  if (!mediaId) {
    throw parseError(`Bad ODM file: no media id in ${odmName}`);
  }

  const license = childElements(root, 'License')[0];
  const licenseAcquisitionUrl = license ? childText(license, 'AcquisitionUrl') : undefined;
  if (!licenseAcquisitionUrl) {
    throw parseError(`Bad ODM file: no License/AcquisitionUrl in ${odmName}`);
  }

  const protocol = descendants(root, 'Protocol').find((el) => attr(el, 'method') === 'download');
  const baseUrl = protocol ? attr(protocol, 'baseurl') : undefined;
  if (!baseUrl) {
    throw parseError(`Trouble extracting download URL from ${odmName}`);
  }

  const partsEl = descendants(root, 'Parts')[0];
  const declared = partsEl ? Number.parseInt(attr(partsEl, 'count') ?? '0', 10) : 0;
  const partEls = descendants(root, 'Part');
  if (partEls.length === 0) {
    throw parseError(`Bad ODM file: no parts listed in ${odmName}`);
  }
  if (partEls.length !== declared) {
    throw parseError(
      `Bad ODM file: expecting ${declared} parts, but found ${partEls.length} part records`,
      { declared, found: partEls.length }
    );
  }
  const parts = partEls.map((el) => parsePart(el, baseUrl.replace(/\/+$/, ''), odmName));
  const numbers = new Set<number>();
  for (const part of parts) {
    if (numbers.has(part.number)) {
      throw parseError(`Bad ODM file: part ${part.number} is listed more than once in ${odmName}`);
    }
    numbers.add(part.number);
  }

  const manifest: Manifest = {
    mediaId,
    title: metadata.title,
    subtitle: metadata.subtitle,
    authors: metadata.authors,
    author: metadata.authors.join(';'),
    publisher: metadata.publisher,
    series: metadata.series,
    language: metadata.language,
    description: metadata.description,
    coverUrl: metadata.coverUrl,
    licenseAcquisitionUrl,
    baseUrl,
    parts,
  };

  logger.info(
    { title: manifest.title, authors: manifest.authors, parts: parts.length, odm: odmName },
    'Parsed ODM manifest'
  );
  return manifest;
}

export async function loadManifest(odmPath: string): Promise<Manifest> {
  await verifyOdmFile(odmPath);
  let xml: string;
  try {
    xml = await fs.readFile(odmPath, 'utf8');
  } catch (error) {
    throw toFileSystemError(error, 'read', odmPath);
  }
  return parseManifest(xml, odmPath);
}
