import * as fs from 'fs-extra';
import { logger } from './logger';
import { toFileSystemError } from './errors';

/**
 * True when `filePath` is a regular file, and, if `expectedSizeBytes` is
 * given, exactly that large.
 */
export async function fileExists(filePath: string, expectedSizeBytes?: number): Promise<boolean> {
  let exists = false;
  try {
    const stats = await fs.stat(filePath);
    exists = stats.isFile() && (expectedSizeBytes === undefined || stats.size === expectedSizeBytes);
  } catch (error) {
    if (!isNotFound(error)) throw toFileSystemError(error, 'inspect', filePath);
  }
  logger.debug({ filePath, expectedSizeBytes, exists }, 'File existence check');
  return exists;
}

export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.ensureDir(dir);
    logger.debug({ dir }, 'Directory ensured');
  } catch (error) {
    logger.error({ error, dir }, 'Failed to ensure directory');
    throw toFileSystemError(error, 'create directory', dir);
  }
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw toFileSystemError(error, 'read', filePath);
  }
}

export async function writeText(filePath: string, content: string): Promise<void> {
  try {
    await fs.outputFile(filePath, content, 'utf8');
  } catch (error) {
    throw toFileSystemError(error, 'write', filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
