import * as fs from 'fs-extra';
import { AppError, ERROR_CODES } from '../core/errors';
import { fileExists } from '../core/fs';
import { logger } from '../core/logger';
import type { BookLayout } from '../odm/types';

/** Post-processing without a download needs every part on disk already. */
export async function ensurePartsExist(layout: BookLayout): Promise<void> {
  let isDir = false;
  try {
    isDir = (await fs.stat(layout.bookDir)).isDirectory();
  } catch (error) {
    logger.debug({ dir: layout.bookDir, error: error instanceof Error ? error.message : String(error) }, 'Book directory not readable');
  }
  if (!isDir) {
    throw new AppError(
      ERROR_CODES.ERR_FILESYSTEM,
      `Expected to find directory "${layout.bookDir}", but it does not exist`,
      { dir: layout.bookDir }
    );
  }
  for (const { filePath } of layout.targets) {
    if (!(await fileExists(filePath))) {
      throw new AppError(ERROR_CODES.ERR_FILESYSTEM, `Expected file "${filePath}" does not exist`, { filePath });
    }
  }
}
