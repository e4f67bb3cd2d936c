import * as fs from 'fs-extra';
import { toFileSystemError } from '../core/errors';
import { run } from '../core/exec';
import { fileExists } from '../core/fs';
import { logger } from '../core/logger';
import type { OwnerSettings } from '../core/settings';
import type { BookLayout } from '../odm/types';

/** chown leaves the id untouched when given -1. */
export const KEEP_ID = -1;

export async function resolveUserId(user: string | undefined): Promise<number> {
  if (!user) return KEEP_ID;
  if (/^\d+$/.test(user)) return Number(user);
  const result = await run('id', ['-u', user]);
  const uid = Number.parseInt(result.stdout.trim(), 10);
  if (result.code !== 0 || !Number.isInteger(uid)) {
    logger.warn({ user }, 'Unknown user, keeping current file owner');
    return KEEP_ID;
  }
  return uid;
}

// getent prints "name:password:gid:members"
async function lookupGroupWithGetent(group: string): Promise<number | undefined> {
  const result = await run('getent', ['group', group]);
  const gid = Number.parseInt(result.stdout.trim().split(':')[2] ?? '', 10);
  return result.code === 0 && Number.isInteger(gid) ? gid : undefined;
}

// macOS has no getent; Directory Services prints "PrimaryGroupID: 20"
async function lookupGroupWithDscl(group: string): Promise<number | undefined> {
  const result = await run('dscl', ['.', '-read', `/Groups/${group}`, 'PrimaryGroupID']);
  const match = /PrimaryGroupID:\s*(\d+)/.exec(result.stdout);
  return result.code === 0 && match?.[1] !== undefined ? Number(match[1]) : undefined;
}

export async function resolveGroupId(group: string | undefined): Promise<number> {
  if (!group) return KEEP_ID;
  if (/^\d+$/.test(group)) return Number(group);
  const gid = (await lookupGroupWithGetent(group)) ?? (await lookupGroupWithDscl(group));
  if (gid === undefined) {
    logger.warn({ group }, 'Unknown group, keeping current file group');
    return KEEP_ID;
  }
  return gid;
}

async function chown(target: string, uid: number, gid: number): Promise<void> {
  logger.debug({ target, uid, gid }, 'Updating owner');
  try {
    await fs.chown(target, uid, gid);
  } catch (error) {
    throw toFileSystemError(error, 'change owner of', target);
  }
}

/**
 * Hands the author directory, the book directory, every part and the cover
 * (when present) to the configured user and group.
 */
export async function updateOwner(layout: BookLayout, owner: OwnerSettings): Promise<void> {
  logger.info('Updating file owner info');
  const uid = await resolveUserId(owner.user);
  const gid = await resolveGroupId(owner.group);

  await chown(layout.authorDir, uid, gid);
  await chown(layout.bookDir, uid, gid);
  for (const { filePath } of layout.targets) {
    await chown(filePath, uid, gid);
  }
  if (await fileExists(layout.coverPath)) {
    await chown(layout.coverPath, uid, gid);
  }
}
