import * as NodeID3 from 'node-id3';
import { AppError, ERROR_CODES } from '../core/errors';
import { logger } from '../core/logger';
import { TAG_FIELDS, type TagRules } from '../core/settings';
import type { DownloadTarget, Manifest, Part } from '../odm/types';

const PLACEHOLDER = /\{(title|author|part|parts)\}/g;

/**
 * Fills `{title}`, `{author}`, `{part}` and `{parts}` in every configured
 * tag value for one part.
 */
export function renderTags(rules: TagRules, manifest: Manifest, part: Part, totalParts: number): NodeID3.Tags {
  const values: Record<string, string> = {
    title: manifest.title,
    author: manifest.authors.join(', '),
    part: String(part.number),
    parts: String(totalParts),
  };
  const tags: NodeID3.Tags = {};
  for (const field of TAG_FIELDS) {
    const template = rules[field];
    if (template === undefined) continue;
    tags[field] = template.replace(PLACEHOLDER, (_, key: string) => values[key] ?? '');
  }
  return tags;
}

export async function updateTags(
  targets: readonly DownloadTarget[],
  rules: TagRules,
  manifest: Manifest
): Promise<void> {
  logger.info('Updating ID3 tags');
  for (const { part, filePath } of targets) {
    const tags = renderTags(rules, manifest, part, targets.length);
    logger.debug({ filePath, tags }, 'Updating tags');
    try {
      await NodeID3.Promise.update(tags, filePath);
    } catch (error) {
      throw new AppError(
        ERROR_CODES.ERR_FILESYSTEM,
        `Failed to update ID3 tags of "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
  }
}
