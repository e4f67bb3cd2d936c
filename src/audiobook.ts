import { ensureDirectory } from './core/fs';
import { logger } from './core/logger';
import type { Settings } from './core/settings';
import { buildLayout, downloadCover, downloadParts, type DownloadSummary } from './odm/download';
import { getLicense } from './odm/license';
import { loadManifest } from './odm/manifest';
import { formatBytes, type ProgressReporter } from './odm/progress';
import type { BookLayout, Manifest } from './odm/types';
import { updateOwner } from './post/owner';
import { updateTags } from './post/tags';
import { ensurePartsExist } from './post/verify';

export interface PostProcessOptions {
  tags: boolean;
  owner: boolean;
}

export interface DownloadAudiobookOptions extends PostProcessOptions {
  force: boolean;
  progress?: ProgressReporter | undefined;
  clientIdPath?: string | undefined;
}

export interface DownloadAudiobookResult extends DownloadSummary {
  manifest: Manifest;
  layout: BookLayout;
}

async function postProcess(
  manifest: Manifest,
  layout: BookLayout,
  settings: Settings,
  options: PostProcessOptions
): Promise<void> {
  if (options.tags) {
    if (settings.tags) {
      await updateTags(layout.targets, settings.tags, manifest);
    } else {
      logger.error({ config: settings.source }, 'Tag update requested but no tags are configured');
    }
  }
  if (options.owner) {
    if (settings.owner) {
      await updateOwner(layout, settings.owner);
    } else {
      logger.error({ config: settings.source }, 'Owner update requested but no owner is configured');
    }
  }
}

export async function downloadAudiobook(
  odmPath: string,
  settings: Settings,
  options: DownloadAudiobookOptions
): Promise<DownloadAudiobookResult> {
  const manifest = await loadManifest(odmPath);
  const license = await getLicense(manifest, options.clientIdPath);
  const layout = buildLayout(manifest, settings);

  logger.debug({ bookDir: layout.bookDir }, 'Saving files');
  await ensureDirectory(layout.bookDir);
  await downloadCover(manifest, layout.coverPath, options.force);

  const summary = await downloadParts(layout.targets, license, {
    force: options.force,
    progress: options.progress,
  });
  logger.info(summary, `Finished "${manifest.title}"`);

  await postProcess(manifest, layout, settings, options);
  return { ...summary, manifest, layout };
}

/** Tags and/or owner for a book downloaded earlier. Never touches the network. */
export async function postProcessOnly(
  odmPath: string,
  settings: Settings,
  options: PostProcessOptions
): Promise<BookLayout> {
  const manifest = await loadManifest(odmPath);
  const layout = buildLayout(manifest, settings);
  await ensurePartsExist(layout);
  await postProcess(manifest, layout, settings, options);
  return layout;
}

function formatSeconds(total: number): string {
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = Math.round(total % 60);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${hours}:${pad(minutes)}:${pad(seconds)}`;
}

export function describeManifest(manifest: Manifest): string {
  const lines = [`Title:     ${manifest.title}`];
  if (manifest.subtitle) lines.push(`Subtitle:  ${manifest.subtitle}`);
  lines.push(`Author:    ${manifest.authors.length > 0 ? manifest.authors.join(', ') : 'unknown'}`);
  if (manifest.series) lines.push(`Series:    ${manifest.series}`);
  if (manifest.publisher) lines.push(`Publisher: ${manifest.publisher}`);
  if (manifest.language) lines.push(`Language:  ${manifest.language}`);
  lines.push(`Media ID:  ${manifest.mediaId}`);
  if (manifest.coverUrl) lines.push(`Cover:     ${manifest.coverUrl}`);

  const known = manifest.parts.filter((part) => part.durationSeconds !== undefined);
  const totalSeconds = known.reduce((sum, part) => sum + (part.durationSeconds ?? 0), 0);
  lines.push(
    `Parts:     ${manifest.parts.length}` +
    (known.length === manifest.parts.length ? ` (${formatSeconds(totalSeconds)})` : '')
  );
  for (const part of manifest.parts) {
    const size = part.fileSize !== undefined ? `, ${formatBytes(part.fileSize)}` : '';
    const duration = part.duration ? `, ${part.duration}` : '';
    lines.push(`  ${String(part.number).padStart(2, ' ')}. ${part.name} (${part.fileName}${size}${duration})`);
  }
  return lines.join('\n');
}
