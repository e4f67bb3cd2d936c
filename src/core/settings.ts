import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { config } from './config';
import { AppError, ERROR_CODES } from './errors';
import { readTextIfExists } from './fs';
import { logger } from './logger';
import { paths } from './paths';

export const TAG_FIELDS = [
  'title',
  'artist',
  'album',
  'year',
  'genre',
  'composer',
  'publisher',
  'performerInfo',
  'trackNumber',
  'partOfSet',
] as const;

export type TagField = typeof TAG_FIELDS[number];
export type TagRules = Partial<Record<TagField, string>>;

// EasyID3-style names people already have in their config files
const TAG_ALIASES: Record<string, TagField> = {
  albumartist: 'performerInfo',
  date: 'year',
  tracknumber: 'trackNumber',
  discnumber: 'partOfSet',
  organization: 'publisher',
};

export interface OwnerSettings {
  user?: string | undefined;
  group?: string | undefined;
}

export interface Settings {
  downloadDir: string;
  lowercaseFilenames: boolean;
  tags?: TagRules | undefined;
  owner?: OwnerSettings | undefined;
  /** File the settings came from, null for built-in defaults. */
  source: string | null;
}

export const DEFAULT_SETTINGS: Settings = {
  downloadDir: '~/Documents/audiobooks/',
  lowercaseFilenames: true,
  tags: { genre: 'Audiobook' },
  source: null,
};

const settingsSchema = z.object({
  download_dir: z.string().min(1).default(DEFAULT_SETTINGS.downloadDir),
  filenames_lowercase: z.boolean().default(DEFAULT_SETTINGS.lowercaseFilenames),
  tags: z.record(z.string(), z.union([z.string(), z.number()]).transform(String)).optional(),
  owner: z
    .object({
      user: z.string().min(1).optional(),
      group: z.string().min(1).optional(),
    })
    .strict()
    .refine((owner) => owner.user !== undefined || owner.group !== undefined, {
      message: 'owner needs a user or a group',
    })
    .optional(),
}).strict();

function isTagField(key: string): key is TagField {
  return TAG_FIELDS.some((field) => field === key);
}

export function normalizeTagRules(raw: Record<string, string>, source: string): TagRules {
  const rules: TagRules = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = isTagField(key) ? key : TAG_ALIASES[key.toLowerCase()];
    if (!field) {
      throw new AppError(
        ERROR_CODES.ERR_CONFIG,
        `Unknown tag "${key}" in ${source}. Supported tags: ${TAG_FIELDS.join(', ')}`,
        { key, source }
      );
    }
    rules[field] = value;
  }
  return rules;
}

export function parseSettings(text: string, source: string): Settings {
  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (error) {
    throw new AppError(
      ERROR_CODES.ERR_CONFIG,
      `Configuration file ${source} is not valid TOML: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }

  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
    throw new AppError(
      ERROR_CODES.ERR_CONFIG,
      `Invalid configuration file ${source}: ${issues.join('; ')}`,
      { source, issues }
    );
  }

  const parsed = result.data;
  return {
    downloadDir: parsed.download_dir,
    lowercaseFilenames: parsed.filenames_lowercase,
    tags: parsed.tags ? normalizeTagRules(parsed.tags, source) : undefined,
    owner: parsed.owner,
    source,
  };
}

/**
 * Loads the TOML settings file. An explicitly requested file must exist;
 * without one the default location is tried and built-in defaults are used
 * when nothing is there.
 */
export async function loadSettings(explicitPath?: string): Promise<Settings> {
  const filePath = paths.defaultConfig(explicitPath ?? config.ODM_CONFIG);
  const text = await readTextIfExists(filePath);

  if (text === null) {
    if (explicitPath !== undefined) {
      throw new AppError(ERROR_CODES.ERR_CONFIG, `Configuration file ${filePath} does not exist`, { filePath });
    }
    logger.warn({ filePath }, 'No configuration file found, using built-in defaults');
    return { ...DEFAULT_SETTINGS, tags: { ...DEFAULT_SETTINGS.tags } };
  }

  const settings = parseSettings(text, filePath);
  logger.debug({ filePath, downloadDir: settings.downloadDir }, 'Loaded configuration');
  return settings;
}
