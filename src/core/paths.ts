import * as os from 'os';
import * as path from 'path';

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

// Characters that cannot appear in a single path segment on common filesystems
const UNSAFE_SEGMENT_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Makes an author or title usable as one directory name.
 *
 * @example
 * toPathSegment('AC/DC: The Story', false) // "AC_DC_ The Story"
 */
export function toPathSegment(value: string, lowercase: boolean): string {
  let segment = value.replace(UNSAFE_SEGMENT_CHARS, '_').replace(/\s+/g, ' ').trim();
  segment = segment.replace(/^\.+/, '').replace(/\.+$/, '');
  if (segment.length === 0) segment = 'unknown';
  return lowercase ? segment.toLowerCase() : segment;
}

export const paths = {
  defaultConfig: (configured: string) => path.resolve(process.cwd(), expandHome(configured)),
  clientId: (configured: string) => path.resolve(expandHome(configured)),
  book: {
    dir: (downloadDir: string, authorSegment: string, titleSegment: string) =>
      path.resolve(expandHome(downloadDir), authorSegment, titleSegment),
    part: (bookDir: string, partNumber: number) =>
      path.join(bookDir, `part${String(partNumber).padStart(2, '0')}.mp3`),
    cover: (bookDir: string, titleSegment: string) => path.join(bookDir, `${titleSegment}.jpg`),
  },
};
