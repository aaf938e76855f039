import { extname } from 'node:path';
import type { Category } from './types.js';

// ─── Extension table ──────────────────────────────────────────────────────────

export const FILE_CATEGORIES: Readonly<Record<Exclude<Category, 'unknown'>, ReadonlySet<string>>> = {
  image: new Set([
    '.jpg', '.jpeg', '.png', '.webp', '.tif', '.tiff', '.bmp', '.gif',
    '.heic', '.heif', '.raw', '.cr2', '.nef', '.dng',
  ]),
  video: new Set([
    '.mp4', '.mov', '.mkv', '.avi', '.webm', '.flv', '.wmv', '.m4v', '.mpg', '.mpeg',
  ]),
  pdf: new Set(['.pdf']),
  docx: new Set(['.docx', '.doc']),
  xlsx: new Set(['.xlsx', '.xls']),
  pptx: new Set(['.pptx', '.ppt']),
  audio: new Set(['.mp3', '.m4a', '.flac', '.wav', '.ogg', '.wma', '.aac', '.opus']),
  archive: new Set(['.zip', '.rar', '.7z', '.tar', '.gz', '.bz2']),
};

/**
 * Every category, in the order the summary lists them.
 */
export const CATEGORIES: readonly Category[] = [
  'image', 'video', 'pdf', 'docx', 'xlsx', 'pptx', 'audio', 'archive', 'unknown',
];

const BY_EXTENSION = new Map<string, Category>();
for (const category of CATEGORIES) {
  if (category === 'unknown') continue;
  for (const ext of FILE_CATEGORIES[category]) {
    BY_EXTENSION.set(ext, category);
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Classify a path by its extension (case-insensitive). Total: every path
 * gets exactly one category, `unknown` when the extension is not mapped.
 */
export function classify(path: string): Category {
  return BY_EXTENSION.get(extname(path).toLowerCase()) ?? 'unknown';
}
