/**
 * Recursive file discovery with directory exclusion.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Version-control metadata and dependency caches, never descended into.
 */
export const DEFAULT_EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  '.git', '.hg', '.svn', '__pycache__', 'node_modules', '.venv', 'venv',
]);

export interface WalkOptions {
  /** Directory names to skip; defaults to `DEFAULT_EXCLUDED_DIRS`. */
  exclude?: ReadonlySet<string>;
  logger?: Logger;
  /** Checked between directories; the walk stops once it is aborted. */
  signal?: AbortSignal;
}

/**
 * Depth-first walk yielding absolute paths of regular files under `root`.
 *
 * Entries are visited in name order. Excluded directories are dropped before
 * recursion, so nothing beneath them is read. Symlinks and special files are
 * skipped. A directory that cannot be read is logged and skipped.
 */
export async function* walkFiles(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const exclude = options.exclude ?? DEFAULT_EXCLUDED_DIRS;
  const pending: string[] = [root];

  while (pending.length > 0) {
    if (options.signal?.aborted) return;
    const dir = pending.pop();
    if (dir === undefined) return;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      options.logger?.warn(`Skipping unreadable directory ${dir}`, { error: describeError(err) });
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirs: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!exclude.has(entry.name)) subdirs.push(join(dir, entry.name));
      } else if (entry.isFile()) {
        yield join(dir, entry.name);
      }
    }

    // Reversed so the stack pops them in name order.
    for (let i = subdirs.length - 1; i >= 0; i--) {
      pending.push(subdirs[i]!);
    }
  }
}

/**
 * Drain a walk into an array.
 */
export async function collectFiles(root: string, options: WalkOptions = {}): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkFiles(root, options)) {
    files.push(file);
  }
  return files;
}
