/**
 * Backup-before-mutate: copy each file into the run's backup tree.
 */

import { copyFile, mkdir, stat, utimes } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import { IOFailureError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface BackupOptions {
  /** Walk root; backups mirror the file's path relative to it. */
  root: string;
  /** Timestamped backup directory of this run. */
  backupDir: string;
  logger: Logger;
}

/**
 * Where `path` is copied to: `backupDir/<path relative to root>`.
 */
export function backupPathFor(path: string, root: string, backupDir: string): string {
  return join(backupDir, relative(root, path));
}

/**
 * Copy `path` into the backup tree, keeping its access and modification
 * times. Returns `false` (after logging) on any I/O failure; never throws.
 */
export async function backupFile(path: string, options: BackupOptions): Promise<boolean> {
  const target = backupPathFor(path, options.root, options.backupDir);
  try {
    try {
      await mkdir(dirname(target), { recursive: true });
      const info = await stat(path);
      await copyFile(path, target);
      await utimes(target, info.atime, info.mtime);
    } catch (err) {
      throw new IOFailureError('backup', path, err);
    }
    options.logger.debug(`Backed up ${path}`, { target });
    return true;
  } catch (err) {
    options.logger.error(`Backup failed for ${path}`, err);
    return false;
  }
}
