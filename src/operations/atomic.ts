/**
 * Write-to-temp-then-rename discipline shared by every mutating strategy.
 */

import { randomBytes } from 'node:crypto';
import { rmSync } from 'node:fs';
import { rename, rm } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { IOFailureError } from '../errors.js';

/** Temp paths of replacements still in progress. */
const pending = new Set<string>();

/**
 * A temp path beside `path`, keeping its extension so encoders can infer the
 * container from the name.
 */
export function tempPathFor(path: string): string {
  const ext = extname(path);
  const stem = basename(path, ext);
  return join(dirname(path), `.${stem}.tagsweep-${randomBytes(4).toString('hex')}.tmp${ext}`);
}

/**
 * Let `write` produce the full replacement at a temp path, then rename it over
 * `path`. If `write` throws, or the rename fails, the original is untouched
 * and the temp file is removed before the error propagates.
 */
export async function replaceAtomically(
  path: string,
  write: (tempPath: string) => Promise<void>,
): Promise<void> {
  const temp = tempPathFor(path);
  pending.add(temp);
  try {
    await write(temp);
    try {
      await rename(temp, path);
    } catch (err) {
      throw new IOFailureError('rename', path, err);
    }
  } finally {
    await rm(temp, { force: true });
    pending.delete(temp);
  }
}

/**
 * Remove the temp files of every replacement still in progress. For a hard
 * exit, where the `finally` of `replaceAtomically` never runs.
 */
export function discardPendingTemps(): void {
  for (const temp of pending) {
    rmSync(temp, { force: true });
  }
  pending.clear();
}
