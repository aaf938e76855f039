import { utimes } from 'node:fs/promises';
import type { Logger } from '../logger.js';

/** Unix epoch, in seconds. */
export const EPOCH = 0;

/**
 * Set both access and modification time of `path` to the Unix epoch.
 * Best-effort: a failure is logged at debug level and reported as `false`.
 */
export async function normalizeTimestamps(path: string, logger: Logger): Promise<boolean> {
  try {
    await utimes(path, EPOCH, EPOCH);
    return true;
  } catch (err) {
    logger.debug(`Timestamp normalization failed for ${path}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}
