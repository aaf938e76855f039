import { rm } from 'node:fs/promises';
import { CollaboratorFailureError } from '../errors.js';
import { guard, lastLine } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

export const EXIFTOOL_TIMEOUT_MS = 300_000;

/** Erase every writable tag and rewrite the file in place. */
export const EXIFTOOL_ARGS = ['-all=', '-overwrite_original'] as const;

/**
 * The general-purpose stripper, tried first for every category.
 */
export function createExiftoolStrategy(deps: StrategyDeps, command = 'exiftool'): CleaningStrategy {
  const logger = deps.logger.child('exiftool');

  return {
    name: 'exiftool',
    kind: 'external_tool',
    requires: 'exiftool',
    attempt: path =>
      guard('exiftool', path, logger, async () => {
        const result = await deps.runner(command, [...EXIFTOOL_ARGS, path], {
          timeoutMs: EXIFTOOL_TIMEOUT_MS,
        });
        if (result.code !== 0) {
          throw new CollaboratorFailureError('exiftool', lastLine(result.stderr) || 'no output', result.code);
        }
        // exiftool leaves <file>_original behind unless told otherwise.
        await rm(`${path}_original`, { force: true });
        logger.debug(`Stripped ${path}`);
        return true;
      }),
  };
}
