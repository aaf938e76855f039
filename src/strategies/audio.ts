import { readFile, writeFile } from 'node:fs/promises';
import { CollaboratorFailureError } from '../errors.js';
import { stripAudioTags } from '../formats/audio.js';
import { replaceAtomically } from '../operations/atomic.js';
import { guard } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

export function createAudioStrategy(deps: StrategyDeps): CleaningStrategy {
  const logger = deps.logger.child('audio-tags');

  return {
    name: 'audio-tags',
    kind: 'library',
    requires: 'audio-tags',
    attempt: path =>
      guard('audio-tags', path, logger, async () => {
        const result = stripAudioTags(new Uint8Array(await readFile(path)));
        if (!result) {
          throw new CollaboratorFailureError('audio-tags', 'unsupported audio container');
        }
        if (result.removed.length === 0) {
          logger.debug(`No tags in ${path}`, { container: result.container });
          return true;
        }
        await replaceAtomically(path, temp => writeFile(temp, result.data));
        logger.debug(`Removed ${result.removed.join(', ')} from ${path}`, { container: result.container });
        return true;
      }),
  };
}
