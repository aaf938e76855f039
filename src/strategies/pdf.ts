import { readFile, writeFile } from 'node:fs/promises';
import { CollaboratorFailureError } from '../errors.js';
import { stripPdfMetadata } from '../formats/pdf.js';
import { replaceAtomically } from '../operations/atomic.js';
import { guard } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

export function createPdfStrategy(deps: StrategyDeps): CleaningStrategy {
  const logger = deps.logger.child('pdf');

  return {
    name: 'pdf',
    kind: 'library',
    requires: 'pdf',
    attempt: path =>
      guard('pdf', path, logger, async () => {
        const result = stripPdfMetadata(new Uint8Array(await readFile(path)));
        if (result.encrypted) {
          throw new CollaboratorFailureError('pdf', 'document is encrypted');
        }
        if (result.infoUnreachable) {
          throw new CollaboratorFailureError('pdf', 'Info dictionary is inside a compressed object stream');
        }
        await replaceAtomically(path, temp => writeFile(temp, result.data));
        logger.debug(`Rewrote ${path}`, { removed: result.removed.join(', ') || 'nothing' });
        return true;
      }),
  };
}
