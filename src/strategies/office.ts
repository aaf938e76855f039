import { readFile, writeFile } from 'node:fs/promises';
import { startsWith } from '../binary/buffer.js';
import { CollaboratorFailureError } from '../errors.js';
import {
  APP_XML,
  CONTENT_TYPES,
  CORE_XML,
  cleanAppProperties,
  cleanCoreProperties,
} from '../formats/office.js';
import { replaceAtomically } from '../operations/atomic.js';
import { FILE_SIGNATURES } from '../signatures.js';
import { guard } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

/**
 * Rewrites the property parts of .docx, .xlsx and .pptx packages. Legacy
 * binary formats (.doc, .xls, .ppt) are not zip packages and fail here.
 */
export function createOfficeStrategy(deps: StrategyDeps): CleaningStrategy {
  const logger = deps.logger.child('office');

  return {
    name: 'office',
    kind: 'library',
    requires: 'jszip',
    attempt: path =>
      guard('office', path, logger, async () => {
        const input = await readFile(path);
        if (!startsWith(input, FILE_SIGNATURES.ZIP)) {
          throw new CollaboratorFailureError('jszip', 'not an Office Open XML package');
        }

        const { default: JSZip } = await import('jszip');
        const zip = await JSZip.loadAsync(input);
        if (!zip.file(CONTENT_TYPES)) {
          throw new CollaboratorFailureError('jszip', `missing ${CONTENT_TYPES}`);
        }

        const rewritten: string[] = [];
        const core = zip.file(CORE_XML);
        if (core) {
          zip.file(CORE_XML, cleanCoreProperties(await core.async('string')));
          rewritten.push(CORE_XML);
        }
        const app = zip.file(APP_XML);
        if (app) {
          zip.file(APP_XML, cleanAppProperties(await app.async('string')));
          rewritten.push(APP_XML);
        }

        const output = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
        await replaceAtomically(path, temp => writeFile(temp, output));
        logger.debug(`Rewrote ${path}`, { parts: rewritten.join(', ') || 'none' });
        return true;
      }),
  };
}
