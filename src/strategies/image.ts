import { extname } from 'node:path';
import type Sharp from 'sharp';
import type { FormatEnum } from 'sharp';
import { CollaboratorFailureError } from '../errors.js';
import { replaceAtomically } from '../operations/atomic.js';
import { guard } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

export const JPEG_QUALITY = 95;

/**
 * Encoders sharp can write back in the file's own format. BMP and camera
 * raw formats are read-only for sharp and are not listed.
 */
export const OUTPUT_FORMATS: Readonly<Record<string, keyof FormatEnum>> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.webp': 'webp',
  '.tif': 'tiff',
  '.tiff': 'tiff',
  '.gif': 'gif',
  '.heic': 'heif',
  '.heif': 'heif',
};

let loaded: Promise<typeof Sharp> | undefined;

/**
 * Load sharp once. The file cache is turned off so a re-read sees the bytes
 * that were just swapped in.
 */
export function loadSharp(): Promise<typeof Sharp> {
  loaded ??= import('sharp').then(mod => {
    mod.default.cache(false);
    return mod.default;
  });
  return loaded;
}

/**
 * Rebuild an image from its decoded pixels only, so no metadata segment of
 * the source can survive, and encode it back to the same format.
 */
export function createImageStrategy(deps: StrategyDeps): CleaningStrategy {
  const logger = deps.logger.child('sharp');

  return {
    name: 'sharp',
    kind: 'library',
    requires: 'sharp',
    attempt: path =>
      guard('sharp', path, logger, async () => {
        const format = OUTPUT_FORMATS[extname(path).toLowerCase()];
        if (format === undefined) {
          throw new CollaboratorFailureError('sharp', `cannot write ${extname(path) || 'extensionless'} files`);
        }

        const sharp = await loadSharp();
        const { data, info } = await sharp(path).raw().toBuffer({ resolveWithObject: true });

        await replaceAtomically(path, async temp => {
          await sharp(data, { raw: { width: info.width, height: info.height, channels: info.channels } })
            .toFormat(format, format === 'jpeg' ? { quality: JPEG_QUALITY } : {})
            .toFile(temp);
        });

        logger.debug(`Re-encoded ${path} as ${format}`, { width: info.width, height: info.height });
        return true;
      }),
  };
}
