import { createAudioStrategy } from './audio.js';
import { createExiftoolStrategy } from './exiftool.js';
import { createImageStrategy } from './image.js';
import { createOfficeStrategy } from './office.js';
import { createPdfStrategy } from './pdf.js';
import { createVideoStrategy } from './video.js';
import type { StrategyDeps, StrategySet } from './types.js';

export type { CleaningStrategy, StrategyDeps, StrategySet } from './types.js';

export function createStrategies(deps: StrategyDeps): StrategySet {
  return {
    exiftool: createExiftoolStrategy(deps),
    sharp: createImageStrategy(deps),
    ffmpeg: createVideoStrategy(deps),
    pdf: createPdfStrategy(deps),
    office: createOfficeStrategy(deps),
    'audio-tags': createAudioStrategy(deps),
  };
}
