import { classify } from '../detect.js';
import type { Logger } from '../logger.js';
import type { CleaningStrategy, StrategySet } from '../strategies/types.js';
import type { Category, CleanOutcome, DependencyAvailability } from '../types.js';
import { normalizeTimestamps } from './timestamps.js';

/**
 * `fallback` rules run only while nothing has succeeded for the file;
 * `always` rules run regardless.
 */
export type RuleMode = 'fallback' | 'always';

export interface DispatchRule {
  readonly strategy: CleaningStrategy;
  readonly applies: (category: Category) => boolean;
  readonly mode: RuleMode;
}

export interface DispatchOptions {
  strategies: StrategySet;
  availability: DependencyAvailability;
  logger: Logger;
  normalizeTime: boolean;
}

export interface DispatchPolicy {
  /** The rule table, already filtered by availability. */
  readonly rules: readonly DispatchRule[];
  dispatch(path: string, category?: Category): Promise<CleanOutcome>;
}

const every = (): boolean => true;
const only =
  (...categories: Category[]) =>
  (category: Category): boolean =>
    categories.includes(category);

/**
 * The ordered rule table. Rules whose collaborator is unavailable are left
 * out, so dispatch never consults availability again.
 */
export function buildRules(strategies: StrategySet, availability: DependencyAvailability): DispatchRule[] {
  const table: DispatchRule[] = [
    { strategy: strategies.exiftool, applies: every, mode: 'fallback' },
    { strategy: strategies.sharp, applies: only('image'), mode: 'fallback' },
    { strategy: strategies.ffmpeg, applies: only('video'), mode: 'always' },
    { strategy: strategies.pdf, applies: only('pdf'), mode: 'fallback' },
    { strategy: strategies.office, applies: only('docx', 'xlsx', 'pptx'), mode: 'fallback' },
    { strategy: strategies['audio-tags'], applies: only('audio'), mode: 'fallback' },
  ];
  return table.filter(rule => availability[rule.strategy.requires]);
}

export function createDispatchPolicy(options: DispatchOptions): DispatchPolicy {
  const rules = buildRules(options.strategies, options.availability);
  const logger = options.logger.child('dispatch');

  const dispatch = async (path: string, category: Category = classify(path)): Promise<CleanOutcome> => {
    let winner: CleaningStrategy | undefined;
    let attempted = false;

    for (const rule of rules) {
      if (!rule.applies(category)) continue;
      if (rule.mode === 'fallback' && winner) continue;
      attempted = true;
      if (await rule.strategy.attempt(path)) {
        // Last success wins.
        winner = rule.strategy;
      }
    }

    if (!winner) {
      const method = attempted ? 'none' : 'none_available';
      logger.info(`Not cleaned: ${path}`, { category, method });
      return { success: false, method, category };
    }

    if (options.normalizeTime) {
      await normalizeTimestamps(path, logger);
    }

    logger.info(`Cleaned ${path}`, { category, strategy: winner.name });
    return { success: true, method: winner.kind, strategy: winner.name, category };
  };

  return { rules, dispatch };
}
