import { CollaboratorFailureError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CommandRunner } from '../process.js';
import type { Collaborator, StrategyName } from '../types.js';

/**
 * One self-contained way of stripping metadata, backed by exactly one
 * collaborator. `attempt` resolves `false` on any failure and never rejects.
 */
export interface CleaningStrategy {
  readonly name: StrategyName;
  readonly kind: 'external_tool' | 'library';
  readonly requires: Collaborator;
  attempt(path: string): Promise<boolean>;
}

export type StrategySet = Readonly<Record<StrategyName, CleaningStrategy>>;

export interface StrategyDeps {
  logger: Logger;
  runner: CommandRunner;
  /** Skip the stream-copy pass and always re-encode videos. */
  reencodeVideos: boolean;
}

/**
 * Run a strategy body, converting any failure into `false`. Collaborator
 * failures are expected (the dispatcher falls back) and logged at info
 * level; anything else is logged as an error.
 */
export async function guard(
  strategy: StrategyName,
  path: string,
  logger: Logger,
  body: () => Promise<boolean>,
): Promise<boolean> {
  try {
    return await body();
  } catch (err) {
    if (err instanceof CollaboratorFailureError) {
      logger.info(`${strategy} could not clean ${path}`, { error: err.message });
    } else {
      logger.error(`${strategy} failed for ${path}`, err);
    }
    return false;
  }
}

/**
 * Last line of a process's stderr, for log context.
 */
export function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? '';
}
