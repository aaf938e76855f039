/**
 * Batch orchestration: walks the root, asks for confirmation, then runs every
 * file through backup and dispatch in walk order and summarizes the result.
 *
 * Phases: init → scanning → (dry-run report | confirming) → processing →
 * summarizing → done. An abort signal is honored between files; files not
 * reached are counted as skipped and the summary is still produced.
 */

import type { Stats } from 'node:fs';
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { RunContext } from '../context.js';
import { classify } from '../detect.js';
import { IOFailureError, InvalidRootError, describeError } from '../errors.js';
import { formatRunStamp, resolveBackupDir } from '../paths.js';
import { runCommand } from '../process.js';
import type { CommandRunner } from '../process.js';
import { askQuestion, isAffirmative } from '../prompt.js';
import { createStrategies } from '../strategies/index.js';
import type { StrategySet } from '../strategies/index.js';
import { formatProgress, formatSize } from '../terminal.js';
import type {
  AuditEntry,
  BatchResult,
  BatchStatistics,
  CleanOutcome,
  RunPhase,
  RunStatus,
} from '../types.js';
import { backupFile } from './backup.js';
import { createDispatchPolicy } from './dispatch.js';
import {
  buildAuditReport,
  categoryHistogram,
  createStatistics,
  recordFailure,
  recordOutcome,
  recordSkipped,
  renderHistogram,
  renderSummary,
} from './stats.js';
import { DEFAULT_EXCLUDED_DIRS, collectFiles } from './walk.js';

export const CONFIRM_QUESTION = 'Proceed with cleaning? (yes/no): ';

export interface BatchHooks {
  /** Strategy set; defaults to the real collaborators. */
  strategies?: StrategySet;
  /** Process runner handed to the default strategies. */
  runner?: CommandRunner;
  /** Ask the user and resolve the raw answer. */
  confirm?: (question: string, signal?: AbortSignal) => Promise<string>;
  signal?: AbortSignal;
  /** Clock in milliseconds, for the elapsed time. */
  now?: () => number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Resolve the root to an absolute directory path.
 */
export async function resolveRoot(root: string): Promise<string> {
  const abs = resolve(root);
  let info: Stats;
  try {
    info = await stat(abs);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new InvalidRootError(abs, 'missing');
    }
    throw new IOFailureError('stat', abs, err);
  }
  if (!info.isDirectory()) throw new InvalidRootError(abs, 'not-directory');
  return abs;
}

async function totalSize(files: string[]): Promise<number> {
  let total = 0;
  for (const file of files) {
    try {
      total += (await stat(file)).size;
    } catch {
      // Vanished since the walk; it will fail when processed.
    }
  }
  return total;
}

function entryFor(path: string, outcome: CleanOutcome, backedUp: boolean | undefined): AuditEntry {
  return {
    path,
    category: outcome.category,
    success: outcome.success,
    skipped: false,
    method: outcome.method,
    ...(outcome.success && { strategy: outcome.strategy }),
    ...(backedUp !== undefined && { backedUp }),
  };
}

/**
 * Result of a run that stopped before processing: every file is skipped.
 */
function unprocessed(
  status: RunStatus,
  files: string[],
  totalBytes: number,
  exitCode: 0 | 130,
): BatchResult {
  const stats = createStatistics(files.length, totalBytes);
  recordSkipped(stats, files.length);
  return { status, stats, entries: [], exitCode };
}

async function writeReport(path: string, contents: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents);
  } catch (err) {
    throw new IOFailureError('report', path, err);
  }
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export async function runBatch(context: RunContext, hooks: BatchHooks = {}): Promise<BatchResult> {
  const { config, terminal, palette, availability } = context;
  const logger = context.logger.child('batch');
  const signal = hooks.signal;
  const now = hooks.now ?? (() => performance.now());
  const confirm = hooks.confirm ?? ((question: string, s?: AbortSignal) => askQuestion(question, s ? { signal: s } : {}));
  const say = (text = '') => terminal.write(text + '\n');
  const started = now();

  let phase: RunPhase = 'init';
  const enter = (next: RunPhase) => {
    logger.debug(`Phase ${phase} -> ${next}`);
    phase = next;
  };

  // ── Init ──
  const root = await resolveRoot(config.root);
  logger.info('Run configuration', {
    root,
    dryRun: config.dryRun,
    backup: config.backup,
    reencodeVideos: config.reencodeVideos,
    normalizeTime: config.normalizeTime,
    skipConfirm: config.skipConfirm,
    exclude: config.exclude.join(',') || undefined,
  });
  logger.info('Available tools', { ...availability });

  // ── Scanning ──
  enter('scanning');
  say(palette.cyan(`Scanning ${root} for files...`));
  const files = await collectFiles(root, {
    exclude: new Set([...DEFAULT_EXCLUDED_DIRS, ...config.exclude]),
    logger,
    ...(signal && { signal }),
  });
  if (signal?.aborted) {
    logger.warn('Interrupted while scanning');
    return unprocessed('interrupted', files, 0, 130);
  }
  if (files.length === 0) {
    say(palette.yellow('No files found to clean.'));
    logger.info('No files found');
    enter('done');
    return unprocessed('empty', files, 0, 0);
  }

  const totalBytes = await totalSize(files);
  say(palette.green(`Found ${files.length} files (${formatSize(totalBytes)})`));
  logger.info(`Found ${files.length} files`, { totalBytes });

  // ── Dry run ──
  if (config.dryRun) {
    enter('dry-run-report');
    say(palette.yellow('DRY RUN - no files will be modified'));
    say(renderHistogram(categoryHistogram(files.map(file => classify(file)))));
    enter('done');
    return unprocessed('dry-run', files, totalBytes, 0);
  }

  // ── Confirming ──
  if (!config.skipConfirm) {
    enter('confirming');
    say();
    say(palette.yellow(`About to clean ${files.length} files in ${root}`));
    say(
      config.backup
        ? palette.green(`Backups will be saved under ${join(context.stateDir, 'backups')}`)
        : palette.yellow('No backups will be made (use --backup to keep copies)'),
    );
    let answer: string;
    try {
      answer = await confirm(CONFIRM_QUESTION, signal);
    } catch (err) {
      if (signal?.aborted) {
        logger.warn('Interrupted at confirmation');
        return unprocessed('interrupted', files, totalBytes, 130);
      }
      throw err;
    }
    if (signal?.aborted) {
      logger.warn('Interrupted at confirmation');
      return unprocessed('interrupted', files, totalBytes, 130);
    }
    if (!isAffirmative(answer)) {
      say('Operation cancelled.');
      logger.info('Cancelled at confirmation');
      enter('done');
      return unprocessed('cancelled', files, totalBytes, 0);
    }
  }

  // ── Processing ──
  enter('processing');
  let backupDir: string | null = null;
  if (config.backup) {
    const dir = resolveBackupDir(context.stateDir, formatRunStamp(context.startedAt));
    try {
      await mkdir(dir, { recursive: true });
      backupDir = dir;
      say(palette.green(`Backup directory: ${dir}`));
      logger.info('Backup directory created', { dir });
    } catch (err) {
      logger.error('Could not create backup directory; continuing without backups', new IOFailureError('mkdir', dir, err));
    }
  }

  const strategies =
    hooks.strategies ??
    createStrategies({
      logger: context.logger,
      runner: hooks.runner ?? runCommand,
      reencodeVideos: config.reencodeVideos,
    });
  const policy = createDispatchPolicy({
    strategies,
    availability,
    logger: context.logger,
    normalizeTime: config.normalizeTime,
  });
  logger.debug('Dispatch rules', { rules: policy.rules.map(rule => rule.strategy.name).join(',') });

  const stats: BatchStatistics = createStatistics(files.length, totalBytes, backupDir);
  const entries: AuditEntry[] = [];

  const progress = (index: number, name: string, success: boolean) => {
    const line = formatProgress(palette, index + 1, files.length, name, success);
    terminal.write(terminal.isTTY ? `\r\x1b[K${line}` : `${line}\n`);
  };
  const skipFrom = (index: number) => {
    recordSkipped(stats, files.length - index);
    for (const path of files.slice(index)) {
      entries.push({ path, category: classify(path), success: false, skipped: true });
    }
    logger.warn(`Interrupted; skipped ${files.length - index} files`);
  };

  say();
  say(palette.cyan('Cleaning files...'));
  for (let i = 0; i < files.length; i++) {
    if (signal?.aborted) {
      skipFrom(i);
      break;
    }
    const path = files[i]!;
    const category = classify(path);
    let backedUp: boolean | undefined;

    try {
      if (backupDir !== null) {
        backedUp = await backupFile(path, { root, backupDir, logger });
      }
      const outcome = await policy.dispatch(path, category);
      if (signal?.aborted) {
        skipFrom(i);
        break;
      }
      recordOutcome(stats, outcome);
      entries.push(entryFor(path, outcome, backedUp));
      progress(i, basename(path), outcome.success);
    } catch (err) {
      if (signal?.aborted) {
        skipFrom(i);
        break;
      }
      logger.error(`Unexpected error processing ${path}`, err);
      recordFailure(stats, category);
      entries.push({
        path,
        category,
        success: false,
        skipped: false,
        method: 'none',
        ...(backedUp !== undefined && { backedUp }),
        error: describeError(err),
      });
      progress(i, basename(path), false);
    }
  }
  if (terminal.isTTY) say();

  // ── Summarizing ──
  enter('summarizing');
  if (signal?.aborted) say(palette.yellow('Interrupted: remaining files were skipped.'));
  stats.elapsedMs = Math.round(now() - started);
  say();
  say(renderSummary(stats, palette));

  if (config.reportPath) {
    const report = buildAuditReport(stats, entries, { startedAt: context.startedAt, root, status: 'completed' });
    try {
      await writeReport(config.reportPath, JSON.stringify(report, null, 2));
      say(`Report written to ${config.reportPath}`);
      logger.info('Report written', { path: config.reportPath });
    } catch (err) {
      logger.error('Could not write report', err);
    }
  }

  logger.info('Run finished', {
    cleaned: stats.cleaned,
    failed: stats.failed,
    skipped: stats.skipped,
    elapsedMs: stats.elapsedMs,
  });
  enter('done');
  return { status: 'completed', stats, entries, exitCode: stats.failed > 0 ? 1 : 0 };
}
