/**
 * Batch statistics: a single-writer aggregate folded from per-file outcomes,
 * rendered as the end-of-run summary and the JSON audit report.
 */

import { CATEGORIES } from '../detect.js';
import { formatSize } from '../terminal.js';
import type { Palette } from '../terminal.js';
import type {
  AuditEntry,
  AuditReport,
  BatchStatistics,
  Category,
  CleanOutcome,
  RunStatus,
  StrategyName,
} from '../types.js';

export function createStatistics(totalFiles: number, totalBytes = 0, backupDir: string | null = null): BatchStatistics {
  return {
    totalFiles,
    cleaned: 0,
    failed: 0,
    skipped: 0,
    totalBytes,
    byCategory: {},
    byMethod: {},
    elapsedMs: 0,
    backupDir,
  };
}

export function recordOutcome(stats: BatchStatistics, outcome: CleanOutcome): void {
  stats.byCategory[outcome.category] = (stats.byCategory[outcome.category] ?? 0) + 1;
  if (outcome.success) {
    stats.cleaned++;
    stats.byMethod[outcome.strategy] = (stats.byMethod[outcome.strategy] ?? 0) + 1;
  } else {
    stats.failed++;
  }
}

/** A file whose processing threw outside any strategy. */
export function recordFailure(stats: BatchStatistics, category: Category): void {
  stats.byCategory[category] = (stats.byCategory[category] ?? 0) + 1;
  stats.failed++;
}

export function recordSkipped(stats: BatchStatistics, count: number): void {
  stats.skipped += count;
}

/**
 * Count of files per category, in first-seen order.
 */
export function categoryHistogram(categories: Iterable<Category>): Map<Category, number> {
  const histogram = new Map<Category, number>();
  for (const category of categories) {
    histogram.set(category, (histogram.get(category) ?? 0) + 1);
  }
  return histogram;
}

const STRATEGY_ORDER: readonly StrategyName[] = ['exiftool', 'sharp', 'ffmpeg', 'pdf', 'office', 'audio-tags'];

function countsOf<K extends string>(keys: readonly K[], counts: Partial<Record<K, number>>): Array<[K, number]> {
  const out: Array<[K, number]> = [];
  for (const key of keys) {
    const count = counts[key];
    if (count) out.push([key, count]);
  }
  return out;
}

/** Largest first; ties keep their input order. */
function sortedCounts<K extends string>(counts: Iterable<[K, number]>): Array<[K, number]> {
  return [...counts].sort((a, b) => b[1] - a[1]);
}

/**
 * Dry-run listing: file count per category, largest first.
 */
export function renderHistogram(histogram: Map<Category, number>): string {
  const lines = ['Files by category:'];
  for (const [category, count] of sortedCounts(histogram)) {
    lines.push(`  ${category.padEnd(10)} ${count}`);
  }
  return lines.join('\n');
}

export function renderSummary(stats: BatchStatistics, palette: Palette): string {
  const rule = '═'.repeat(60);
  const lines = [
    palette.bold(rule),
    palette.bold('CLEANING SUMMARY'),
    palette.bold(rule),
    `Total files found:       ${stats.totalFiles}`,
    palette.green(`Successfully cleaned:    ${stats.cleaned}`),
    palette.red(`Failed:                  ${stats.failed}`),
  ];
  if (stats.skipped > 0) {
    lines.push(palette.yellow(`Skipped:                 ${stats.skipped}`));
  }
  lines.push(
    `Total size:              ${formatSize(stats.totalBytes)}`,
    `Elapsed:                 ${(stats.elapsedMs / 1000).toFixed(1)}s`,
  );

  const categories = sortedCounts(countsOf(CATEGORIES, stats.byCategory));
  if (categories.length > 0) {
    lines.push('', 'By category:');
    for (const [category, count] of categories) lines.push(`  ${category.padEnd(10)} ${count}`);
  }
  const methods = sortedCounts(countsOf(STRATEGY_ORDER, stats.byMethod));
  if (methods.length > 0) {
    lines.push('', 'By method:');
    for (const [method, count] of methods) lines.push(`  ${method.padEnd(10)} ${count}`);
  }
  if (stats.backupDir) {
    lines.push('', `Backups saved to: ${stats.backupDir}`);
  }
  lines.push(palette.bold(rule));
  return lines.join('\n');
}

export function buildAuditReport(
  stats: BatchStatistics,
  entries: AuditEntry[],
  meta: { startedAt: Date; root: string; status: RunStatus },
): AuditReport {
  return {
    timestamp: meta.startedAt.toISOString(),
    root: meta.root,
    status: meta.status,
    totalFiles: stats.totalFiles,
    cleaned: stats.cleaned,
    failed: stats.failed,
    skipped: stats.skipped,
    totalBytes: stats.totalBytes,
    byCategory: { ...stats.byCategory },
    byMethod: { ...stats.byMethod },
    elapsedMs: stats.elapsedMs,
    backupDir: stats.backupDir,
    entries,
  };
}
