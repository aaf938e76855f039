import { describe, it, expect } from 'vitest';
import {
  buildAuditReport,
  categoryHistogram,
  createStatistics,
  recordFailure,
  recordOutcome,
  recordSkipped,
  renderHistogram,
  renderSummary,
} from '../../src/operations/stats.js';
import { createPalette } from '../../src/terminal.js';

const plain = createPalette(false);

describe('statistics', () => {
  it('should fold outcomes into totals and histograms', () => {
    const stats = createStatistics(5, 2048);

    recordOutcome(stats, { success: true, method: 'library', strategy: 'sharp', category: 'image' });
    recordOutcome(stats, { success: true, method: 'external_tool', strategy: 'exiftool', category: 'image' });
    recordOutcome(stats, { success: false, method: 'none_available', category: 'unknown' });
    recordFailure(stats, 'pdf');
    recordSkipped(stats, 1);

    expect(stats).toMatchObject({
      totalFiles: 5,
      cleaned: 2,
      failed: 2,
      skipped: 1,
      byCategory: { image: 2, unknown: 1, pdf: 1 },
      byMethod: { sharp: 1, exiftool: 1 },
    });
    expect(stats.cleaned + stats.failed + stats.skipped).toBe(stats.totalFiles);
  });
});

describe('categoryHistogram', () => {
  it('should count categories', () => {
    const histogram = categoryHistogram(['image', 'pdf', 'image', 'unknown']);

    expect([...histogram]).toEqual([
      ['image', 2],
      ['pdf', 1],
      ['unknown', 1],
    ]);
    expect(renderHistogram(histogram)).toBe(
      ['Files by category:', '  image      2', '  pdf        1', '  unknown    1'].join('\n'),
    );
  });
});

describe('renderSummary', () => {
  it('should list totals, categories, methods and the backup directory', () => {
    const stats = createStatistics(3, 1536, '/state/backups/20240102_030405');
    recordOutcome(stats, { success: true, method: 'library', strategy: 'pdf', category: 'pdf' });
    recordOutcome(stats, { success: true, method: 'library', strategy: 'sharp', category: 'image' });
    recordOutcome(stats, { success: false, method: 'none_available', category: 'unknown' });
    stats.elapsedMs = 1250;

    const rule = '═'.repeat(60);
    expect(renderSummary(stats, plain)).toBe(
      [
        rule,
        'CLEANING SUMMARY',
        rule,
        'Total files found:       3',
        'Successfully cleaned:    2',
        'Failed:                  1',
        'Total size:              1.50 KB',
        'Elapsed:                 1.3s',
        '',
        'By category:',
        '  image      1',
        '  pdf        1',
        '  unknown    1',
        '',
        'By method:',
        '  sharp      1',
        '  pdf        1',
        '',
        'Backups saved to: /state/backups/20240102_030405',
        rule,
      ].join('\n'),
    );
  });

  it('should show skipped files only when there are some', () => {
    const stats = createStatistics(2);
    recordSkipped(stats, 2);

    expect(renderSummary(stats, plain).split('\n')).toContain('Skipped:                 2');
  });
});

describe('buildAuditReport', () => {
  it('should copy totals and carry the entries', () => {
    const stats = createStatistics(1, 10);
    recordOutcome(stats, { success: true, method: 'library', strategy: 'pdf', category: 'pdf' });
    const entries = [
      { path: '/d/a.pdf', category: 'pdf' as const, success: true, skipped: false, method: 'library' as const, strategy: 'pdf' as const },
    ];

    const report = buildAuditReport(stats, entries, {
      startedAt: new Date('2024-01-02T03:04:05.000Z'),
      root: '/d',
      status: 'completed',
    });

    expect(report).toEqual({
      timestamp: '2024-01-02T03:04:05.000Z',
      root: '/d',
      status: 'completed',
      totalFiles: 1,
      cleaned: 1,
      failed: 0,
      skipped: 0,
      totalBytes: 10,
      byCategory: { pdf: 1 },
      byMethod: { pdf: 1 },
      elapsedMs: 0,
      backupDir: null,
      entries,
    });
  });
});
