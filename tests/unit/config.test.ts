import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { buildConfig, parseArgs } from '../../src/config.js';
import { UsageError } from '../../src/errors.js';

describe('parseArgs', () => {
  it('should default every flag to off', () => {
    expect(parseArgs([])).toEqual({
      dryRun: false,
      backup: false,
      reencodeVideos: false,
      normalizeTime: false,
      skipConfirm: false,
      verbose: false,
      exclude: [],
      noColor: false,
      help: false,
      version: false,
    });
  });

  it('should parse flags and values', () => {
    const args = parseArgs([
      '-p', '/data',
      '--dry-run',
      '--backup',
      '--reencode-videos',
      '--normalize-time',
      '--skip-confirm',
      '--report', 'out/report.json',
      '--no-color',
      '-V',
    ]);

    expect(args.path).toBe('/data');
    expect(args.dryRun).toBe(true);
    expect(args.backup).toBe(true);
    expect(args.reencodeVideos).toBe(true);
    expect(args.normalizeTime).toBe(true);
    expect(args.skipConfirm).toBe(true);
    expect(args.report).toBe('out/report.json');
    expect(args.noColor).toBe(true);
    expect(args.verbose).toBe(true);
  });

  it('should split and accumulate exclusions', () => {
    expect(parseArgs(['--exclude', 'build, dist', '--exclude', 'out']).exclude).toEqual(['build', 'dist', 'out']);
  });

  it('should accept the directory as a positional argument', () => {
    expect(parseArgs(['photos']).path).toBe('photos');
  });

  it('should distinguish -v (version) from -V (verbose)', () => {
    expect(parseArgs(['-v']).version).toBe(true);
    expect(parseArgs(['-v']).verbose).toBe(false);
    expect(parseArgs(['-h']).help).toBe(true);
  });

  it('should reject a missing value', () => {
    expect(() => parseArgs(['--path'])).toThrow(UsageError);
    expect(() => parseArgs(['--report', '--dry-run'])).toThrow('--report requires a value');
  });

  it('should reject unknown options and a second directory', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
  });
});

describe('buildConfig', () => {
  it('should resolve paths against the working directory', () => {
    const config = buildConfig(parseArgs(['photos', '--report', 'r.json']), '/work', {});

    expect(config.root).toBe(resolve('/work', 'photos'));
    expect(config.reportPath).toBe(resolve('/work', 'r.json'));
    expect(config.color).toBe(true);
  });

  it('should default the root to the working directory', () => {
    const config = buildConfig(parseArgs([]), '/work', {});

    expect(config.root).toBe(resolve('/work'));
    expect(config.reportPath).toBeUndefined();
  });

  it('should honor NO_COLOR', () => {
    expect(buildConfig(parseArgs([]), '/work', { NO_COLOR: '1' }).color).toBe(false);
  });

  it('should be frozen', () => {
    const config = buildConfig(parseArgs(['--exclude', 'build']), '/work', {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.exclude)).toBe(true);
  });
});
