import { describe, it, expect } from 'vitest';
import {
  createPalette,
  formatDependencies,
  formatProgress,
  formatSize,
} from '../../src/terminal.js';
import { ALL_AVAILABLE, availability } from '../helpers/context.js';

const plain = createPalette(false);

describe('createPalette', () => {
  it('should wrap text in ANSI codes when enabled', () => {
    expect(createPalette(true).green('ok')).toBe('\x1b[92mok\x1b[0m');
  });

  it('should return text unchanged when disabled', () => {
    expect(plain.red('failed')).toBe('failed');
  });
});

describe('formatSize', () => {
  it('should use binary units with two decimals', () => {
    expect(formatSize(512)).toBe('512.00 B');
    expect(formatSize(1536)).toBe('1.50 KB');
    expect(formatSize(3_565_158)).toBe('3.40 MB');
  });
});

describe('formatProgress', () => {
  it('should render bar, percentage, counts and name', () => {
    const line = formatProgress(plain, 1, 4, 'a.jpg', true);
    expect(line).toBe(`✓ [${'█'.repeat(10)}${'░'.repeat(30)}] 25.0% (1/4) a.jpg`);
  });

  it('should mark failures', () => {
    expect(formatProgress(plain, 4, 4, 'b.txt', false)).toBe(`✗ [${'█'.repeat(40)}] 100.0% (4/4) b.txt`);
  });

  it('should truncate long names to 50 characters', () => {
    const name = 'x'.repeat(60) + '.jpg';
    const line = formatProgress(plain, 1, 1, name, true);
    expect(line.endsWith(' ' + 'x'.repeat(47) + '...')).toBe(true);
  });
});

describe('formatDependencies', () => {
  it('should list every collaborator without hints when all are present', () => {
    const text = formatDependencies(plain, ALL_AVAILABLE, 'linux');
    expect(text.split('\n')).toEqual([
      'Available tools:',
      '  ✓ exiftool',
      '  ✓ ffmpeg',
      '  ✓ sharp',
      '  ✓ jszip',
      '  ✓ pdf',
      '  ✓ audio-tags',
    ]);
  });

  it('should add platform install hints for missing tools', () => {
    const lines = formatDependencies(plain, availability({ exiftool: false, ffmpeg: false }), 'darwin').split('\n');
    expect(lines).toContain('  ✗ exiftool');
    expect(lines).toContain('⚠ exiftool not found. Install it for best results:');
    expect(lines).toContain('  macOS: brew install exiftool');
    expect(lines).toContain('⚠ ffmpeg not found. Videos will not be cleaned.');
    expect(lines).toContain('  macOS: brew install ffmpeg');
  });

  it('should fall back to Linux hints on other platforms', () => {
    const lines = formatDependencies(plain, availability({ ffmpeg: false }), 'freebsd').split('\n');
    expect(lines).toContain('  Linux: sudo apt-get install ffmpeg');
    expect(lines).not.toContain('⚠ exiftool not found. Install it for best results:');
  });
});
