/**
 * Terminal output: colors, banner, progress line, dependency table.
 */

import { platform as osPlatform } from 'node:os';
import type { Collaborator, DependencyAvailability } from './types.js';

export interface Terminal {
  /** Write raw text (no newline added). */
  write(text: string): void;
  readonly isTTY: boolean;
}

export function processTerminal(): Terminal {
  return {
    write: text => {
      process.stdout.write(text);
    },
    isTTY: process.stdout.isTTY === true,
  };
}

// ─── Colors ───────────────────────────────────────────────────────────────────

export interface Palette {
  bold(text: string): string;
  cyan(text: string): string;
  green(text: string): string;
  yellow(text: string): string;
  red(text: string): string;
}

const ANSI = {
  bold: '\x1b[1m',
  cyan: '\x1b[96m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  red: '\x1b[91m',
  reset: '\x1b[0m',
} as const;

export function createPalette(enabled: boolean): Palette {
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI.reset}` : text);
  return {
    bold: wrap(ANSI.bold),
    cyan: wrap(ANSI.cyan),
    green: wrap(ANSI.green),
    yellow: wrap(ANSI.yellow),
    red: wrap(ANSI.red),
  };
}

// ─── Formatting ───────────────────────────────────────────────────────────────

export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) return `${value.toFixed(2)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(2)} TB`;
}

const BAR_LENGTH = 40;
const NAME_WIDTH = 50;

/**
 * One progress line, meant to be written after a carriage return.
 */
export function formatProgress(
  palette: Palette,
  current: number,
  total: number,
  name: string,
  success: boolean,
): string {
  const ratio = total > 0 ? current / total : 1;
  const filled = Math.floor(BAR_LENGTH * ratio);
  const bar = '█'.repeat(filled) + '░'.repeat(BAR_LENGTH - filled);
  const status = success ? palette.green('✓') : palette.red('✗');
  const display = name.length <= NAME_WIDTH ? name : name.slice(0, NAME_WIDTH - 3) + '...';
  return `${status} [${bar}] ${(ratio * 100).toFixed(1)}% (${current}/${total}) ${display}`;
}

export function formatBanner(palette: Palette, platform: string = osPlatform()): string {
  const rule = '═'.repeat(59);
  const row = (text: string) => `║ ${text.padEnd(57)} ║`;
  return palette.cyan(
    palette.bold(
      [
        `╔${rule}╗`,
        row('TAGSWEEP - METADATA CLEANER'),
        row('Strips embedded metadata from whole directory trees'),
        row(`Platform: ${platform}`),
        `╚${rule}╝`,
      ].join('\n'),
    ),
  );
}

// ─── Dependency report ────────────────────────────────────────────────────────

const INSTALL_HINTS: Record<'exiftool' | 'ffmpeg', Record<'win32' | 'darwin' | 'linux', string[]>> = {
  exiftool: {
    win32: [
      'Windows: Download from https://exiftool.org/',
      '         Rename exiftool(-k).exe to exiftool.exe and add it to PATH',
    ],
    darwin: ['macOS: brew install exiftool'],
    linux: ['Linux: sudo apt-get install libimage-exiftool-perl'],
  },
  ffmpeg: {
    win32: ['Windows: Download from https://ffmpeg.org/download.html and add it to PATH'],
    darwin: ['macOS: brew install ffmpeg'],
    linux: ['Linux: sudo apt-get install ffmpeg'],
  },
};

function hintPlatform(platform: string): 'win32' | 'darwin' | 'linux' {
  return platform === 'win32' || platform === 'darwin' ? platform : 'linux';
}

export function formatDependencies(
  palette: Palette,
  availability: DependencyAvailability,
  platform: string = osPlatform(),
): string {
  const lines = [palette.bold('Available tools:')];
  const names: Collaborator[] = ['exiftool', 'ffmpeg', 'sharp', 'jszip', 'pdf', 'audio-tags'];
  for (const name of names) {
    lines.push(`  ${availability[name] ? palette.green('✓') : palette.red('✗')} ${name}`);
  }

  const key = hintPlatform(platform);
  if (!availability.exiftool) {
    lines.push('', palette.yellow('⚠ exiftool not found. Install it for best results:'));
    lines.push(...INSTALL_HINTS.exiftool[key].map(h => `  ${h}`));
  }
  if (!availability.ffmpeg) {
    lines.push('', palette.yellow('⚠ ffmpeg not found. Videos will not be cleaned.'));
    lines.push(...INSTALL_HINTS.ffmpeg[key].map(h => `  ${h}`));
  }
  return lines.join('\n');
}
