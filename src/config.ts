/**
 * Command-line arguments and the frozen run configuration built from them.
 */

import { resolve } from 'node:path';
import { UsageError } from './errors.js';
import type { RunConfig } from './types.js';

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
tagsweep [--path <dir>] [options]

Strip metadata from every file under a directory, in place.

BASIC
  -p, --path <dir>            Directory to clean (default: current directory)
  -V, --verbose               Debug logging on the terminal and in the log
  -h, --help                  Show this help
  -v, --version               Show version

SAFETY
  --dry-run                   Classify and report only; modify nothing
  --backup                    Copy each file to the backup tree before cleaning
  --skip-confirm              Do not ask for confirmation

CLEANING
  --reencode-videos           Always re-encode videos instead of stream copy
  --normalize-time            Set access/modification times of cleaned files
                              to the Unix epoch
  --exclude <names>           Extra directory names to skip (comma-separated)
                              e.g. --exclude build,dist

OUTPUT
  --report <file.json>        Write a JSON audit report to file
  --no-color                  Disable colors (NO_COLOR is honored too)

ENVIRONMENT
  TAGSWEEP_HOME               Directory for logs and backups
                              (default: ~/.tagsweep, %APPDATA%\\tagsweep on Windows)
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export interface CliArgs {
  path?: string;
  dryRun: boolean;
  backup: boolean;
  reencodeVideos: boolean;
  normalizeTime: boolean;
  skipConfirm: boolean;
  verbose: boolean;
  exclude: string[];
  report?: string;
  noColor: boolean;
  help: boolean;
  version: boolean;
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = {
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
  };

  const take = (i: number, flag: string, rawArr: string[]): [number, string] => {
    const val = rawArr[i + 1];
    if (val === undefined || val.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i]!;
    switch (a) {
      case '--dry-run':                         args.dryRun = true; break;
      case '--backup':                          args.backup = true; break;
      case '--reencode-videos':                 args.reencodeVideos = true; break;
      case '--normalize-time':                  args.normalizeTime = true; break;
      case '--skip-confirm':                    args.skipConfirm = true; break;
      case '--no-color':                        args.noColor = true; break;
      case '-V': case '--verbose':              args.verbose = true; break;
      case '-h': case '--help':                 args.help = true; break;
      case '-v': case '--version':              args.version = true; break;

      case '-p': case '--path': {
        const [ni, v] = take(i, a, raw); i = ni; args.path = v; break;
      }
      case '--exclude': {
        const [ni, v] = take(i, a, raw); i = ni;
        args.exclude.push(...v.split(',').map(s => s.trim()).filter(Boolean));
        break;
      }
      case '--report': {
        const [ni, v] = take(i, a, raw); i = ni; args.report = v; break;
      }
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        if (args.path !== undefined) {
          throw new UsageError(`Unexpected argument: ${a}`);
        }
        args.path = a;
    }
  }

  return args;
}

// ─── Run configuration ────────────────────────────────────────────────────────

export function buildConfig(
  a: CliArgs,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  return Object.freeze({
    root: resolve(cwd, a.path ?? '.'),
    dryRun: a.dryRun,
    backup: a.backup,
    reencodeVideos: a.reencodeVideos,
    normalizeTime: a.normalizeTime,
    skipConfirm: a.skipConfirm,
    verbose: a.verbose,
    exclude: Object.freeze([...a.exclude]),
    ...(a.report !== undefined && { reportPath: resolve(cwd, a.report) }),
    color: !a.noColor && env.NO_COLOR === undefined,
  });
}
