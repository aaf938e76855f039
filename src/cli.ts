#!/usr/bin/env node
/**
 * tagsweep CLI: strips metadata from every file under a directory.
 *
 * Features:
 *  • Recursive walk with VCS and dependency-cache exclusions
 *  • exiftool, sharp, ffmpeg, PDF, Office and audio-tag strategies
 *  • Dry-run classification report
 *  • Backups of originals before in-place overwrite
 *  • Timestamp normalization
 *  • JSON audit report
 *  • Ctrl-C stops after the current file and still prints the summary
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { HELP, buildConfig, parseArgs } from './config.js';
import { createRunContext } from './context.js';
import { InvalidRootError, UsageError } from './errors.js';
import { discardPendingTemps } from './operations/atomic.js';
import { runBatch } from './operations/batch.js';
import { askQuestion } from './prompt.js';
import { formatBanner, formatDependencies } from './terminal.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const a = parseArgs(process.argv.slice(2));

  if (a.help) {
    console.log(HELP);
    return;
  }
  if (a.version) {
    console.log(getVersion());
    return;
  }

  const config = buildConfig(a);
  const controller = new AbortController();
  const interrupt = () => {
    if (controller.signal.aborted) {
      // Second Ctrl-C: stop immediately.
      discardPendingTemps();
      process.exit(130);
    }
    controller.abort();
  };
  process.on('SIGINT', interrupt);

  const context = await createRunContext(config);
  const { palette, terminal, logger } = context;

  terminal.write(formatBanner(palette) + '\n\n');
  if (context.logFile) terminal.write(`Log file: ${context.logFile}\n\n`);
  terminal.write(formatDependencies(palette, context.availability) + '\n\n');

  try {
    const result = await runBatch(context, {
      signal: controller.signal,
      confirm: (question, signal) =>
        askQuestion(question, { ...(signal && { signal }), onInterrupt: interrupt }),
    });
    if (result.status === 'interrupted') {
      terminal.write('\n' + palette.yellow('Operation cancelled by user.') + '\n');
    }
    process.exitCode = result.exitCode;
  } catch (err) {
    logger.error('Run aborted', err);
    throw err;
  } finally {
    process.off('SIGINT', interrupt);
    await logger.close();
  }
}

// ─── Entry ────────────────────────────────────────────────────────────────────

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof UsageError) {
    console.error(`Error: ${message}\n\nRun tagsweep --help for usage.`);
  } else if (err instanceof InvalidRootError) {
    console.error(`Error: ${message}`);
  } else {
    console.error(message);
  }
  process.exit(1);
});
