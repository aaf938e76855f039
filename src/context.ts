import { release } from 'node:os';
import { probeAvailability } from './availability.js';
import { Logger } from './logger.js';
import type { LogSink } from './logger.js';
import { formatRunStamp, resolveLogFile, resolveStateDir } from './paths.js';
import { createPalette, processTerminal } from './terminal.js';
import type { Palette, Terminal } from './terminal.js';
import type { DependencyAvailability, RunConfig } from './types.js';

/**
 * Everything a run needs, built once at startup and passed down explicitly.
 */
export interface RunContext {
  readonly config: RunConfig;
  readonly logger: Logger;
  readonly terminal: Terminal;
  readonly palette: Palette;
  readonly availability: DependencyAvailability;
  readonly stateDir: string;
  readonly startedAt: Date;
  /** Per-run log file, or null when file logging is off. */
  readonly logFile: string | null;
}

export interface ContextOptions {
  env?: NodeJS.ProcessEnv;
  terminal?: Terminal;
  /** Skip probing and use this snapshot. */
  availability?: DependencyAvailability;
  startedAt?: Date;
  /** Write the per-run log file (default true). */
  logToFile?: boolean;
  /** Terminal-side log sink; defaults to stderr. */
  console?: LogSink;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(line + '\n');
};

export async function createRunContext(config: RunConfig, options: ContextOptions = {}): Promise<RunContext> {
  const env = options.env ?? process.env;
  const terminal = options.terminal ?? processTerminal();
  const startedAt = options.startedAt ?? new Date();
  const stateDir = resolveStateDir(env);
  const logFile = options.logToFile === false ? null : resolveLogFile(stateDir, formatRunStamp(startedAt));

  const logger = new Logger({
    level: config.verbose ? 'debug' : 'info',
    ...(logFile !== null && { file: logFile }),
    console: options.console ?? stderrSink,
    consoleLevel: config.verbose ? 'debug' : 'warn',
  });
  logger.info(`Platform: ${process.platform} ${release()}`, { node: process.version });

  const availability = options.availability ?? (await probeAvailability({ env }));

  return {
    config,
    logger,
    terminal,
    palette: createPalette(config.color && terminal.isTTY),
    availability,
    stateDir,
    startedAt,
    logFile,
  };
}
