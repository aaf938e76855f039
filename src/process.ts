/**
 * External process invocation and PATH lookup.
 */

import { execFile } from 'node:child_process';
import { access, constants } from 'node:fs/promises';
import { delimiter, join } from 'node:path';

export interface CommandResult {
  /** Exit code; -1 when the process could not be started or timed out. */
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
}

/**
 * Runs a command and resolves with its result. Never rejects.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise(resolve => {
    execFile(
      command,
      [...args],
      { timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf-8', windowsHide: true },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ code: 0, stdout, stderr, timedOut: false });
          return;
        }
        const timedOut = err.killed === true && err.signal === 'SIGTERM';
        const code = typeof err.code === 'number' ? err.code : -1;
        resolve({
          code: timedOut ? -1 : code,
          stdout,
          stderr: timedOut ? 'Command timed out' : stderr || err.message,
          timedOut,
        });
      },
    );
  });

/**
 * Look up an executable on PATH. On Windows the PATHEXT suffixes are tried.
 */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const dirs = (env.PATH ?? env.Path ?? '').split(delimiter).filter(Boolean);
  const suffixes =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean).map(s => s.toLowerCase())]
      : [''];

  for (const dir of dirs) {
    for (const suffix of suffixes) {
      const candidate = join(dir, name + suffix);
      try {
        await access(candidate, platform === 'win32' ? constants.F_OK : constants.X_OK);
        return candidate;
      } catch {
        // not in this directory
      }
    }
  }
  return null;
}
