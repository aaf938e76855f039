import { homedir as osHomedir } from 'node:os';
import { join, resolve } from 'node:path';

const STATE_DIRNAME = '.tagsweep';
const APPDATA_DIRNAME = 'tagsweep';

/**
 * Directory for logs and backups.
 *
 * `TAGSWEEP_HOME` wins; otherwise `%APPDATA%\tagsweep` on Windows and
 * `~/.tagsweep` elsewhere.
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homedir: () => string = osHomedir,
): string {
  const override = env.TAGSWEEP_HOME?.trim();
  if (override) return resolve(override);

  const appData = env.APPDATA?.trim();
  if (platform === 'win32' && appData) {
    return join(appData, APPDATA_DIRNAME);
  }
  return join(homedir(), STATE_DIRNAME);
}

/**
 * Local-time stamp `YYYYMMDD_HHMMSS`, shared by the log file and backup
 * directory of one run.
 */
export function formatRunStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function resolveLogFile(stateDir: string, stamp: string): string {
  return join(stateDir, 'logs', `clean_${stamp}.log`);
}

export function resolveBackupDir(stateDir: string, stamp: string): string {
  return join(stateDir, 'backups', stamp);
}
