import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, stat, utimes } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '../../src/logger.js';
import { backupFile, backupPathFor } from '../../src/operations/backup.js';
import { makeTempDir, removeTempDir, writeTree } from '../helpers/temp-dir.js';

describe('backupPathFor', () => {
  it('should mirror the path relative to the root', () => {
    expect(backupPathFor('/data/photos/2024/a.jpg', '/data/photos', '/state/backups/20240102_030405')).toBe(
      join('/state/backups/20240102_030405', '2024', 'a.jpg'),
    );
  });
});

describe('backupFile', () => {
  let dir: string;
  let lines: string[];
  let logger: Logger;

  beforeEach(async () => {
    dir = await makeTempDir();
    lines = [];
    logger = new Logger({ console: (_level, line) => lines.push(line), consoleLevel: 'debug' });
    await writeTree(dir, { 'root/sub/a.jpg': 'original bytes' });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should copy the file and keep its timestamps', async () => {
    const source = join(dir, 'root/sub/a.jpg');
    await utimes(source, 1_000, 2_000);

    const ok = await backupFile(source, { root: join(dir, 'root'), backupDir: join(dir, 'backups'), logger });

    const target = join(dir, 'backups/sub/a.jpg');
    expect(ok).toBe(true);
    expect(await readFile(target, 'utf-8')).toBe('original bytes');
    expect((await stat(target)).mtimeMs).toBe(2_000_000);
  });

  it('should log and return false when the source cannot be read', async () => {
    const ok = await backupFile(join(dir, 'root/missing.jpg'), {
      root: join(dir, 'root'),
      backupDir: join(dir, 'backups'),
      logger,
    });

    expect(ok).toBe(false);
    expect(lines.some(line => line.includes(`ERROR Backup failed for ${join(dir, 'root/missing.jpg')}`))).toBe(true);
  });
});
