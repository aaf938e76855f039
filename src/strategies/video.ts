import { access } from 'node:fs/promises';
import { CollaboratorFailureError, describeError } from '../errors.js';
import { replaceAtomically } from '../operations/atomic.js';
import { guard, lastLine } from './types.js';
import type { CleaningStrategy, StrategyDeps } from './types.js';

export const FFMPEG_TIMEOUT_MS = 600_000;

export type VideoPass = 'copy' | 'reencode';

/**
 * Output options per pass. Both drop global metadata; the copy pass keeps
 * every stream untouched, the re-encode pass rebuilds video and audio.
 */
export const VIDEO_PASS_ARGS: Readonly<Record<VideoPass, readonly string[]>> = {
  copy: ['-map', '0', '-c', 'copy', '-map_metadata', '-1', '-movflags', '+faststart'],
  reencode: [
    '-map_metadata', '-1',
    '-c:v', 'libx264', '-crf', '23',
    '-c:a', 'aac', '-b:a', '192k',
    '-movflags', '+faststart',
  ],
};

/**
 * Where a failed pass escalates to: stream copy falls back to a full
 * re-encode, a failed re-encode ends the attempt.
 */
export function nextPass(failed: VideoPass): VideoPass | 'done' {
  return failed === 'copy' ? 'reencode' : 'done';
}

export function ffmpegArgs(input: string, output: string, pass: VideoPass): string[] {
  return ['-nostdin', '-hide_banner', '-loglevel', 'error', '-i', input, ...VIDEO_PASS_ARGS[pass], '-y', output];
}

/**
 * Video remux through ffmpeg, with at most one escalation to re-encoding.
 */
export function createVideoStrategy(deps: StrategyDeps, command = 'ffmpeg'): CleaningStrategy {
  const logger = deps.logger.child('ffmpeg');

  const runPass = async (path: string, pass: VideoPass): Promise<boolean> => {
    try {
      await replaceAtomically(path, async temp => {
        const result = await deps.runner(command, ffmpegArgs(path, temp, pass), {
          timeoutMs: FFMPEG_TIMEOUT_MS,
        });
        if (result.code !== 0) {
          throw new CollaboratorFailureError('ffmpeg', lastLine(result.stderr) || 'no output', result.code);
        }
        try {
          await access(temp);
        } catch {
          throw new CollaboratorFailureError('ffmpeg', 'no output file was written');
        }
      });
      logger.debug(`${pass} pass cleaned ${path}`);
      return true;
    } catch (err) {
      if (pass === 'copy') {
        logger.debug(`copy pass failed for ${path}, re-encoding`, { error: describeError(err) });
        return false;
      }
      throw err;
    }
  };

  return {
    name: 'ffmpeg',
    kind: 'external_tool',
    requires: 'ffmpeg',
    attempt: path =>
      guard('ffmpeg', path, logger, async () => {
        let pass: VideoPass | 'done' = deps.reencodeVideos ? 'reencode' : 'copy';
        while (pass !== 'done') {
          if (await runPass(path, pass)) return true;
          pass = nextPass(pass);
        }
        return false;
      }),
  };
}
