import { findExecutable } from './process.js';
import type { Collaborator, DependencyAvailability } from './types.js';

export const COLLABORATORS: readonly Collaborator[] = [
  'exiftool',
  'ffmpeg',
  'sharp',
  'jszip',
  'pdf',
  'audio-tags',
];

export interface ProbeOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** PATH lookup; resolves the executable's path or null. */
  findExecutable?: (name: string) => Promise<string | null>;
  /** Library loaders; a rejection marks the library unavailable. */
  loaders?: Partial<Record<'sharp' | 'jszip', () => Promise<unknown>>>;
}

const DEFAULT_LOADERS: Record<'sharp' | 'jszip', () => Promise<unknown>> = {
  sharp: () => import('sharp'),
  jszip: () => import('jszip'),
};

async function loads(loader: () => Promise<unknown>): Promise<boolean> {
  try {
    await loader();
    return true;
  } catch {
    return false;
  }
}

/**
 * Probe every collaborator once. The built-in PDF and audio rewriters are
 * always present.
 */
export async function probeAvailability(options: ProbeOptions = {}): Promise<DependencyAvailability> {
  const find =
    options.findExecutable ??
    ((name: string) => findExecutable(name, options.env ?? process.env, options.platform ?? process.platform));
  const loaders = { ...DEFAULT_LOADERS, ...options.loaders };

  const [exiftool, ffmpeg, sharp, jszip] = await Promise.all([
    find('exiftool').then(p => p !== null),
    find('ffmpeg').then(p => p !== null),
    loads(loaders.sharp),
    loads(loaders.jszip),
  ]);

  return Object.freeze({ exiftool, ffmpeg, sharp, jszip, pdf: true, 'audio-tags': true });
}
