// src/musicPaths.ts
import { isAbsolute, join as pathJoin, relative, sep } from 'path';
import { mkdir } from 'node:fs/promises';
import { attemptStep, type StepResult } from './errors';
import { UNKNOWN, type TrackMetadata } from './metadataExtractor';

const FORBIDDEN_FOLDER_CHARACTERS = /[<>:"/\\|?*]/g;

// Removes characters that are illegal in directory names on common filesystems.
export function sanitizeFolderName(name: string): string {
  return name.replace(FORBIDDEN_FOLDER_CHARACTERS, '');
}

export function firstLetterOf(mainArtist: string): string {
  if (mainArtist === UNKNOWN || mainArtist.length === 0) return UNKNOWN;
  // Spread so a surrogate pair (e.g. an emoji) stays one character.
  const [first] = [...mainArtist];
  return first.toUpperCase();
}

/**
 * Destination directory for a track: base/<Letter>/<Main Artist>/<Album>.
 * The main artist is used as written; only the album is sanitized.
 */
export function resolveDestinationDirectory(metadata: TrackMetadata, baseRoot: string): string {
  const mainArtist = metadata.mainArtist || UNKNOWN;
  const album = sanitizeFolderName(metadata.album || UNKNOWN) || UNKNOWN;
  return pathJoin(baseRoot, firstLetterOf(mainArtist), mainArtist, album);
}

/**
 * True when `directory` is `baseRoot` or lies beneath it. A main artist of `.` or `..`
 * is kept verbatim in the path, which can resolve outside the library.
 */
export function isInsideBaseRoot(directory: string, baseRoot: string): boolean {
  const fromBase = relative(baseRoot, directory);
  return fromBase === '' || (!isAbsolute(fromBase) && fromBase !== '..' && !fromBase.startsWith(`..${sep}`));
}

export async function ensureDestinationDirectory(directory: string): Promise<StepResult<string>> {
  return attemptStep('resolveDestination', async () => {
    await mkdir(directory, { recursive: true });
    return directory;
  });
}
