// src/scanner.ts
import { extname } from 'path';
import fg from 'fast-glob';
import type { Logger } from './logger';

// Matched case-sensitively against the file's extension.
export const MUSIC_EXTENSIONS: readonly string[] = ['.mp3', '.flac', '.wav', '.m4a'];

export function isMusicFile(filePath: string): boolean {
  return MUSIC_EXTENSIONS.includes(extname(filePath));
}

/**
 * Scans a directory recursively and returns a list of absolute file paths.
 * The list is sorted so repeated scans of an unchanged tree enumerate files in the same order.
 * @param sourcePath The absolute path to the directory to scan.
 */
export async function scanDirectory(sourcePath: string): Promise<string[]> {
  const files = await fg('**/*', {
    cwd: sourcePath,
    absolute: true,
    onlyFiles: true,
    dot: true,
    // Do not follow symbolic links to avoid loops or scanning outside the tree.
    followSymbolicLinks: false,
    // Unreadable subdirectories are skipped; the rest of the tree is still listed.
    suppressErrors: true,
  });
  return files.sort();
}

/** Snapshot of the music files under `sourcePath`, taken once per run. */
export async function findMusicFiles(sourcePath: string, logger: Logger): Promise<string[]> {
  logger.info(`Scanning directory: ${sourcePath}`);
  const allFiles = await scanDirectory(sourcePath);
  const musicFiles = allFiles.filter(isMusicFile);
  logger.info(`Found ${musicFiles.length} music files (${allFiles.length} files scanned) in ${sourcePath}.`);
  return musicFiles;
}
