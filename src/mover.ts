// src/mover.ts
import { basename, join as pathJoin, resolve } from 'path';
import { access, copyFile, rename, rm, unlink } from 'node:fs/promises';
import type { Logger } from './logger';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// rename() cannot cross filesystems; fall back to copy + unlink. A failure at either step removes the copy.
async function moveAcrossDevices(sourcePath: string, targetPath: string): Promise<void> {
  try {
    await copyFile(sourcePath, targetPath);
  } catch (error) {
    await rm(targetPath, { force: true });
    throw error;
  }
  try {
    await unlink(sourcePath);
  } catch (error) {
    // The source stays where it was, so the copy must not survive.
    await rm(targetPath, { force: true });
    throw error;
  }
}

/**
 * Moves a file into `destinationDirectory`, keeping its file name.
 * An existing file at the target is overwritten.
 * @returns The file's new absolute path.
 */
export async function moveFile(sourcePath: string, destinationDirectory: string, logger: Logger): Promise<string> {
  const targetPath = resolve(pathJoin(destinationDirectory, basename(sourcePath)));

  if (resolve(sourcePath) === targetPath) {
    logger.debug(`File is already in the target location: ${targetPath}`, undefined, 'moveFile');
    return targetPath;
  }

  if (await pathExists(targetPath)) {
    logger.warn(`Overwriting existing file at ${targetPath}`, { source: sourcePath }, 'moveFile');
  }

  try {
    await rename(sourcePath, targetPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') throw error;
    await moveAcrossDevices(sourcePath, targetPath);
  }

  logger.debug(`Moved ${sourcePath} -> ${targetPath}`, undefined, 'moveFile');
  return targetPath;
}
