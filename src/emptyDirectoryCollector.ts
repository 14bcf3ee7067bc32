// src/emptyDirectoryCollector.ts
import { sep } from 'path';
import { readdir, rmdir } from 'node:fs/promises';
import fg from 'fast-glob';
import { attemptStep, recoverStep } from './errors';
import type { Logger } from './logger';

function depthOf(directory: string): number {
  return directory.split(sep).length;
}

async function listDirectories(root: string): Promise<string[]> {
  const directories = await fg('**', {
    cwd: root,
    absolute: true,
    onlyDirectories: true,
    dot: true,
    followSymbolicLinks: false,
    // An unreadable subtree is left out of the listing instead of failing it.
    suppressErrors: true,
  });
  // fast-glob reports paths with forward slashes; normalize before measuring depth.
  const normalized = directories.map((directory) => directory.split('/').join(sep));
  return normalized.sort((a, b) => depthOf(b) - depthOf(a) || a.localeCompare(b));
}

/**
 * Deletes every directory under `root` that is empty when visited. Children are visited
 * before their parents, so a chain of empty directories goes in a single pass. `root`
 * itself is kept.
 * @returns The deleted directories, in deletion order.
 */
export async function deleteEmptyDirectories(root: string, logger: Logger): Promise<string[]> {
  const deleted: string[] = [];
  const listResult = await attemptStep('deleteEmptyDirectories', () => listDirectories(root));
  const listing = recoverStep(listResult, logger, root);
  if (listing === null) return deleted;

  for (const directory of listing) {
    const result = await attemptStep('deleteEmptyDirectories', async () => {
      const entries = await readdir(directory);
      if (entries.length > 0) return false;
      await rmdir(directory);
      return true;
    });

    if (recoverStep(result, logger, directory)) {
      deleted.push(directory);
      logger.info(`Deleted empty folder: ${directory}`);
    }
  }

  return deleted;
}
