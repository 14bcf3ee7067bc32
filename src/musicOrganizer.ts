// src/musicOrganizer.ts
import { OrganizerError } from './errors';
import { findMusicFiles } from './scanner';
import { partitionIntoBatches, processBatch, type SkippedFile } from './batchProcessor';
import { deleteEmptyDirectories } from './emptyDirectoryCollector';
import { CsvManifestWriter, type ManifestSink } from './manifest';
import { ProgressTracker } from './progress';
import type { OrganizerOptions } from './config';
import type { Logger } from './logger';
import type { TagReader } from './metadataExtractor';

export interface OrganizerDependencies {
  logger: Logger;
  openManifest?: (location: string) => Promise<ManifestSink>;
  tagReader?: TagReader;
  showProgress?: boolean;
}

export interface OrganizeSummary {
  scannedFiles: number;
  movedFiles: number;
  skippedFiles: SkippedFile[];
  deletedDirectories: string[];
  manifestPath: string;
}

async function openManifestSink(
  location: string,
  openManifest: (location: string) => Promise<ManifestSink>,
): Promise<ManifestSink> {
  try {
    return await openManifest(location);
  } catch (error) {
    throw new OrganizerError(`Cannot open manifest ${location}`, 'openManifest', { cause: error });
  }
}

function logSummary(summary: OrganizeSummary, dryRun: boolean, logger: Logger): void {
  logger.info('--- Music Organization Summary ---');
  logger.info(`${dryRun ? 'Planned' : 'Successfully moved'} ${summary.movedFiles} of ${summary.scannedFiles} music files.`);
  if (summary.skippedFiles.length > 0) {
    logger.warn(`Skipped ${summary.skippedFiles.length} files:`);
    summary.skippedFiles.forEach((file) => logger.warn(`  - ${file.filePath} [${file.stage}]: ${file.reason}`));
  }
  if (summary.deletedDirectories.length > 0) {
    logger.info(`Deleted ${summary.deletedDirectories.length} empty folders.`);
  }
  logger.info(`Manifest written to ${summary.manifestPath}`);
}

/**
 * Organizes the music files under `options.folderPath` into
 * `options.baseFolder/<Letter>/<Main Artist>/<Album>/` and records each move in the manifest.
 *
 * Per-file and per-directory failures are logged and skipped. The returned promise only
 * rejects when the run itself cannot proceed (e.g. the manifest cannot be opened). The
 * manifest is closed before returning on every path.
 */
export async function organizeMusicLibrary(
  options: OrganizerOptions,
  dependencies: OrganizerDependencies,
): Promise<OrganizeSummary> {
  const { logger } = dependencies;
  const manifest = await openManifestSink(options.outputCsv, dependencies.openManifest ?? CsvManifestWriter.open);

  logger.info(
    `Organizing MUSIC files (Source: ${options.folderPath}, Destination: ${options.baseFolder}, Dry Run: ${options.dryRun})`,
  );

  try {
    await manifest.writeHeader();

    const musicFiles = await findMusicFiles(options.folderPath, logger);
    const summary: OrganizeSummary = {
      scannedFiles: musicFiles.length,
      movedFiles: 0,
      skippedFiles: [],
      deletedDirectories: [],
      manifestPath: manifest.location,
    };

    const progress = new ProgressTracker({
      total: musicFiles.length,
      label: 'Processing files',
      enabled: dependencies.showProgress ?? false,
    });

    for (const batch of partitionIntoBatches(musicFiles, options.batchSize)) {
      const report = await processBatch(batch, {
        baseFolder: options.baseFolder,
        manifest,
        logger,
        dryRun: options.dryRun,
        tagReader: dependencies.tagReader,
        onFileProcessed: () => progress.increment(),
      });
      summary.movedFiles += report.rows.length;
      summary.skippedFiles.push(...report.skipped);
    }
    progress.complete();

    if (options.deleteEmpty && !options.dryRun) {
      summary.deletedDirectories = await deleteEmptyDirectories(options.folderPath, logger);
    } else if (options.deleteEmpty) {
      logger.info('DRY RUN: Skipping empty folder cleanup.');
    }

    logSummary(summary, options.dryRun, logger);
    return summary;
  } finally {
    await manifest.close();
  }
}
