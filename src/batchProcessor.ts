// src/batchProcessor.ts
import { basename, join as pathJoin } from 'path';
import { attemptStep, logStepFailure, type PipelineStage, type StepFailure } from './errors';
import { extractMusicFileMetadata, type TagReader, type TrackMetadata } from './metadataExtractor';
import { ensureDestinationDirectory, isInsideBaseRoot, resolveDestinationDirectory } from './musicPaths';
import { moveFile } from './mover';
import { toManifestRow, type ManifestRow, type ManifestSink } from './manifest';
import type { Logger } from './logger';

export interface BatchContext {
  baseFolder: string;
  manifest: ManifestSink;
  logger: Logger;
  dryRun: boolean;
  tagReader?: TagReader;
  // Called once per file, whatever its outcome.
  onFileProcessed?: (filePath: string) => void;
}

export interface SkippedFile {
  filePath: string;
  stage: PipelineStage;
  reason: string;
}

export interface BatchReport {
  rows: ManifestRow[];
  skipped: SkippedFile[];
}

export function partitionIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be an integer >= 1 (got ${batchSize})`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

function skipFile(filePath: string, failure: StepFailure, logger: Logger): SkippedFile {
  logStepFailure(failure, logger, filePath);
  return { filePath, stage: failure.stage, reason: failure.error.message };
}

async function relocate(filePath: string, metadata: TrackMetadata, context: BatchContext): Promise<string | SkippedFile> {
  const { baseFolder, logger } = context;
  const targetDirectory = resolveDestinationDirectory(metadata, baseFolder);
  if (!isInsideBaseRoot(targetDirectory, baseFolder)) {
    logger.warn(
      `Destination ${targetDirectory} is outside the base folder ${baseFolder}`,
      { file: filePath },
      'resolveDestination',
    );
  }

  if (context.dryRun) {
    const plannedPath = pathJoin(targetDirectory, basename(filePath));
    logger.info(`DRY RUN: Would move ${filePath} -> ${plannedPath}`);
    return plannedPath;
  }

  const directoryResult = await ensureDestinationDirectory(targetDirectory);
  if (!directoryResult.ok) return skipFile(filePath, directoryResult, logger);

  const moveResult = await attemptStep('moveFile', () => moveFile(filePath, targetDirectory, logger));
  if (!moveResult.ok) return skipFile(filePath, moveResult, logger);

  return moveResult.value;
}

/**
 * Processes one batch in order. A file that fails at any stage is logged and skipped
 * without a manifest row; the rest of the batch continues. The batch's rows are
 * appended to the manifest together once every file has been handled.
 */
export async function processBatch(files: readonly string[], context: BatchContext): Promise<BatchReport> {
  const report: BatchReport = { rows: [], skipped: [] };

  for (const filePath of files) {
    const metadataResult = await extractMusicFileMetadata(filePath, context.tagReader);

    if (!metadataResult.ok) {
      report.skipped.push(skipFile(filePath, metadataResult, context.logger));
    } else {
      const outcome = await relocate(filePath, metadataResult.value, context);
      if (typeof outcome === 'string') {
        report.rows.push(toManifestRow(metadataResult.value, outcome));
      } else {
        report.skipped.push(outcome);
      }
    }

    context.onFileProcessed?.(filePath);
  }

  await context.manifest.appendRows(report.rows);
  return report;
}
