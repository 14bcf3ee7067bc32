// src/errors.ts
import type { Logger } from './logger';

/** Pipeline operations whose failures are recovered at the file or directory level. */
export type PipelineStage = 'extractMetadata' | 'resolveDestination' | 'moveFile' | 'deleteEmptyDirectories';

export class OrganizerError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage | 'openManifest' | 'configuration',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OrganizerError';
  }
}

export interface StepFailure {
  ok: false;
  stage: PipelineStage;
  error: Error;
}

export type StepResult<T> = { ok: true; value: T } | StepFailure;

export function stepSucceeded<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function stepFailed<T>(stage: PipelineStage, error: unknown): StepResult<T> {
  return { ok: false, stage, error: toError(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs one pipeline operation and turns anything it throws into a failed result
 * tagged with the stage, so the caller decides whether the failure is recoverable.
 */
export async function attemptStep<T>(stage: PipelineStage, operation: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return stepSucceeded(await operation());
  } catch (error) {
    return stepFailed(stage, error);
  }
}

/**
 * Logs a failed step at ERROR under its stage and returns null so the caller skips
 * the current item. Successful steps pass their value through.
 */
export function recoverStep<T>(result: StepResult<T>, logger: Logger, subject?: string): T | null {
  if (result.ok) return result.value;
  logStepFailure(result, logger, subject);
  return null;
}

export function logStepFailure(failure: StepFailure, logger: Logger, subject?: string): void {
  const target = subject ? ` (${subject})` : '';
  logger.error(`Error in ${failure.stage}${target}: ${failure.error.message}`, failure.error, failure.stage);
}
