/**
 * Run options: validation and invocation-time defaults
 */

import { resolve } from 'path';
import { stat } from 'node:fs/promises';
import { z } from 'zod';
import { OrganizerError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

export const DEFAULT_BATCH_SIZE = 100;

const logLevelSchema = z.enum(LOG_LEVELS);

export const rawOptionsSchema = z.object({
  folderPath: z.string().min(1).optional(),
  baseFolder: z.string().min(1).optional(),
  outputCsv: z.string().min(1).optional(),
  deleteEmpty: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  batchSize: z.coerce
    .number({ invalid_type_error: 'batch size must be a number' })
    .int('batch size must be an integer')
    .min(1, 'batch size must be at least 1')
    .default(DEFAULT_BATCH_SIZE),
  logLevel: logLevelSchema.optional(),
});

export type RawOrganizerOptions = z.input<typeof rawOptionsSchema>;

export interface OrganizerOptions {
  folderPath: string;
  baseFolder: string;
  outputCsv: string;
  deleteEmpty: boolean;
  dryRun: boolean;
  batchSize: number;
  logLevel: LogLevel;
}

export interface InvocationContext {
  cwd: string;
  now: Date;
  env: NodeJS.ProcessEnv;
}

export function currentInvocation(): InvocationContext {
  return { cwd: process.cwd(), now: new Date(), env: process.env };
}

/** e.g. musics_20240131.csv, using the local date. */
export function defaultManifestName(now: Date): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `musics_${now.getFullYear()}${month}${day}.csv`;
}

function resolveLogLevel(explicit: LogLevel | undefined, env: NodeJS.ProcessEnv): LogLevel {
  if (explicit) return explicit;
  const fromEnv = logLevelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  return fromEnv.success ? fromEnv.data : 'info';
}

/**
 * Validates raw CLI values and fills in defaults relative to the invocation
 * (working directory, current date). All returned paths are absolute.
 */
export function resolveOrganizerOptions(raw: RawOrganizerOptions, invocation: InvocationContext): OrganizerOptions {
  const parsed = rawOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new OrganizerError(`Invalid options: ${details}`, 'configuration');
  }
  const options = parsed.data;
  const { cwd, now, env } = invocation;

  return {
    folderPath: resolve(cwd, options.folderPath ?? '.'),
    baseFolder: resolve(cwd, options.baseFolder ?? '.'),
    outputCsv: resolve(cwd, options.outputCsv ?? defaultManifestName(now)),
    deleteEmpty: options.deleteEmpty,
    dryRun: options.dryRun,
    batchSize: options.batchSize,
    logLevel: resolveLogLevel(options.logLevel, env),
  };
}

export async function assertSourceDirectory(folderPath: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(folderPath)).isDirectory();
  } catch (error) {
    throw new OrganizerError(`Source folder does not exist: ${folderPath}`, 'configuration', { cause: error });
  }
  if (!isDirectory) {
    throw new OrganizerError(`Source path is not a directory: ${folderPath}`, 'configuration');
  }
}
