import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { assertSourceDirectory, currentInvocation, DEFAULT_BATCH_SIZE, resolveOrganizerOptions } from './src/config';
import { isLogLevel, Logger, LOG_LEVELS, type LogLevel } from './src/logger';
import { organizeMusicLibrary } from './src/musicOrganizer';

type CliFlags = {
  folderPath?: string;
  baseFolder?: string;
  outputCsv?: string;
  deleteEmpty: boolean;
  dryRun: boolean;
  batchSize: number;
  logLevel?: LogLevel;
};

function parseBatchSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be an integer >= 1.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`Must be one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

const program = new Command()
  .name('music-folder-organizer')
  .description('Move music files into <Letter>/<Main Artist>/<Album> folders based on their tags.')
  .option('--folder-path <dir>', 'folder containing music files (default: current directory)')
  .option('--base-folder <dir>', 'base folder for organized music files (default: current directory)')
  .option('--output-csv <file>', 'manifest CSV, appended to (default: musics_YYYYMMDD.csv)')
  .option('--delete-empty', 'delete empty folders after processing', false)
  .option('--batch-size <n>', 'number of files per manifest batch', parseBatchSize, DEFAULT_BATCH_SIZE)
  .option('--dry-run', 'only log planned moves without modifying files', false)
  .option('--log-level <level>', `one of ${LOG_LEVELS.join(', ')} (default: $LOG_LEVEL or info)`, parseLogLevel)
  .addHelpText(
    'after',
    `
Example:
  music-folder-organizer --folder-path ~/Downloads/music --base-folder /media/music --delete-empty`,
  );

async function main() {
  program.parse(process.argv);
  const flags = program.opts<CliFlags>();

  // Defaults (cwd, dated manifest name) are resolved now, not when the options were declared.
  const options = resolveOrganizerOptions(flags, currentInvocation());
  const logger = new Logger({ minLevel: options.logLevel });

  await assertSourceDirectory(options.folderPath);
  await organizeMusicLibrary(options, { logger, showProgress: process.stdout.isTTY === true });
}

main().catch((error: unknown) => {
  console.error('An unexpected error occurred:', error instanceof Error ? error.message : error);
  process.exit(1);
});
