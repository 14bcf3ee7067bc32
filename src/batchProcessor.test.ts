import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { tmpdir } from 'os';
import { partitionIntoBatches, processBatch, type BatchContext } from './batchProcessor';
import { Logger } from './logger';
import type { ManifestRow, ManifestSink } from './manifest';
import type { TaggedAudio, TagReader } from './metadataExtractor';

class RecordingManifest implements ManifestSink {
  readonly location = 'memory';
  headers = 0;
  appendCalls: ManifestRow[][] = [];

  async writeHeader(): Promise<void> {
    this.headers++;
  }

  async appendRows(rows: readonly ManifestRow[]): Promise<void> {
    this.appendCalls.push([...rows]);
  }

  async close(): Promise<void> {}
}

// Tags keyed by file name; null means a file without any tag block.
function fakeTagReader(tags: Record<string, TaggedAudio['common'] | null>): TagReader {
  return async (filePath) => {
    const common = tags[basename(filePath)];
    if (common === undefined) throw new Error(`Unsupported audio: ${basename(filePath)}`);
    if (common === null) return { format: { tagTypes: [] }, common: {} };
    return { format: { tagTypes: ['ID3v2.4'] }, common };
  };
}

describe('partitionIntoBatches', () => {
  it('splits into ordered slices of at most the batch size', () => {
    expect(partitionIntoBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns a single batch when the size exceeds the item count', () => {
    expect(partitionIntoBatches(['a', 'b'], 100)).toEqual([['a', 'b']]);
  });

  it('returns no batches for no items', () => {
    expect(partitionIntoBatches([], 3)).toEqual([]);
  });

  it('rejects sizes below 1', () => {
    expect(() => partitionIntoBatches([1], 0)).toThrow(RangeError);
    expect(() => partitionIntoBatches([1], 1.5)).toThrow('Batch size must be an integer >= 1 (got 1.5)');
  });
});

describe('processBatch', () => {
  let root: string;
  let source: string;
  let base: string;
  let logger: Logger;
  let manifest: RecordingManifest;

  function context(tags: Record<string, TaggedAudio['common'] | null>, overrides: Partial<BatchContext> = {}): BatchContext {
    return { baseFolder: base, manifest, logger, dryRun: false, tagReader: fakeTagReader(tags), ...overrides };
  }

  function addFile(name: string): string {
    const filePath = join(source, name);
    writeFileSync(filePath, name);
    return filePath;
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'batch-test-'));
    source = join(root, 'incoming');
    base = join(root, 'library');
    mkdirSync(source);
    logger = new Logger({ console: false });
    manifest = new RecordingManifest();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('moves a tagged file and records one row', async () => {
    const song = addFile('song.mp3');
    const tags = { 'song.mp3': { title: 'X', artist: 'Y', albumartist: 'Artist/Z', date: '2020', album: 'Best:Of' } };

    const report = await processBatch([song], context(tags));

    const expectedPath = join(base, 'A', 'Artist', 'Z', 'BestOf', 'song.mp3');
    expect(report.rows).toEqual([['X', 'Y', 'Artist/Z', '2020', 'Best:Of', expectedPath]]);
    expect(report.skipped).toEqual([]);
    expect(existsSync(expectedPath)).toBe(true);
    expect(existsSync(song)).toBe(false);
    expect(manifest.appendCalls).toEqual([report.rows]);
  });

  it('skips a file with unreadable tags, leaving it in place with one extraction error', async () => {
    const broken = addFile('broken.mp3');

    const report = await processBatch([broken], context({}));

    expect(report.rows).toEqual([]);
    expect(report.skipped).toEqual([
      { filePath: broken, stage: 'extractMetadata', reason: 'Unsupported audio: broken.mp3' },
    ]);
    expect(existsSync(broken)).toBe(true);
    const errors = logger.getLogs('error');
    expect(errors).toHaveLength(1);
    expect(errors[0].context).toBe('extractMetadata');
    expect(errors[0].message).toBe(`Error in extractMetadata (${broken}): Unsupported audio: broken.mp3`);
  });

  it('skips untagged files', async () => {
    const raw = addFile('raw.wav');
    const report = await processBatch([raw], context({ 'raw.wav': null }));
    expect(report.rows).toEqual([]);
    expect(report.skipped.map((file) => file.stage)).toEqual(['extractMetadata']);
    expect(existsSync(raw)).toBe(true);
  });

  it('files tagless fields under Unknown', async () => {
    const song = addFile('mystery.flac');
    const report = await processBatch([song], context({ 'mystery.flac': { title: 'Mystery' } }));
    const expectedPath = join(base, 'Unknown', 'Unknown', 'Unknown', 'mystery.flac');
    expect(report.rows).toEqual([['Mystery', 'Unknown', 'Unknown', 'Unknown', 'Unknown', expectedPath]]);
    expect(existsSync(expectedPath)).toBe(true);
  });

  it('skips a file whose destination cannot be created and continues with the batch', async () => {
    mkdirSync(base);
    writeFileSync(join(base, 'B'), 'blocks the B folder');
    const blocked = addFile('blocked.mp3');
    const fine = addFile('fine.mp3');
    const tags = {
      'blocked.mp3': { title: 'Blocked', albumartist: 'Band', album: 'One' },
      'fine.mp3': { title: 'Fine', albumartist: 'Quartet', album: 'Two' },
    };

    const report = await processBatch([blocked, fine], context(tags));

    expect(report.skipped.map((file) => [file.filePath, file.stage])).toEqual([[blocked, 'resolveDestination']]);
    expect(report.rows.map((row) => row[0])).toEqual(['Fine']);
    expect(existsSync(blocked)).toBe(true);
    expect(existsSync(join(base, 'Q', 'Quartet', 'Two', 'fine.mp3'))).toBe(true);
    expect(logger.getLogs('error').map((entry) => entry.context)).toEqual(['resolveDestination']);
  });

  it('skips a file that disappears before it can be moved', async () => {
    const vanished = join(source, 'vanished.mp3');
    const report = await processBatch([vanished], context({ 'vanished.mp3': { albumartist: 'Ghost', album: 'Gone' } }));
    expect(report.rows).toEqual([]);
    expect(report.skipped.map((file) => file.stage)).toEqual(['moveFile']);
    expect(logger.getLogs('error').map((entry) => entry.context)).toEqual(['moveFile']);
  });

  it('keeps scan order in the rows', async () => {
    const files = ['c.mp3', 'a.mp3', 'b.mp3'].map(addFile);
    const tags = {
      'c.mp3': { title: 'C', albumartist: 'Zed', album: 'Z' },
      'a.mp3': { title: 'A', albumartist: 'Abe', album: 'A' },
      'b.mp3': { title: 'B', albumartist: 'Bea', album: 'B' },
    };
    const report = await processBatch(files, context(tags));
    expect(report.rows.map((row) => row[0])).toEqual(['C', 'A', 'B']);
  });

  it('plans moves without touching the filesystem in dry-run mode', async () => {
    const song = addFile('song.mp3');
    const report = await processBatch(
      [song],
      context({ 'song.mp3': { title: 'S', albumartist: 'Band', album: 'LP' } }, { dryRun: true }),
    );
    expect(report.rows[0][5]).toBe(join(base, 'B', 'Band', 'LP', 'song.mp3'));
    expect(existsSync(song)).toBe(true);
    expect(existsSync(base)).toBe(false);
    expect(logger.getLogs('info').map((entry) => entry.message)).toEqual([
      `DRY RUN: Would move ${song} -> ${join(base, 'B', 'Band', 'LP', 'song.mp3')}`,
    ]);
  });

  it('warns when the main artist resolves outside the base folder', async () => {
    const song = addFile('song.mp3');
    const report = await processBatch(
      [song],
      context({ 'song.mp3': { title: 'S', albumartist: '..', album: 'LP' } }, { dryRun: true }),
    );
    const outside = join(dirname(base), 'LP');
    expect(report.rows[0][5]).toBe(join(outside, 'song.mp3'));
    const warnings = logger.getLogs('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].context).toBe('resolveDestination');
    expect(warnings[0].message).toBe(`Destination ${outside} is outside the base folder ${base}`);
  });

  it('does not warn for destinations inside the base folder', async () => {
    const song = addFile('song.mp3');
    await processBatch([song], context({ 'song.mp3': { albumartist: 'Band', album: 'LP' } }));
    expect(logger.getLogs('warn')).toEqual([]);
  });

  it('reports every file to onFileProcessed', async () => {
    const processed: string[] = [];
    const files = [addFile('a.mp3'), addFile('bad.mp3')];
    await processBatch(files, context({ 'a.mp3': { albumartist: 'A' } }, { onFileProcessed: (file) => processed.push(file) }));
    expect(processed).toEqual(files);
  });
});
