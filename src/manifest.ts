// src/manifest.ts
import { open, type FileHandle } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import type { TrackMetadata } from './metadataExtractor';

export const MANIFEST_HEADER = ['Name', 'Artists', 'Main Artist', 'Year', 'Album', 'New Path'] as const;

export type ManifestRow = readonly [
  name: string,
  artists: string,
  mainArtist: string,
  year: string,
  album: string,
  newPath: string,
];

export function toManifestRow(metadata: TrackMetadata, newPath: string): ManifestRow {
  return [metadata.name, metadata.artists, metadata.mainArtist, metadata.year, metadata.album, newPath];
}

/** Where the orchestrator records processed files. Rows arrive one batch at a time. */
export interface ManifestSink {
  readonly location: string;
  writeHeader(): Promise<void>;
  appendRows(rows: readonly ManifestRow[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * CSV manifest opened in append mode. Every run writes its own header row, so a file
 * reused across runs holds one header per run.
 */
export class CsvManifestWriter implements ManifestSink {
  private closed = false;

  private constructor(
    readonly location: string,
    private readonly handle: FileHandle,
  ) {}

  /** Opens (or creates) the manifest file. Rejects if the file cannot be opened. */
  static async open(location: string): Promise<CsvManifestWriter> {
    return new CsvManifestWriter(location, await open(location, 'a'));
  }

  async writeHeader(): Promise<void> {
    await this.handle.appendFile(stringify([[...MANIFEST_HEADER]]), 'utf8');
  }

  async appendRows(rows: readonly ManifestRow[]): Promise<void> {
    if (rows.length === 0) return;
    await this.handle.appendFile(stringify(rows.map((row) => [...row])), 'utf8');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
