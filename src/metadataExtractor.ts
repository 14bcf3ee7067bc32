import * as mm from "music-metadata";
import { attemptStep, type StepResult } from "./errors";

export const UNKNOWN = "Unknown";

export interface TrackMetadata {
  readonly name: string;
  readonly artists: string;
  readonly mainArtist: string;
  readonly year: string;
  readonly album: string;
}

/** The subset of music-metadata's IAudioMetadata the organizer reads. */
export interface TaggedAudio {
  format: { tagTypes: readonly string[] };
  common: {
    title?: string;
    artist?: string;
    albumartist?: string;
    date?: string;
    year?: number;
    album?: string;
  };
}

export type TagReader = (filePath: string) => Promise<TaggedAudio>;

export const readTags: TagReader = (filePath) => mm.parseFile(filePath, { duration: false, skipCovers: true });

function tagOrUnknown(value: string | number | undefined): string {
  if (value === undefined) return UNKNOWN;
  const text = String(value).trim();
  return text.length > 0 ? text : UNKNOWN;
}

/**
 * Maps the tags music-metadata reports onto a TrackMetadata record.
 * Throws when the file carries no tag block at all, so untagged files are skipped.
 */
export function toTrackMetadata(filePath: string, audio: TaggedAudio): TrackMetadata {
  if (audio.format.tagTypes.length === 0) {
    throw new Error(`No embedded tags found in ${filePath}`);
  }
  const common = audio.common;
  return {
    name: tagOrUnknown(common.title),
    artists: tagOrUnknown(common.artist),
    mainArtist: tagOrUnknown(common.albumartist),
    // `date` keeps the tag as written (e.g. "2020-05-01"); `year` is the parsed fallback.
    year: tagOrUnknown(common.date ?? common.year),
    album: tagOrUnknown(common.album),
  };
}

/**
 * Extracts the fields used for organizing from a music file.
 * @param filePath Absolute path to the music file.
 * @returns A failed result for the `extractMetadata` stage if the file cannot be read as tagged audio.
 */
export async function extractMusicFileMetadata(
  filePath: string,
  tagReader: TagReader = readTags,
): Promise<StepResult<TrackMetadata>> {
  return attemptStep("extractMetadata", async () => toTrackMetadata(filePath, await tagReader(filePath)));
}
