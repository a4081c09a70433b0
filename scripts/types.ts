import type { DataUnavailableError } from "./errors.js";

export type CellValue = string | number | null;

/** One row keyed by column name. Columns absent from a table are absent from its rows. */
export type TrackRecord = Readonly<Record<string, CellValue>>;

/** A parsed CSV source, or the raw result of a merge. */
export interface RawTable {
  columns: string[];
  rows: Record<string, CellValue>[];
}

export enum AudioFeature {
  Energy = "energy",
  Valence = "valence",
  Acousticness = "acousticness",
  Danceability = "danceability",
  Tempo = "tempo",
}

export interface TableCapabilities {
  hasTitle: boolean;
  hasArtist: boolean;
  hasYear: boolean;
  hasPopularity: boolean;
  /** True only when energy, valence, acousticness and danceability are all present. */
  hasAudioFeatures: boolean;
  audioFeatures: ReadonlySet<AudioFeature>;
}

export interface MergedTable {
  readonly columns: readonly string[];
  readonly rows: readonly TrackRecord[];
  readonly capabilities: TableCapabilities;
}

export type JoinStrategy =
  | { kind: "identifier"; primaryKey: string; secondaryKey: string }
  | { kind: "composite"; keys: string[] };

export type LoadResult =
  | { status: "ready"; table: MergedTable }
  | { status: "empty"; table: MergedTable }
  | { status: "unavailable"; error: DataUnavailableError };

export interface ArtistPopularity {
  artist: string;
  popularity: number;
}

export interface SongPopularity {
  title: string;
  artist: string | null;
  popularity: number;
}

export interface ArtistYearPopularity {
  year: number;
  artist: string;
  popularity: number;
}
