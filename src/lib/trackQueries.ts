import type {
  ArtistPopularity,
  ArtistYearPopularity,
  MergedTable,
  SongPopularity,
  TrackRecord,
} from "../../scripts/types.js";
import { compareText, numberField, textField } from "./trackTable.js";

export type MostPopularSong =
  | readonly [title: string, popularity: number | null]
  | readonly [title: null, popularity: null];

// Every query answers with an empty result when a column it needs is absent
// or when nothing matches; neither case throws.

function rowsForYear(table: MergedTable, year: number): TrackRecord[] {
  return table.rows.filter((row) => numberField(row, "year") === year);
}

interface Mean {
  sum: number;
  count: number;
}

function addToMean(means: Map<string, Mean>, key: string, value: number): void {
  const mean = means.get(key);
  if (mean) {
    mean.sum += value;
    mean.count++;
  } else {
    means.set(key, { sum: value, count: 1 });
  }
}

/**
 * Top artists for a year by mean popularity, highest first.
 * Equal means are ordered by artist name.
 */
export function getTopArtists(table: MergedTable, year: number, topN = 10): ArtistPopularity[] {
  const { hasYear, hasArtist, hasPopularity } = table.capabilities;
  if (!hasYear || !hasArtist || !hasPopularity) return [];

  const means = new Map<string, Mean>();
  for (const row of rowsForYear(table, year)) {
    const artist = textField(row, "artist");
    const popularity = numberField(row, "popularity");
    if (artist === null || popularity === null) continue;
    addToMean(means, artist, popularity);
  }

  return [...means]
    .map(([artist, { sum, count }]) => ({ artist, popularity: sum / count }))
    .sort((a, b) => b.popularity - a.popularity || compareText(a.artist, b.artist))
    .slice(0, Math.max(0, topN));
}

/**
 * Songs of a year ranked by popularity, highest first. Equal scores keep
 * table order; rows without a title or popularity are not ranked.
 */
export function getMostPopularSongs(table: MergedTable, year: number, topN = 20): SongPopularity[] {
  const { hasYear, hasTitle, hasArtist, hasPopularity } = table.capabilities;
  if (!hasYear || !hasTitle || !hasArtist || !hasPopularity) return [];

  const songs: SongPopularity[] = [];
  for (const row of rowsForYear(table, year)) {
    const title = textField(row, "title");
    const popularity = numberField(row, "popularity");
    if (title === null || popularity === null) continue;
    songs.push({ title, artist: textField(row, "artist"), popularity });
  }

  return songs.sort((a, b) => b.popularity - a.popularity).slice(0, Math.max(0, topN));
}

/**
 * Title and score of the year's most popular song. When the year has titled
 * rows but none carries a score, the first title comes back with a null score.
 */
export function getMostPopularSongByYear(table: MergedTable, year: number): MostPopularSong {
  const [top] = getMostPopularSongs(table, year, 1);
  if (top) return [top.title, top.popularity];

  const { hasYear, hasTitle, hasArtist, hasPopularity } = table.capabilities;
  if (!hasYear || !hasTitle || !hasArtist || !hasPopularity) return [null, null];

  for (const row of rowsForYear(table, year)) {
    const title = textField(row, "title");
    if (title !== null) return [title, null];
  }
  return [null, null];
}

/**
 * Mean popularity per year for two artists, one row per (year, artist) pair
 * that has data, ordered by year then artist.
 */
export function compareArtists(
  table: MergedTable,
  artist1: string,
  artist2: string,
): ArtistYearPopularity[] {
  const { hasYear, hasArtist, hasPopularity } = table.capabilities;
  if (!hasYear || !hasArtist || !hasPopularity) return [];

  const wanted = new Set([artist1, artist2]);
  const means = new Map<string, Mean>();
  const groups = new Map<string, { year: number; artist: string }>();

  for (const row of table.rows) {
    const artist = textField(row, "artist");
    if (artist === null || !wanted.has(artist)) continue;
    const year = numberField(row, "year");
    const popularity = numberField(row, "popularity");
    if (year === null || popularity === null) continue;

    const key = JSON.stringify([year, artist]);
    groups.set(key, { year, artist });
    addToMean(means, key, popularity);
  }

  const result: ArtistYearPopularity[] = [];
  for (const [key, { sum, count }] of means) {
    const group = groups.get(key);
    if (group) result.push({ ...group, popularity: sum / count });
  }
  return result.sort((a, b) => a.year - b.year || compareText(a.artist, b.artist));
}

/** Distinct years in the table, newest first. */
export function listYears(table: MergedTable): number[] {
  if (!table.capabilities.hasYear) return [];

  const years = new Set<number>();
  for (const row of table.rows) {
    const year = numberField(row, "year");
    if (year !== null) years.add(Math.trunc(year));
  }
  return [...years].sort((a, b) => b - a);
}

/** Distinct artist names, sorted. */
export function listArtists(table: MergedTable): string[] {
  if (!table.capabilities.hasArtist) return [];

  const artists = new Set<string>();
  for (const row of table.rows) {
    const artist = textField(row, "artist");
    if (artist !== null) artists.add(artist);
  }
  return [...artists].sort(compareText);
}
