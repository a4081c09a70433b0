import {
  AudioFeature,
  type CellValue,
  type MergedTable,
  type RawTable,
  type TableCapabilities,
  type TrackRecord,
} from "../../scripts/types.js";

export const CORE_MOOD_FEATURES: readonly AudioFeature[] = [
  AudioFeature.Energy,
  AudioFeature.Valence,
  AudioFeature.Acousticness,
  AudioFeature.Danceability,
];

const ALL_FEATURES = Object.values(AudioFeature);

/**
 * Describe which optional columns a table carries. Computed once per table
 * so queries check flags instead of probing columns.
 */
export function detectCapabilities(columns: readonly string[]): TableCapabilities {
  const present = new Set(columns);
  const audioFeatures = new Set(ALL_FEATURES.filter((f) => present.has(f)));

  return {
    hasTitle: present.has("title"),
    hasArtist: present.has("artist"),
    hasYear: present.has("year"),
    hasPopularity: present.has("popularity"),
    hasAudioFeatures: CORE_MOOD_FEATURES.every((f) => audioFeatures.has(f)),
    audioFeatures,
  };
}

/**
 * Freeze a raw table into the read-only handle passed to every query.
 */
export function createMergedTable(raw: RawTable): MergedTable {
  const columns = Object.freeze([...raw.columns]);
  const rows = Object.freeze(raw.rows.map((row) => Object.freeze({ ...row })));

  return Object.freeze({
    columns,
    rows,
    capabilities: Object.freeze(detectCapabilities(columns)),
  });
}

export function numberField(row: TrackRecord, column: string): number | null {
  const value: CellValue | undefined = row[column];
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function textField(row: TrackRecord, column: string): string | null {
  const value: CellValue | undefined = row[column];
  if (value === null || value === undefined) return null;
  return typeof value === "number" ? String(value) : value;
}

/** Plain code-unit ordering, independent of the host locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
