// Source column -> canonical column, applied per source before the merge
const PRIMARY_RENAMES: Record<string, string> = { name: "title", artists: "artist" };
const SECONDARY_RENAMES: Record<string, string> = { track_name: "title", artists: "artist" };

const HISTORICAL_SOURCE_ENCODING: BufferEncoding = "latin1";

export const DATA_CONFIG = {
  // Source tables (relative to project root unless TRACK_DATA_DIR is set)
  DATA_DIR: "data",
  PRIMARY_FILE: "tracks.csv",
  SECONDARY_FILE: "spotify_tracks.csv",

  PRIMARY_RENAMES,
  SECONDARY_RENAMES,

  // Join keys
  PRIMARY_ID: "id",
  SECONDARY_ID: "track_id",
  COMPOSITE_KEYS: ["title", "artist"],

  // Never typed as numbers when read, so keys compare exactly
  TEXT_COLUMNS: new Set([
    "id",
    "track_id",
    "title",
    "artist",
    ...Object.keys(PRIMARY_RENAMES),
    ...Object.keys(SECONDARY_RENAMES),
  ]),

  // Appended to secondary columns whose name is already taken by the primary
  COLLISION_SUFFIX: "_spotify",

  // Year is derived from this column when the primary source has no year
  RELEASE_DATE_COLUMN: "release_date",

  // One-off cleaning of the historical chart export
  HISTORICAL_SOURCE_PATH: "data/historical_data.csv",
  HISTORICAL_OUTPUT_PATH: "data/clean_historical_data.csv",
  HISTORICAL_SOURCE_ENCODING,
};
