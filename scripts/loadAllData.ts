import path from "node:path";
import { createMergedTable } from "../src/lib/trackTable.js";
import { readCsvTable } from "./csvTable.js";
import { DATA_CONFIG } from "./dataConfig.js";
import { loadEnvVar, resolveFromRoot } from "./env.js";
import { DataUnavailableError, MissingJoinKeyError } from "./errors.js";
import type { CellValue, JoinStrategy, LoadResult, RawTable } from "./types.js";

export interface LoadOptions {
  /** Directory holding both source files. Defaults to TRACK_DATA_DIR, then `data/`. */
  dataDir?: string;
}

// ─── Column normalization ───────────────────────────────────────────────

/**
 * Rename source-specific columns onto canonical names. A rename whose target
 * already exists is skipped so no column is duplicated.
 */
export function renameColumns(table: RawTable, renames: Record<string, string>): RawTable {
  const mapping = new Map<string, string>();
  for (const [from, to] of Object.entries(renames)) {
    if (table.columns.includes(from) && !table.columns.includes(to)) {
      mapping.set(from, to);
    }
  }
  if (mapping.size === 0) return table;

  return {
    columns: table.columns.map((c) => mapping.get(c) ?? c),
    rows: table.rows.map((row) => {
      const renamed: Record<string, CellValue> = {};
      for (const [column, value] of Object.entries(row)) {
        renamed[mapping.get(column) ?? column] = value;
      }
      return renamed;
    }),
  };
}

function yearFromReleaseDate(value: CellValue): number | null {
  if (value === null) return null;
  const match = String(value).match(/^(\d{4})/);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Give the primary source a `year` column derived from `release_date` when it has none.
 */
export function deriveYear(table: RawTable): RawTable {
  if (table.columns.includes("year") || !table.columns.includes(DATA_CONFIG.RELEASE_DATE_COLUMN)) {
    return table;
  }

  return {
    columns: [...table.columns, "year"],
    rows: table.rows.map((row) => ({
      ...row,
      year: yearFromReleaseDate(row[DATA_CONFIG.RELEASE_DATE_COLUMN] ?? null),
    })),
  };
}

function withPlaceholderColumn(table: RawTable, column: string): RawTable {
  return {
    columns: [...table.columns, column],
    rows: table.rows.map((row) => ({ ...row, [column]: null })),
  };
}

// ─── Merge ──────────────────────────────────────────────────────────────

export function selectJoinStrategy(primary: RawTable, secondary: RawTable): JoinStrategy {
  if (
    primary.columns.includes(DATA_CONFIG.PRIMARY_ID) &&
    secondary.columns.includes(DATA_CONFIG.SECONDARY_ID)
  ) {
    return {
      kind: "identifier",
      primaryKey: DATA_CONFIG.PRIMARY_ID,
      secondaryKey: DATA_CONFIG.SECONDARY_ID,
    };
  }

  const keys = DATA_CONFIG.COMPOSITE_KEYS.filter(
    (c) => primary.columns.includes(c) && secondary.columns.includes(c),
  );
  if (keys.length === 0) {
    throw new MissingJoinKeyError(primary.columns, secondary.columns);
  }
  return { kind: "composite", keys };
}

// A null in any key column never matches, not even another null: a row
// missing its id or title is left unmatched rather than paired with every
// other incomplete row. Parts compare as text, so 1 and "1" join.
function joinKey(row: Record<string, CellValue>, columns: string[]): string | null {
  const parts: string[] = [];
  for (const column of columns) {
    const value = row[column] ?? null;
    if (value === null) return null;
    parts.push(String(value));
  }
  return JSON.stringify(parts);
}

/**
 * Left outer join of the secondary source onto the primary. Every primary row
 * survives, once per matching secondary row or once with nulls when nothing
 * matches. Secondary columns that collide with a primary column get the
 * collision suffix; the primary's value is never overwritten.
 */
export function mergeSources(
  primary: RawTable,
  secondary: RawTable,
  strategy: JoinStrategy = selectJoinStrategy(primary, secondary),
): RawTable {
  const primaryKeys = strategy.kind === "identifier" ? [strategy.primaryKey] : strategy.keys;
  const secondaryKeys = strategy.kind === "identifier" ? [strategy.secondaryKey] : strategy.keys;

  // Shared composite keys appear once, from the primary side
  const carried = secondary.columns.filter(
    (c) => strategy.kind === "identifier" || !strategy.keys.includes(c),
  );

  const taken = new Set(primary.columns);
  const outputName = new Map<string, string>();
  for (const column of carried) {
    let name = column;
    while (taken.has(name)) name += DATA_CONFIG.COLLISION_SUFFIX;
    taken.add(name);
    outputName.set(column, name);
  }

  const index = new Map<string, Record<string, CellValue>[]>();
  for (const row of secondary.rows) {
    const key = joinKey(row, secondaryKeys);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }

  const rows: Record<string, CellValue>[] = [];
  for (const left of primary.rows) {
    const key = joinKey(left, primaryKeys);
    const matches = key === null ? undefined : index.get(key);

    for (const right of matches ?? [null]) {
      const merged: Record<string, CellValue> = {};
      for (const column of primary.columns) merged[column] = left[column] ?? null;
      for (const column of carried) {
        merged[outputName.get(column) ?? column] = right ? (right[column] ?? null) : null;
      }
      rows.push(merged);
    }
  }

  return {
    columns: [...primary.columns, ...carried.map((c) => outputName.get(c) ?? c)],
    rows,
  };
}

/**
 * Copy `year` positionally from the primary source when the merged table lost it.
 */
export function ensureYearColumn(merged: RawTable, primary: RawTable): RawTable {
  if (merged.columns.includes("year") || !primary.columns.includes("year")) return merged;

  return {
    columns: [...merged.columns, "year"],
    rows: merged.rows.map((row, i) => ({ ...row, year: primary.rows[i]?.year ?? null })),
  };
}

/**
 * Normalize both sources, align their year columns and merge them.
 * Throws MissingJoinKeyError when no join is possible.
 */
export function buildMergedSource(primarySource: RawTable, secondarySource: RawTable): RawTable {
  const primary = deriveYear(renameColumns(primarySource, DATA_CONFIG.PRIMARY_RENAMES));
  let secondary = renameColumns(secondarySource, DATA_CONFIG.SECONDARY_RENAMES);

  if (primary.columns.includes("year") && !secondary.columns.includes("year")) {
    secondary = withPlaceholderColumn(secondary, "year");
  }

  return ensureYearColumn(mergeSources(primary, secondary), primary);
}

// ─── Loading ────────────────────────────────────────────────────────────

async function readSource(filePath: string): Promise<RawTable | DataUnavailableError> {
  try {
    const table = await readCsvTable(filePath, DATA_CONFIG.TEXT_COLUMNS);
    if (table.columns.length === 0) {
      return new DataUnavailableError(filePath, new Error("no header row"));
    }
    return table;
  } catch (err) {
    return new DataUnavailableError(filePath, err);
  }
}

export function resolveDataDir(options: LoadOptions = {}): string {
  return resolveFromRoot(options.dataDir ?? loadEnvVar("TRACK_DATA_DIR") ?? DATA_CONFIG.DATA_DIR);
}

/**
 * Read both fixed sources and merge them into the table every query runs against.
 * A missing or unreadable file is reported as `unavailable`, never thrown.
 */
export async function loadAllData(options: LoadOptions = {}): Promise<LoadResult> {
  const dataDir = resolveDataDir(options);

  const primary = await readSource(path.join(dataDir, DATA_CONFIG.PRIMARY_FILE));
  if (primary instanceof DataUnavailableError) {
    console.warn(primary.message);
    return { status: "unavailable", error: primary };
  }

  const secondary = await readSource(path.join(dataDir, DATA_CONFIG.SECONDARY_FILE));
  if (secondary instanceof DataUnavailableError) {
    console.warn(secondary.message);
    return { status: "unavailable", error: secondary };
  }

  const table = createMergedTable(buildMergedSource(primary, secondary));
  return table.rows.length === 0 ? { status: "empty", table } : { status: "ready", table };
}
