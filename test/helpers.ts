import { fileURLToPath } from "node:url";
import type { DataUnavailableError } from "../scripts/errors.js";
import type { CellValue, LoadResult, MergedTable } from "../scripts/types.js";
import { createMergedTable } from "../src/lib/trackTable.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/** Build a table from rows; columns are the union of the rows' keys in first-seen order. */
export function makeTable(rows: Record<string, CellValue>[], columns?: string[]): MergedTable {
  const seen = columns ?? [...new Set(rows.flatMap((row) => Object.keys(row)))];
  return createMergedTable({ columns: seen, rows });
}

export function expectTable(result: LoadResult, status: "ready" | "empty"): MergedTable {
  if (result.status === "unavailable" || result.status !== status) {
    throw new Error(`expected load status "${status}", got "${result.status}"`);
  }
  return result.table;
}

export function expectUnavailable(result: LoadResult): DataUnavailableError {
  if (result.status !== "unavailable") {
    throw new Error(`expected load status "unavailable", got "${result.status}"`);
  }
  return result.error;
}
