import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import csv from "csv-parser";
import { createObjectCsvWriter } from "csv-writer";
import type { CellValue, RawTable } from "./types.js";

export interface CsvRows {
  headers: string[];
  rows: Record<string, string>[];
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Stream a CSV file into string records keyed by header.
 * Rows with more fields than the header carry the extras under `_<index>` keys.
 */
export async function readCsvRows(
  filePath: string,
  encoding: BufferEncoding = "utf-8",
): Promise<CsvRows> {
  let headers: string[] = [];
  const rows: Record<string, string>[] = [];

  const parser = csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim() })
    .on("headers", (h: string[]) => {
      headers = h;
    })
    .on("data", (row: Record<string, string>) => {
      rows.push(row);
    });

  // pipeline tears down the parser as well when the file cannot be read
  await pipeline(fs.createReadStream(filePath, { encoding }), parser);
  return { headers, rows };
}

/**
 * Type each column the way a dataframe reader would: a column whose every
 * non-empty cell is numeric becomes numbers, anything else stays text.
 * Columns named in `textColumns` always stay text, so identifiers keep
 * their leading zeros and full precision. Empty and missing cells become null.
 */
export function toRawTable(
  { headers, rows }: CsvRows,
  textColumns: ReadonlySet<string> = new Set(),
): RawTable {
  const numericColumns = new Set(
    headers.filter((column) => {
      if (textColumns.has(column)) return false;
      let seen = false;
      for (const row of rows) {
        const value = row[column]?.trim();
        if (!value) continue;
        if (!NUMERIC.test(value)) return false;
        seen = true;
      }
      return seen;
    }),
  );

  return {
    columns: [...headers],
    rows: rows.map((row) => {
      const typed: Record<string, CellValue> = {};
      for (const column of headers) {
        const value = row[column]?.trim();
        if (!value) {
          typed[column] = null;
        } else {
          typed[column] = numericColumns.has(column) ? Number(value) : value;
        }
      }
      return typed;
    }),
  };
}

export async function readCsvTable(
  filePath: string,
  textColumns?: ReadonlySet<string>,
): Promise<RawTable> {
  return toRawTable(await readCsvRows(filePath), textColumns);
}

export async function writeCsvRows(filePath: string, { headers, rows }: CsvRows): Promise<void> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const writer = createObjectCsvWriter({
    path: filePath,
    header: headers.map((id) => ({ id, title: id })),
  });
  await writer.writeRecords(rows);
}

/**
 * Drop rows that had more fields than the header. Short rows are kept; their
 * missing fields are written empty.
 */
export function dropOverlongRows({ headers, rows }: CsvRows): { kept: CsvRows; skipped: number } {
  const known = new Set(headers);
  const kept = rows.filter((row) => Object.keys(row).every((key) => known.has(key)));
  return { kept: { headers, rows: kept }, skipped: rows.length - kept.length };
}
