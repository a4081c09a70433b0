import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { dropOverlongRows, readCsvRows, toRawTable, writeCsvRows } from "../scripts/csvTable.js";
import { fixturePath } from "./helpers.js";

describe("toRawTable", () => {
  it("types numeric columns and nulls empty cells", () => {
    const table = toRawTable({
      headers: ["id", "year", "score", "blank"],
      rows: [
        { id: "t1", year: "2010", score: "0.5", blank: "" },
        { id: "7", year: "", score: "-1e2", blank: " " },
      ],
    });

    expect(table.columns).toEqual(["id", "year", "score", "blank"]);
    expect(table.rows).toEqual([
      { id: "t1", year: 2010, score: 0.5, blank: null },
      { id: "7", year: null, score: -100, blank: null },
    ]);
  });

  it("keeps text columns as written even when they look numeric", () => {
    const table = toRawTable(
      { headers: ["id", "title", "plays"], rows: [{ id: "0012", title: "007", plays: "0012" }] },
      new Set(["id", "title"]),
    );
    expect(table.rows).toEqual([{ id: "0012", title: "007", plays: 12 }]);
  });

  it("fills missing cells of short rows with null", () => {
    const table = toRawTable({ headers: ["a", "b"], rows: [{ a: "x" }] });
    expect(table.rows).toEqual([{ a: "x", b: null }]);
  });
});

describe("historical cleaning", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("decodes latin1 and drops rows with extra fields", async () => {
    const raw = await readCsvRows(fixturePath("historical/latin1.csv"), "latin1");
    expect(raw.headers).toEqual(["title", "artist", "streams"]);
    expect(raw.rows).toHaveLength(3);

    const { kept, skipped } = dropOverlongRows(raw);
    expect(skipped).toBe(1);
    expect(kept.rows).toEqual([
      { title: "Café", artist: "Zoé", streams: "100" },
      { title: "Short", artist: "Only" },
    ]);
  });

  it("rejects when the file cannot be read", async () => {
    await expect(readCsvRows(fixturePath("historical/missing.csv"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  it("writes the kept rows as UTF-8", async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "track-explorer-"));
    const outPath = path.join(tmpDir, "out", "clean.csv");

    await writeCsvRows(outPath, {
      headers: ["title", "artist", "streams"],
      rows: [
        { title: "Café", artist: "Zoé", streams: "100" },
        { title: "Short", artist: "Only" },
      ],
    });

    expect(fs.readFileSync(outPath, "utf-8")).toBe(
      "title,artist,streams\nCafé,Zoé,100\nShort,Only,\n",
    );
  });
});
