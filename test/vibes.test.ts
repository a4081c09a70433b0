import { describe, expect, it } from "vitest";
import { getSongsByVibe, isVibe, matchesVibe, missingMoodFeatures, VIBES } from "../src/lib/vibes.js";
import { makeTable } from "./helpers.js";

const table = makeTable([
  { title: "Calm", energy: 0.2, acousticness: 0.9, valence: 0.5, danceability: 0.3, tempo: 80 },
  { title: "Rush", energy: 0.9, acousticness: 0.1, valence: 0.6, danceability: 0.85, tempo: 130 },
  { title: "Rain", energy: 0.3, acousticness: 0.7, valence: 0.1, danceability: 0.2, tempo: 70 },
  { title: "Drive", energy: 0.95, acousticness: 0.05, valence: 0.4, danceability: 0.5, tempo: 100 },
  { title: "Blank", energy: null, acousticness: 0.9, valence: 0.1, danceability: 0.9, tempo: 140 },
]);

function titles(rows: readonly { title?: unknown }[]): unknown[] {
  return rows.map((r) => r.title).sort();
}

describe("getSongsByVibe", () => {
  it.each([
    ["chill", ["Calm", "Rain"]],
    ["energetic", ["Drive", "Rush"]],
    ["gloomy", ["Rain"]],
    ["party", ["Rush"]],
    ["sporty", ["Rush"]],
  ])("returns every %s match when fewer than requested", (vibe, expected) => {
    expect(titles(getSongsByVibe(table, vibe, 20))).toEqual(expected);
  });

  it("returns nothing for an unknown vibe", () => {
    expect(getSongsByVibe(table, "sleepy")).toEqual([]);
  });

  it("never returns more than numSongs and only matching rows", () => {
    for (let seed = 0; seed < 10; seed++) {
      const picked = getSongsByVibe(table, "energetic", 1, { seed });
      expect(picked).toHaveLength(1);
      expect(matchesVibe(picked[0], "energetic", table.capabilities)).toBe(true);
    }
  });

  it("repeats its selection for the same seed", () => {
    const first = getSongsByVibe(table, "chill", 1, { seed: 7 });
    const second = getSongsByVibe(table, "chill", 1, { seed: 7 });
    expect(second).toEqual(first);
  });

  it("uses energy alone for sporty when tempo is absent", () => {
    const noTempo = makeTable([
      { title: "Fast", energy: 0.9 },
      { title: "Slow", energy: 0.5 },
    ]);
    expect(titles(getSongsByVibe(noTempo, "sporty"))).toEqual(["Fast"]);
  });

  it("treats a missing feature column as not qualifying", () => {
    const noEnergy = makeTable([{ title: "Quiet", acousticness: 0.9, valence: 0.1 }]);
    expect(getSongsByVibe(noEnergy, "chill")).toEqual([]);
    expect(getSongsByVibe(noEnergy, "gloomy")).toEqual([]);

    const noValence = makeTable([{ title: "Low", energy: 0.1 }]);
    expect(getSongsByVibe(noValence, "gloomy")).toEqual([]);
  });

  it("returns nothing for an empty table", () => {
    expect(getSongsByVibe(makeTable([], ["title", "energy"]), "sporty")).toEqual([]);
  });
});

describe("isVibe", () => {
  it("recognizes the catalogue", () => {
    expect(VIBES.every(isVibe)).toBe(true);
    expect(isVibe("Chill")).toBe(false);
  });
});

describe("missingMoodFeatures", () => {
  it("is empty when every core feature is present", () => {
    expect(missingMoodFeatures(table.capabilities)).toEqual([]);
  });

  it("lists the core features a table lacks", () => {
    const partial = makeTable([{ title: "Only energy", energy: 0.5, tempo: 100 }]);
    expect(missingMoodFeatures(partial.capabilities)).toEqual([
      "valence",
      "acousticness",
      "danceability",
    ]);
  });
});
