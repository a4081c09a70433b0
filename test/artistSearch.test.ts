import { describe, expect, it } from "vitest";
import { createArtistSearch, searchArtists } from "../src/lib/artistSearch.js";
import { makeTable } from "./helpers.js";

const table = makeTable([
  { title: "One", artist: "Coldplay" },
  { title: "Two", artist: "Adele" },
  { title: "Three", artist: "Arctic Monkeys" },
  { title: "Four", artist: "Coldplay" },
]);

describe("searchArtists", () => {
  it("finds an artist by a partial name", () => {
    expect(searchArtists(table, "cold")).toEqual(["Coldplay"]);
  });

  it("ignores queries shorter than two characters", () => {
    expect(searchArtists(table, "c")).toEqual([]);
    expect(searchArtists(table, "  ")).toEqual([]);
  });

  it("returns nothing for a table without artists", () => {
    expect(searchArtists(makeTable([{ title: "x" }]), "cold")).toEqual([]);
  });

  it("reuses one index across queries", () => {
    const search = createArtistSearch(table);
    expect(search("adele")).toEqual(["Adele"]);
    expect(search("monkeys")).toEqual(["Arctic Monkeys"]);
  });
});
