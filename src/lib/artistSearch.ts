import Fuse from "fuse.js";
import type { MergedTable } from "../../scripts/types.js";
import { listArtists } from "./trackQueries.js";

/**
 * Fuzzy artist lookup for choosing the two artists to compare.
 */
export function createArtistSearch(table: MergedTable): (query: string, limit?: number) => string[] {
  const fuse = new Fuse(listArtists(table), {
    threshold: 0.3,
    minMatchCharLength: 2,
  });

  return (query, limit = 10) => {
    if (query.trim().length < 2) return [];
    return fuse.search(query.trim(), { limit }).map((r) => r.item);
  };
}

export function searchArtists(table: MergedTable, query: string, limit = 10): string[] {
  return createArtistSearch(table)(query, limit);
}
