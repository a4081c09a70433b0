import {
  getMostPopularSongByYear,
  getMostPopularSongs,
  getTopArtists,
  listYears,
} from "../src/lib/trackQueries.js";
import { getSongsByVibe, isVibe, missingMoodFeatures } from "../src/lib/vibes.js";
import { loadAllData, resolveDataDir } from "./loadAllData.js";

function argValue(name: string): string | undefined {
  return process.argv.find((a) => a.startsWith(`--${name}=`))?.split("=")[1];
}

async function main() {
  console.log(`Loading track data from ${resolveDataDir()}...`);
  const result = await loadAllData();

  if (result.status !== "ready") {
    console.error(
      "Dataset not loaded or empty. Place 'tracks.csv' and 'spotify_tracks.csv' in the data/ folder.",
    );
    process.exitCode = 1;
    return;
  }

  const { table } = result;
  const { capabilities } = table;

  console.log("\n--- Dataset ---");
  console.log(`Rows:           ${table.rows.length}`);
  console.log(`Columns:        ${table.columns.length}`);
  console.log(`Year:           ${capabilities.hasYear ? "yes" : "no"}`);
  console.log(`Popularity:     ${capabilities.hasPopularity ? "yes" : "no"}`);
  console.log(`Audio features: ${[...capabilities.audioFeatures].join(", ") || "none"}`);

  const years = listYears(table);
  const yearArg = argValue("year");
  const year: number | undefined = yearArg ? Number.parseInt(yearArg, 10) : years[0];

  if (year === undefined || Number.isNaN(year)) {
    console.warn("\nNo 'year' column or valid year values available in dataset.");
  } else {
    console.log(`\n--- Top artists ${year} ---`);
    const artists = getTopArtists(table, year);
    if (artists.length === 0) console.log("  (no artist popularity data)");
    for (const { artist, popularity } of artists) {
      console.log(`  ${popularity.toFixed(1).padStart(5)}  ${artist}`);
    }

    console.log(`\n--- Top songs ${year} ---`);
    const songs = getMostPopularSongs(table, year);
    if (songs.length === 0) console.log("  (no song popularity data)");
    for (const { title, artist, popularity } of songs) {
      console.log(`  ${String(popularity).padStart(5)}  ${title} - ${artist ?? "unknown"}`);
    }

    const [topSong, topPopularity] = getMostPopularSongByYear(table, year);
    if (topSong !== null) {
      const score = topPopularity === null ? "unscored" : Math.trunc(topPopularity);
      console.log(`\nMost popular song in ${year}: '${topSong}' (${score})`);
    }
  }

  const vibe = argValue("vibe") ?? "chill";
  if (!isVibe(vibe)) {
    console.warn(`\nUnknown vibe "${vibe}".`);
    return;
  }

  const missing = missingMoodFeatures(table.capabilities);
  if (missing.length > 0) {
    console.warn(`\nMissing audio features: ${missing.join(", ")}; vibe matches will be limited.`);
  }

  const seedArg = argValue("seed");
  const playlist = getSongsByVibe(table, vibe, 15, {
    seed: seedArg === undefined ? undefined : Number.parseInt(seedArg, 10),
  });

  console.log(`\n--- ${vibe} playlist ---`);
  if (playlist.length === 0) console.log("  (no songs found for that vibe)");
  for (const row of playlist) {
    console.log(`  ${row.title ?? "?"} - ${row.artist ?? "?"}`);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
