import { dropOverlongRows, readCsvRows, writeCsvRows } from "./csvTable.js";
import { DATA_CONFIG } from "./dataConfig.js";
import { loadEnvVar, resolveFromRoot } from "./env.js";

// One-off: re-encode the historical chart export as UTF-8 without malformed lines.

async function main() {
  const sourcePath = resolveFromRoot(
    loadEnvVar("HISTORICAL_SOURCE_PATH") ?? DATA_CONFIG.HISTORICAL_SOURCE_PATH,
  );
  const outputPath = resolveFromRoot(DATA_CONFIG.HISTORICAL_OUTPUT_PATH);

  console.log(`Reading ${sourcePath} (${DATA_CONFIG.HISTORICAL_SOURCE_ENCODING})...`);
  const raw = await readCsvRows(sourcePath, DATA_CONFIG.HISTORICAL_SOURCE_ENCODING);
  const { kept, skipped } = dropOverlongRows(raw);

  await writeCsvRows(outputPath, kept);

  console.log(`\nWrote ${outputPath}`);
  console.log(`Rows kept:    ${kept.rows.length}`);
  console.log(`Rows skipped: ${skipped}`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
