import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const ROOT = path.join(__dirname, "..");

/**
 * Read a setting from the environment, falling back to the project's `.env` file.
 * Used for TRACK_DATA_DIR and HISTORICAL_SOURCE_PATH; a `.env` value may be quoted.
 */
export function loadEnvVar(name: string): string | undefined {
  if (process.env[name]) return process.env[name];

  const envPath = path.join(ROOT, ".env");
  if (fs.existsSync(envPath)) {
    const content = fs.readFileSync(envPath, "utf-8");
    const match = content.match(new RegExp(`^${name}=(.+)$`, "m"));
    if (match) return match[1].trim().replace(/^["']|["']$/g, "");
  }

  return undefined;
}

/** Resolve a project-relative path against the project root; absolute paths pass through. */
export function resolveFromRoot(p: string): string {
  return path.isAbsolute(p) ? p : path.join(ROOT, p);
}
