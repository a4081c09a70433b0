import {
  AudioFeature,
  type MergedTable,
  type TableCapabilities,
  type TrackRecord,
} from "../../scripts/types.js";
import { createSeededRandom, sampleWithoutReplacement } from "./sampling.js";
import { CORE_MOOD_FEATURES, numberField } from "./trackTable.js";

export const VIBES = ["chill", "energetic", "gloomy", "party", "sporty"] as const;

export type Vibe = (typeof VIBES)[number];

export function isVibe(value: string): value is Vibe {
  return VIBES.some((vibe) => vibe === value);
}

/**
 * Reads one audio feature of a row. A column the table lacks reads as
 * `fallback`; an empty cell in a present column reads as NaN, which fails
 * every comparison.
 */
type FeatureReader = (feature: AudioFeature, fallback: number) => number;

type VibeRule = (feature: FeatureReader, capabilities: TableCapabilities) => boolean;

// Fallbacks are chosen so a missing column makes its comparison false
const VIBE_RULES: Record<Vibe, VibeRule> = {
  chill: (f) => f(AudioFeature.Energy, 1) < 0.4 && f(AudioFeature.Acousticness, 0) > 0.6,
  energetic: (f) => f(AudioFeature.Energy, 0) > 0.8 && f(AudioFeature.Acousticness, 1) < 0.2,
  gloomy: (f) => f(AudioFeature.Valence, 1) < 0.3 && f(AudioFeature.Energy, 1) < 0.4,
  party: (f) => f(AudioFeature.Danceability, 0) > 0.8 && f(AudioFeature.Energy, 0) > 0.7,
  sporty: (f, caps) =>
    caps.audioFeatures.has(AudioFeature.Tempo)
      ? f(AudioFeature.Tempo, Number.NaN) > 120 && f(AudioFeature.Energy, 0) > 0.8
      : f(AudioFeature.Energy, 0) > 0.8,
};

export function matchesVibe(row: TrackRecord, vibe: Vibe, capabilities: TableCapabilities): boolean {
  const read: FeatureReader = (feature, fallback) => {
    if (!capabilities.audioFeatures.has(feature)) return fallback;
    return numberField(row, feature) ?? Number.NaN;
  };
  return VIBE_RULES[vibe](read, capabilities);
}

/** Core mood features the table lacks; vibes that read them match nothing. */
export function missingMoodFeatures(capabilities: TableCapabilities): AudioFeature[] {
  if (capabilities.hasAudioFeatures) return [];
  return CORE_MOOD_FEATURES.filter((f) => !capabilities.audioFeatures.has(f));
}

export interface VibeSampleOptions {
  /** Fixes the selection for a given table; omitted means Math.random. */
  seed?: number;
}

/**
 * A random playlist of up to `numSongs` rows matching the vibe.
 * Unknown vibe names and empty tables give an empty list.
 */
export function getSongsByVibe(
  table: MergedTable,
  vibe: string,
  numSongs = 20,
  options: VibeSampleOptions = {},
): TrackRecord[] {
  if (table.rows.length === 0 || !isVibe(vibe)) return [];

  const matches = table.rows.filter((row) => matchesVibe(row, vibe, table.capabilities));
  const random = options.seed === undefined ? Math.random : createSeededRandom(options.seed);
  return sampleWithoutReplacement(matches, numSongs, random);
}
