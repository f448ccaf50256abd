import { uniqueStrings } from "../utils.ts";
import type { QualityTier } from "./types.ts";

const YEAR_PATTERN = /(?<!\d)(19\d{2}|20\d{2})(?!\d)/;

const QUALITY_MARKERS: ReadonlyArray<{ tier: QualityTier; tokens: readonly string[] }> = [
  { tier: "2160p", tokens: ["2160p", "4k"] },
  { tier: "1080p", tokens: ["1080p"] },
  { tier: "720p", tokens: ["720p"] },
  { tier: "480p", tokens: ["480p"] },
  { tier: "HDRip", tokens: ["hdrip"] }
];

const QUALITY_RANKS: Record<QualityTier, number> = {
  "2160p": 4,
  "1080p": 3,
  "720p": 2,
  "480p": 1,
  HDRip: 0
};

export const UNKNOWN_QUALITY_RANK = -1;

// Scan order is the output order, not the order the markers appear in the text.
const LANGUAGE_MARKERS = [
  "hindi",
  "english",
  "telugu",
  "tamil",
  "malayalam",
  "kannada",
  "bengali",
  "marathi",
  "punjabi",
  "gujarati",
  "odia",
  "oriya",
  "dual",
  "multi",
  "multiaudio",
  "hin+eng",
  "hin-eng",
  "tam+tel",
  "dubbed",
  "hindidub",
  "hindub"
] as const;

const LANGUAGE_SYNONYMS: Readonly<Record<string, string>> = {
  dual: "Multi",
  multi: "Multi",
  multiaudio: "Multi",
  odia: "Odia",
  oriya: "Odia",
  hindidub: "Hindi Dub",
  hindub: "Hindi Dub"
};

export function extractYear(text: string): string | null {
  const match = YEAR_PATTERN.exec(String(text || ""));
  return match ? match[1] : null;
}

export function extractQuality(text: string): QualityTier | null {
  const lowered = String(text || "").toLowerCase();
  for (const marker of QUALITY_MARKERS) {
    if (marker.tokens.some((token) => lowered.includes(token))) return marker.tier;
  }
  return null;
}

export function qualityRank(tier: QualityTier | null | undefined) {
  if (!tier) return UNKNOWN_QUALITY_RANK;
  return QUALITY_RANKS[tier] ?? UNKNOWN_QUALITY_RANK;
}

function canonicalLanguage(marker: string) {
  return LANGUAGE_SYNONYMS[marker] ?? marker.charAt(0).toUpperCase() + marker.slice(1);
}

export function extractLanguages(text: string): string[] {
  const lowered = String(text || "").toLowerCase();
  const found = LANGUAGE_MARKERS.filter((marker) => lowered.includes(marker)).map(canonicalLanguage);
  return uniqueStrings(found);
}
