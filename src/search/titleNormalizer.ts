import { toTitleCase } from "../normalization/text.ts";

const LEADING_TAG_PATTERN = /^\[.*?\]\s*/;
const TITLE_PREFIX_PATTERN =
  /^(.*?)(?:\s\(?\d{4}\)?|\s\d{3,4}p|\s(?:hindi|telugu|tamil|malayalam|kannada|english|bengali|marathi|punjabi|gujarati|odia|oriya))/;
const NUMBERED_SUFFIX_PATTERN = /\s-\s(part|the)\s\d/gi;
const SUBTITLE_FRAGMENT_PATTERN = /:\s(the|part)\s\w+/gi;

/**
 * Reduces a noisy result label to the key used for dedup and as the visible
 * title. Two labels for one release ("[TAG] Inception 2010 720p" and
 * "Inception (2010) 1080p Hindi") must land on the same key.
 */
export function normalizeTitle(label: string): string {
  const stripped = String(label || "")
    .toLowerCase()
    .replace(LEADING_TAG_PATTERN, "");

  const match = TITLE_PREFIX_PATTERN.exec(stripped);
  if (!match) return toTitleCase(stripped.trim());

  const title = match[1]
    .trim()
    .replace(NUMBERED_SUFFIX_PATTERN, "")
    .replace(SUBTITLE_FRAGMENT_PATTERN, "")
    .trim();

  return toTitleCase(title || stripped.trim());
}
