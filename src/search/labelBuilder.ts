import type { AggregateEntry, QualityTier } from "./types.ts";

export const LABEL_MAX_LENGTH = 60;
export const LABEL_SEPARATOR = " - ";
export const LABEL_ELLIPSIS = "…";
export const UNTITLED_LABEL = "Untitled";

const UNSAFE_LABEL_CHARS = /[^A-Za-z0-9 \-(),+&.:…]/g;

export type LabelParts = {
  title: string;
  year?: string | null;
  quality?: QualityTier | null;
  languages?: readonly string[];
};

export function buildLabel({ title, year, quality, languages = [] }: LabelParts, maxLength = LABEL_MAX_LENGTH) {
  const parts = [title, year, quality, languages.join(", ")].filter((part): part is string => Boolean(part));
  const label = parts.join(LABEL_SEPARATOR);
  if (label.length <= maxLength) return label;
  return `${label.slice(0, Math.max(0, maxLength - 1)).trimEnd()}${LABEL_ELLIPSIS}`;
}

export function sanitizeLabel(text: string) {
  const cleaned = String(text || "")
    .replace(UNSAFE_LABEL_CHARS, "")
    .trim();
  return cleaned || UNTITLED_LABEL;
}

export function renderMenuLabel(entry: AggregateEntry, maxLength = LABEL_MAX_LENGTH) {
  return sanitizeLabel(
    buildLabel(
      {
        title: entry.title,
        year: entry.year,
        quality: entry.quality,
        languages: entry.languages
      },
      maxLength
    )
  );
}
