export function normalizeWhitespaceText(value: unknown) {
  return String(value || "")
    .replace(/\s+/g, " ")
    .trim();
}

// Letter runs start upper case and continue lower case; digits and punctuation
// break a run, so "spider-man" becomes "Spider-Man".
export function toTitleCase(value: string) {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function splitQueryWords(query: string) {
  return normalizeWhitespaceText(query)
    .toLowerCase()
    .split(" ")
    .filter(Boolean);
}
