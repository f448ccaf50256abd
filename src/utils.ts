export function nowIso() {
  return new Date().toISOString();
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export function sleep(ms: unknown): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, Math.floor(Number(ms) || 0))));
}

export function uniqueStrings(values: readonly string[]) {
  return [...new Set(values)];
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

const TELEGRAM_MESSAGE_SAFE_LIMIT = 3900;

export function sanitizeBotText(text: unknown, maxLen = TELEGRAM_MESSAGE_SAFE_LIMIT) {
  if (!text) return "";

  let clean = String(text).trim();
  clean = clean.replace(/\n{3,}/g, "\n\n");

  const limit = Number(maxLen);
  if (Number.isFinite(limit) && limit > 0 && clean.length > limit) {
    const sliceLen = Math.max(1, Math.floor(limit) - 1);
    clean = clean.slice(0, sliceLen).trimEnd() + "…";
  }

  return clean;
}
