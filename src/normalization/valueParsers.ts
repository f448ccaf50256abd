import { clamp } from "../utils.ts";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parseBooleanFlag(value: unknown, fallback = false) {
  const normalized = String(value || "")
    .trim()
    .toLowerCase();
  if (!normalized) return Boolean(fallback);
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return Boolean(fallback);
}

export function parseNumberOrFallback(value: unknown, fallback: number) {
  if (value === undefined || value === null || String(value).trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoundedInteger(value: unknown, fallback: number, min: number, max: number) {
  return clamp(Math.floor(parseNumberOrFallback(value, fallback)), min, max);
}

export function parseTrimmedString(value: unknown, fallback = "") {
  const normalized = String(value ?? "").trim();
  return normalized || fallback;
}
