import type { SelectionCoordinates } from "./types.ts";

export const SELECTION_TOKEN_PREFIX = "get:";
// Telegram rejects callback data longer than 64 bytes.
export const SELECTION_TOKEN_MAX_BYTES = 64;

const TOKEN_PATTERN = /^get:(\d+):(\d+)$/;

function assertCoordinate(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Selection ${name} must be a non-negative safe integer, got ${value}`);
  }
}

export function encodeSelectionToken(page: number, index: number) {
  assertCoordinate("page", page);
  assertCoordinate("index", index);
  return `${SELECTION_TOKEN_PREFIX}${page}:${index}`;
}

export function hasSelectionPrefix(token: string | null | undefined) {
  return String(token || "").startsWith(SELECTION_TOKEN_PREFIX);
}

export function decodeSelectionToken(token: string | null | undefined): SelectionCoordinates | null {
  const match = TOKEN_PATTERN.exec(String(token ?? ""));
  if (!match) return null;
  const page = Number(match[1]);
  const index = Number(match[2]);
  if (!Number.isSafeInteger(page) || !Number.isSafeInteger(index)) return null;
  return { page, index };
}
