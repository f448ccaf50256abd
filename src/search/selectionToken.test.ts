import test from "node:test";
import assert from "node:assert/strict";
import {
  SELECTION_TOKEN_MAX_BYTES,
  decodeSelectionToken,
  encodeSelectionToken,
  hasSelectionPrefix
} from "./selectionToken.ts";

test("tokens carry page and index and decode back", () => {
  assert.equal(encodeSelectionToken(2, 0), "get:2:0");
  for (const [page, index] of [
    [0, 0],
    [1, 7],
    [20, 99],
    [Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER]
  ]) {
    assert.deepEqual(decodeSelectionToken(encodeSelectionToken(page, index)), { page, index });
  }
});

test("the largest token fits the callback payload limit", () => {
  const token = encodeSelectionToken(Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
  assert.ok(Buffer.byteLength(token, "utf8") <= SELECTION_TOKEN_MAX_BYTES);
});

test("decodeSelectionToken returns null for every malformed shape", () => {
  for (const token of [
    "xyz",
    "",
    "get:",
    "get:3",
    "get:3:1:2",
    "get:a:1",
    "get:-1:0",
    "get:1.5:0",
    "get: 1:0",
    "put:1:0",
    "GET:1:0",
    "get:99999999999999999999:0"
  ]) {
    assert.equal(decodeSelectionToken(token), null, token);
  }
  assert.equal(decodeSelectionToken(null), null);
  assert.equal(decodeSelectionToken(undefined), null);
});

test("encodeSelectionToken rejects coordinates it cannot represent", () => {
  assert.throws(() => encodeSelectionToken(-1, 0), RangeError);
  assert.throws(() => encodeSelectionToken(1, 0.5), RangeError);
  assert.throws(() => encodeSelectionToken(Number.NaN, 0), RangeError);
});

test("hasSelectionPrefix separates selection actions from stray callbacks", () => {
  assert.equal(hasSelectionPrefix("get:3:1"), true);
  assert.equal(hasSelectionPrefix("get:broken"), true);
  assert.equal(hasSelectionPrefix("xyz"), false);
  assert.equal(hasSelectionPrefix(undefined), false);
});
