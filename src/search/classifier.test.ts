import test from "node:test";
import assert from "node:assert/strict";
import {
  UNKNOWN_QUALITY_RANK,
  extractLanguages,
  extractQuality,
  extractYear,
  qualityRank
} from "./classifier.ts";
import { QUALITY_TIERS } from "./types.ts";

test("extractYear picks the first standalone 19xx/20xx run", () => {
  assert.equal(extractYear("Inception 2010 1080p"), "2010");
  assert.equal(extractYear("Dune (2021) remaster 1999"), "2021");
  assert.equal(extractYear("Old Film 1954"), "1954");
});

test("extractYear ignores years embedded in longer digit runs", () => {
  assert.equal(extractYear("id 120105 only"), null);
  assert.equal(extractYear("file-20101 part"), null);
  assert.equal(extractYear("x2010"), "2010");
  assert.equal(extractYear("12010 then 2015"), "2015");
  assert.equal(extractYear("2160p 4K"), null);
});

test("extractYear rejects out-of-range and empty input", () => {
  assert.equal(extractYear("Year 1899 and 2100"), null);
  assert.equal(extractYear(""), null);
});

test("extractQuality returns the canonical tier by priority", () => {
  assert.equal(extractQuality("Movie 4K HDR"), "2160p");
  assert.equal(extractQuality("movie 2160P"), "2160p");
  assert.equal(extractQuality("Movie 720p and 1080p"), "1080p");
  assert.equal(extractQuality("Movie 480p"), "480p");
  assert.equal(extractQuality("Movie HDRip x264"), "HDRip");
  assert.equal(extractQuality("Movie WEB-DL"), null);
});

test("qualityRank orders known tiers and puts unknown below all of them", () => {
  const ranks = QUALITY_TIERS.map((tier) => qualityRank(tier));
  assert.deepEqual(ranks, [4, 3, 2, 1, 0]);
  for (const tier of QUALITY_TIERS) {
    assert.ok(qualityRank(tier) > qualityRank(null));
  }
  assert.equal(qualityRank(undefined), UNKNOWN_QUALITY_RANK);
});

test("extractLanguages maps synonyms and keeps first-seen scan order", () => {
  assert.deepEqual(extractLanguages("Movie Dual Audio Hindi English"), ["Hindi", "English", "Multi"]);
  assert.deepEqual(extractLanguages("Movie MultiAudio ORIYA"), ["Odia", "Multi"]);
  assert.deepEqual(extractLanguages("Movie HindiDub"), ["Hindi", "Hindi Dub"]);
  assert.deepEqual(extractLanguages("Movie Tam+Tel"), ["Tam+tel"]);
  assert.deepEqual(extractLanguages("Movie 1080p"), []);
});
