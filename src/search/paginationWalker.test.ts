import test from "node:test";
import assert from "node:assert/strict";
import { FakeChannel, RESULTS_MESSAGE_ID, createTestLog } from "../testHelpers.ts";
import { findNextControl, isGateMessage, matchesQuery, walkPages } from "./paginationWalker.ts";
import type { ChannelMessage } from "../channel/types.ts";

const FAST = { gatePauseMs: 0 };

function message(text: string, labels: string[]): ChannelMessage {
  return {
    id: 1,
    text,
    controls: labels.map((label) => [{ text: label, async click() {} }]),
    hasArtifact: false,
    async forwardTo() {}
  };
}

test("matchesQuery requires every query word as a substring", () => {
  assert.equal(matchesQuery("The Dark Knight 2008 1080p", ["dark", "knight"]), true);
  assert.equal(matchesQuery("The Dark Knight Rises 2012", ["knight", "rise"]), true);
  assert.equal(matchesQuery("Dark Waters 2019", ["dark", "knight"]), false);
});

test("findNextControl matches a leading next case-insensitively", () => {
  assert.equal(findNextControl(message("", ["Dune", "  NEXT page"]))?.text, "  NEXT page");
  assert.equal(findNextControl(message("", ["Dune", "Go next"])), null);
});

test("isGateMessage recognizes join and subscribe prompts", () => {
  assert.equal(isGateMessage(message("Please subscribe first", ["Open"])), true);
  assert.equal(isGateMessage(message("", ["Join our channel"])), false);
  assert.equal(isGateMessage(message("Results", ["The Joint 2020 720p", "Joint Security Area 2000 1080p"])), false);
  assert.equal(isGateMessage(message("Join us", [])), false);
});

test("walk keeps the best quality across pages and points at its page", async () => {
  const channel = new FakeChannel({
    pages: [
      { labels: ["Inception 2010 720p Hindi", "Interstellar 2014 1080p"] },
      { labels: ["Inception (2010) 1080p English", "Inception 2010 480p"] }
    ]
  });
  const session = await channel.open();
  const outcome = await walkPages(session, "Inception", FAST);

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.equal(outcome.entries.length, 1);
  const [entry] = outcome.entries;
  assert.equal(entry.title, "Inception");
  assert.equal(entry.quality, "1080p");
  assert.deepEqual([entry.page, entry.index], [2, 0]);
  assert.equal(outcome.pagesScanned, 2);
  assert.equal(outcome.stopReason, "last_page");
  assert.deepEqual(channel.sessions[0].sent, ["Inception"]);
  assert.deepEqual(channel.sessions[0].editWaits, [RESULTS_MESSAGE_ID]);
});

test("walk indexes candidates by their position in the flattened controls", async () => {
  const channel = new FakeChannel({
    pages: [{ labels: ["Trailer", "Dune 2021 720p", "Dune Part Two 2024 2160p"] }]
  });
  const outcome = await walkPages(await channel.open(), "dune", FAST);

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.deepEqual(
    outcome.entries.map((entry) => [entry.title, entry.page, entry.index]),
    [
      ["Dune", 1, 1],
      ["Dune Part Two", 1, 2]
    ]
  );
});

test("walk never requests more pages than the ceiling", async () => {
  const channel = new FakeChannel({
    pages: (page) => ({ labels: [`Endless ${page} 2020 720p`], hasNext: true })
  });
  const outcome = await walkPages(await channel.open(), "endless", { ...FAST, maxPages: 5 });

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.equal(outcome.pagesScanned, 5);
  assert.equal(outcome.stopReason, "page_limit");
  assert.equal(channel.sessions[0].nextClicks, 4);
  assert.equal(outcome.entries.length, 5);
});

test("an edit timeout stops the walk and keeps earlier pages", async () => {
  const log = createTestLog();
  const channel = new FakeChannel({
    stallOnPage: 2,
    pages: [
      { labels: ["Dune 2021 720p"] },
      { labels: ["Dune 2021 1080p"] },
      { labels: ["Dune 2021 2160p"] }
    ]
  });
  const outcome = await walkPages(await channel.open(), "dune", { ...FAST, log });

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.equal(outcome.stopReason, "timeout");
  assert.equal(outcome.pagesScanned, 2);
  assert.equal(outcome.entries[0].quality, "1080p");
  assert.ok(log.recent().some((action) => action.kind === "discovery_page_error"));
});

test("a join gate is dismissed once before the results", async () => {
  const channel = new FakeChannel({ gate: true, pages: [{ labels: ["Dune 2021 1080p"] }] });
  const outcome = await walkPages(await channel.open(), "dune", FAST);

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.equal(outcome.entries[0].title, "Dune");
});

test("a gate followed by no buttons is a no-results outcome", async () => {
  const channel = new FakeChannel({ gate: true, pages: [] });
  const outcome = await walkPages(await channel.open(), "Inception", FAST);

  assert.deepEqual(outcome, { kind: "no_results", reason: "no_controls", pagesScanned: 0 });
});

test("pages without a matching label end in a no-matches outcome", async () => {
  const channel = new FakeChannel({
    pages: [{ labels: ["Dune 2021 720p"] }, { labels: ["Arrival 2016 1080p"] }]
  });
  const outcome = await walkPages(await channel.open(), "Inception", FAST);

  assert.deepEqual(outcome, { kind: "no_results", reason: "no_matches", pagesScanned: 2 });
});

test("result labels containing join are walked as results, not dismissed", async () => {
  const channel = new FakeChannel({
    pages: [{ labels: ["The Joint 2020 720p", "Joint Security Area 2000 1080p"] }]
  });
  const outcome = await walkPages(await channel.open(), "joint", FAST);

  assert.equal(outcome.kind, "results");
  if (outcome.kind !== "results") return;
  assert.deepEqual(
    outcome.entries.map((entry) => [entry.title, entry.page, entry.index]),
    [
      ["The Joint", 1, 0],
      ["Joint Security Area", 1, 1]
    ]
  );
  assert.deepEqual(channel.sessions[0].clicked, []);
});
