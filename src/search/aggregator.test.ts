import test from "node:test";
import assert from "node:assert/strict";
import { ResultAggregator, classifyCandidate } from "./aggregator.ts";

test("classifyCandidate extracts every signal from the label", () => {
  const classified = classifyCandidate({ label: "Inception (2010) 1080p Hindi English", page: 2, index: 3 });
  assert.deepEqual(classified, {
    label: "Inception (2010) 1080p Hindi English",
    page: 2,
    index: 3,
    title: "Inception",
    year: "2010",
    quality: "1080p",
    qualityRank: 3,
    languages: ["Hindi", "English"]
  });
});

test("aggregator keeps the highest quality variant per title", () => {
  const aggregator = new ResultAggregator();
  const labels = [
    { label: "Inception 2010 480p", page: 1, index: 0 },
    { label: "Inception 2010 1080p", page: 1, index: 4 },
    { label: "Inception 2010 720p", page: 2, index: 1 }
  ];
  for (const candidate of labels) aggregator.consider(classifyCandidate(candidate));

  assert.equal(aggregator.size, 1);
  const entry = aggregator.get("Inception");
  assert.equal(entry?.quality, "1080p");
  assert.deepEqual([entry?.page, entry?.index], [1, 4]);
});

test("aggregator keeps the first seen candidate on a quality tie", () => {
  const aggregator = new ResultAggregator();
  assert.equal(aggregator.consider(classifyCandidate({ label: "Dune 2021 1080p Hindi", page: 1, index: 2 })), true);
  assert.equal(aggregator.consider(classifyCandidate({ label: "Dune 2021 1080p English", page: 3, index: 0 })), false);

  const entry = aggregator.get("Dune");
  assert.deepEqual([entry?.page, entry?.index, entry?.languages], [1, 2, ["Hindi"]]);
});

test("any known quality replaces an unknown one", () => {
  const aggregator = new ResultAggregator();
  aggregator.consider(classifyCandidate({ label: "Dune 2021 WEB-DL", page: 1, index: 0 }));
  aggregator.consider(classifyCandidate({ label: "Dune 2021 HDRip", page: 1, index: 1 }));
  assert.equal(aggregator.get("Dune")?.quality, "HDRip");
});

test("entries are listed in first-insertion order of their titles", () => {
  const aggregator = new ResultAggregator();
  aggregator.consider(classifyCandidate({ label: "Dune 2021 720p", page: 1, index: 0 }));
  aggregator.consider(classifyCandidate({ label: "Arrival 2016 720p", page: 1, index: 1 }));
  aggregator.consider(classifyCandidate({ label: "Dune 2021 2160p", page: 2, index: 0 }));

  assert.deepEqual(
    aggregator.entries().map((entry) => [entry.title, entry.quality]),
    [
      ["Dune", "2160p"],
      ["Arrival", "720p"]
    ]
  );
});

test("candidates with an empty canonical title are skipped", () => {
  const aggregator = new ResultAggregator();
  assert.equal(aggregator.consider(classifyCandidate({ label: "", page: 1, index: 0 })), false);
  assert.equal(aggregator.size, 0);
});
