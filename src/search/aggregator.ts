import { extractLanguages, extractQuality, extractYear, qualityRank } from "./classifier.ts";
import { normalizeTitle } from "./titleNormalizer.ts";
import type { AggregateEntry, ClassifiedCandidate, ResultCandidate } from "./types.ts";

export function classifyCandidate(candidate: ResultCandidate): ClassifiedCandidate {
  const quality = extractQuality(candidate.label);
  return {
    ...candidate,
    title: normalizeTitle(candidate.label),
    year: extractYear(candidate.label),
    quality,
    qualityRank: qualityRank(quality),
    languages: extractLanguages(candidate.label)
  };
}

/**
 * One entry per canonical title. A later candidate replaces the stored one only
 * when its quality rank is strictly higher, so ties keep the earliest page.
 * Lives for a single discovery run.
 */
export class ResultAggregator {
  private readonly byTitle = new Map<string, AggregateEntry>();

  consider(candidate: ClassifiedCandidate) {
    if (!candidate.title) return false;
    const prior = this.byTitle.get(candidate.title);
    if (prior && candidate.qualityRank <= prior.qualityRank) return false;
    this.byTitle.set(candidate.title, candidate);
    return true;
  }

  get(title: string) {
    return this.byTitle.get(title) ?? null;
  }

  get size() {
    return this.byTitle.size;
  }

  entries(): AggregateEntry[] {
    return [...this.byTitle.values()];
  }
}
