export const QUALITY_TIERS = ["2160p", "1080p", "720p", "480p", "HDRip"] as const;

export type QualityTier = (typeof QUALITY_TIERS)[number];

export type ResultCandidate = {
  label: string;
  page: number;
  index: number;
};

export type ClassifiedCandidate = ResultCandidate & {
  title: string;
  year: string | null;
  quality: QualityTier | null;
  qualityRank: number;
  languages: string[];
};

export type AggregateEntry = ClassifiedCandidate;

export type SelectionCoordinates = {
  page: number;
  index: number;
};

export type WalkStopReason = "last_page" | "page_limit" | "timeout";

export type WalkOutcome =
  | {
      kind: "no_results";
      reason: "no_controls" | "no_matches";
      pagesScanned: number;
    }
  | {
      kind: "results";
      entries: AggregateEntry[];
      pagesScanned: number;
      stopReason: WalkStopReason;
    };

export type SearchRunOptions = {
  maxPages: number;
  responseTimeoutMs: number;
  editTimeoutMs: number;
  gatePauseMs: number;
  deliveryPollAttempts: number;
};

export const DEFAULT_SEARCH_RUN_OPTIONS: SearchRunOptions = {
  maxPages: 20,
  responseTimeoutMs: 30_000,
  editTimeoutMs: 15_000,
  gatePauseMs: 2_000,
  deliveryPollAttempts: 8
};
