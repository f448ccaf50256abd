import { silentActionSink, type ActionSink } from "../actionLog.ts";
import type { ChannelControl, ChannelMessage, ChannelSession } from "../channel/types.ts";
import { splitQueryWords } from "../normalization/text.ts";
import { errorMessage, sleep } from "../utils.ts";
import { ResultAggregator, classifyCandidate } from "./aggregator.ts";
import { DEFAULT_SEARCH_RUN_OPTIONS, type SearchRunOptions, type WalkOutcome, type WalkStopReason } from "./types.ts";

const GATE_KEYWORDS = ["join", "subscribe"];

export type WalkOptions = Partial<SearchRunOptions> & {
  log?: ActionSink;
};

export function resolveRunOptions(options: Partial<SearchRunOptions> = {}): SearchRunOptions {
  return {
    maxPages: options.maxPages ?? DEFAULT_SEARCH_RUN_OPTIONS.maxPages,
    responseTimeoutMs: options.responseTimeoutMs ?? DEFAULT_SEARCH_RUN_OPTIONS.responseTimeoutMs,
    editTimeoutMs: options.editTimeoutMs ?? DEFAULT_SEARCH_RUN_OPTIONS.editTimeoutMs,
    gatePauseMs: options.gatePauseMs ?? DEFAULT_SEARCH_RUN_OPTIONS.gatePauseMs,
    deliveryPollAttempts: options.deliveryPollAttempts ?? DEFAULT_SEARCH_RUN_OPTIONS.deliveryPollAttempts
  };
}

export function flattenControls(message: ChannelMessage): ChannelControl[] {
  return message.controls.flat();
}

export function findNextControl(message: ChannelMessage) {
  return flattenControls(message).find((control) => control.text.trim().toLowerCase().startsWith("next")) ?? null;
}

function mentionsGate(text: string) {
  const lowered = text.toLowerCase();
  return GATE_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

// Decided by the message text alone; result labels may contain "join".
export function isGateMessage(message: ChannelMessage) {
  if (!flattenControls(message).length) return false;
  return mentionsGate(message.text);
}

export function matchesQuery(label: string, queryWords: readonly string[]) {
  const lowered = label.toLowerCase();
  return queryWords.every((word) => lowered.includes(word));
}

/**
 * Sends the query and returns the first real response, dismissing a single
 * join/subscribe gate on the way.
 */
export async function openSearch(session: ChannelSession, query: string, options: WalkOptions = {}) {
  const { responseTimeoutMs, gatePauseMs } = resolveRunOptions(options);
  const log = options.log ?? silentActionSink;

  await session.send(query);
  const first = await session.awaitResponse(responseTimeoutMs);
  if (!isGateMessage(first)) return first;

  log.logAction({
    kind: "channel_gate",
    content: "gate_dismissed",
    metadata: { gateText: first.text }
  });
  try {
    await flattenControls(first)[0].click();
    await sleep(gatePauseMs);
    return await session.awaitResponse(responseTimeoutMs);
  } catch (error) {
    log.logAction({
      kind: "channel_gate_error",
      content: `gate_dismiss_failed: ${errorMessage(error)}`
    });
    return first;
  }
}

export async function walkPages(session: ChannelSession, query: string, options: WalkOptions = {}): Promise<WalkOutcome> {
  const { maxPages, editTimeoutMs } = resolveRunOptions(options);
  const log = options.log ?? silentActionSink;
  const queryWords = splitQueryWords(query);
  const aggregator = new ResultAggregator();

  let current = await openSearch(session, query, options);
  if (!flattenControls(current).length) {
    return { kind: "no_results", reason: "no_controls", pagesScanned: 0 };
  }

  let page = 1;
  let stopReason: WalkStopReason = "last_page";
  while (true) {
    flattenControls(current).forEach((control, index) => {
      const label = control.text.trim();
      if (!label || !matchesQuery(label, queryWords)) return;
      aggregator.consider(classifyCandidate({ label, page, index }));
    });

    const next = findNextControl(current);
    if (!next) {
      stopReason = "last_page";
      break;
    }
    if (page >= maxPages) {
      stopReason = "page_limit";
      break;
    }

    try {
      await next.click();
      current = await session.awaitEdit(current.id, editTimeoutMs);
      page += 1;
    } catch (error) {
      log.logAction({
        kind: "discovery_page_error",
        content: `page_advance_failed: ${errorMessage(error)}`,
        metadata: { page }
      });
      stopReason = "timeout";
      break;
    }
  }

  log.logAction({
    kind: "discovery_walk",
    content: "walk_finished",
    metadata: { pagesScanned: page, stopReason, distinct: aggregator.size }
  });

  if (!aggregator.size) {
    return { kind: "no_results", reason: "no_matches", pagesScanned: page };
  }
  return { kind: "results", entries: aggregator.entries(), pagesScanned: page, stopReason };
}
