import type { ActionSink } from "../actionLog.ts";
import { withSession, type ConversationChannel } from "../channel/types.ts";
import { LABEL_MAX_LENGTH, renderMenuLabel } from "../search/labelBuilder.ts";
import { walkPages } from "../search/paginationWalker.ts";
import { encodeSelectionToken } from "../search/selectionToken.ts";
import type { AggregateEntry, SearchRunOptions, WalkOutcome } from "../search/types.ts";
import { errorMessage } from "../utils.ts";
import {
  DISCOVERY_ERROR_TEXT,
  MENU_PROMPT,
  discoveringText,
  noMatchesText,
  noResultsText
} from "./statusText.ts";
import type { ControlRenderer, MenuRow, StatusHandle } from "./types.ts";

export type DiscoveryDeps = {
  channel: ConversationChannel;
  renderer: ControlRenderer;
  log: ActionSink;
  runOptions?: Partial<SearchRunOptions>;
  labelMaxLength?: number;
};

export type DiscoveryRequest = {
  chatId: string;
  messageId: number;
  query: string;
};

export function buildMenuRows(entries: AggregateEntry[], labelMaxLength = LABEL_MAX_LENGTH): MenuRow[] {
  return entries.map((entry) => ({
    label: renderMenuLabel(entry, labelMaxLength),
    token: encodeSelectionToken(entry.page, entry.index)
  }));
}

export type DiscoveryResult = WalkOutcome | { kind: "error"; message: string };

/**
 * Walks the remote result pages for one query and answers with a selection
 * menu. The aggregated entries are dropped once the menu is sent.
 */
export async function runDiscovery(deps: DiscoveryDeps, request: DiscoveryRequest): Promise<DiscoveryResult> {
  const { channel, renderer, log } = deps;
  const { chatId, messageId, query } = request;
  let status: StatusHandle | null = null;

  try {
    status = await renderer.sendStatus(chatId, discoveringText(query), messageId);
    const outcome = await withSession(channel, (session) =>
      walkPages(session, query, { ...deps.runOptions, log })
    );

    if (outcome.kind === "no_results") {
      const text =
        outcome.reason === "no_controls" ? noResultsText(query) : noMatchesText(query, outcome.pagesScanned);
      await status.edit(text);
      log.logAction({
        kind: "discovery_result",
        content: "no_results",
        chatId,
        messageId,
        metadata: { query, reason: outcome.reason, pagesScanned: outcome.pagesScanned }
      });
      return outcome;
    }

    const rows = buildMenuRows(outcome.entries, deps.labelMaxLength);
    await status.remove();
    status = null;
    await renderer.sendMenu(chatId, MENU_PROMPT, rows, messageId);
    log.logAction({
      kind: "discovery_result",
      content: "menu_sent",
      chatId,
      messageId,
      metadata: {
        query,
        options: rows.length,
        pagesScanned: outcome.pagesScanned,
        stopReason: outcome.stopReason
      }
    });
    return outcome;
  } catch (error) {
    log.logAction({
      kind: "discovery_error",
      content: errorMessage(error),
      chatId,
      messageId,
      metadata: { query, error }
    });
    if (status) {
      await status.edit(DISCOVERY_ERROR_TEXT).catch((editError: unknown) => {
        log.logAction({
          kind: "discovery_error",
          content: `status_edit_failed: ${errorMessage(editError)}`,
          chatId,
          messageId
        });
      });
    }
    return { kind: "error", message: errorMessage(error) };
  }
}
