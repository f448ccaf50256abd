import type { ActionSink } from "../actionLog.ts";
import { withSession, type ConversationChannel } from "../channel/types.ts";
import { DeliveryTimeoutError, StateChangedError } from "../search/errors.ts";
import { decodeSelectionToken, hasSelectionPrefix } from "../search/selectionToken.ts";
import { replaySelection } from "../search/selectionReplayer.ts";
import type { SearchRunOptions } from "../search/types.ts";
import { errorMessage } from "../utils.ts";
import {
  DEFAULT_SELECTION_LABEL,
  ORIGINAL_REQUEST_MISSING_TEXT,
  RETRIEVAL_ERROR_TEXT,
  STATE_CHANGED_TEXT,
  deliveryTimeoutText,
  fetchingText
} from "./statusText.ts";
import type { ControlRenderer, MenuContext, SelectionAction } from "./types.ts";

export type SelectionDeps = {
  channel: ConversationChannel;
  renderer: ControlRenderer;
  log: ActionSink;
  runOptions?: Partial<SearchRunOptions>;
};

export type SelectionResult =
  | { kind: "ignored"; reason: "not_private" | "foreign_action" | "malformed_token" }
  | { kind: "missing_request" }
  | { kind: "delivered"; page: number; index: number }
  | { kind: "state_changed" | "delivery_timeout" | "error"; message: string };

function failureText(error: unknown, label: string) {
  if (error instanceof StateChangedError) return { kind: "state_changed" as const, text: STATE_CHANGED_TEXT };
  if (error instanceof DeliveryTimeoutError) return { kind: "delivery_timeout" as const, text: deliveryTimeoutText(label) };
  return { kind: "error" as const, text: RETRIEVAL_ERROR_TEXT };
}

/**
 * Handles a tap on a menu button: replays the original query up to the encoded
 * page, clicks the encoded position and forwards the delivered file.
 */
export async function runSelection(deps: SelectionDeps, action: SelectionAction): Promise<SelectionResult> {
  const { channel, renderer, log } = deps;

  if (!action.isPrivate) {
    await action.ack();
    return { kind: "ignored", reason: "not_private" };
  }
  if (!hasSelectionPrefix(action.data)) {
    await action.ack();
    return { kind: "ignored", reason: "foreign_action" };
  }
  const target = decodeSelectionToken(action.data);
  if (!target || target.page < 1) {
    await action.ack();
    log.logAction({
      kind: "selection_ignored",
      content: "malformed_token",
      chatId: action.chatId,
      userId: action.requesterId,
      metadata: { data: action.data }
    });
    return { kind: "ignored", reason: "malformed_token" };
  }

  let menu: MenuContext;
  try {
    menu = await action.loadMenuContext();
  } catch (error) {
    log.logAction({
      kind: "selection_error",
      content: `menu_lookup_failed: ${errorMessage(error)}`,
      chatId: action.chatId,
      userId: action.requesterId,
      metadata: { page: target.page, index: target.index, error }
    });
    await action.ack({ text: RETRIEVAL_ERROR_TEXT, alert: true });
    return { kind: "error", message: errorMessage(error) };
  }
  if (!menu.originalQuery) {
    await action.ack({ text: ORIGINAL_REQUEST_MISSING_TEXT, alert: true });
    return { kind: "missing_request" };
  }
  const label = menu.label || DEFAULT_SELECTION_LABEL;
  const query = menu.originalQuery;

  await action.ack();
  const status = renderer.statusFor(action.chatId, action.menuMessageId);

  try {
    await status.edit(fetchingText(label));
    const artifact = await withSession(channel, (session) =>
      replaySelection(session, query, target, { ...deps.runOptions, log })
    );
    await artifact.forwardTo(action.requesterId);
    log.logAction({
      kind: "selection_result",
      content: "artifact_delivered",
      chatId: action.chatId,
      userId: action.requesterId,
      metadata: { query, page: target.page, index: target.index }
    });
    await status.remove().catch((removeError: unknown) => {
      log.logAction({
        kind: "selection_error",
        content: `status_remove_failed: ${errorMessage(removeError)}`,
        chatId: action.chatId
      });
    });
    return { kind: "delivered", page: target.page, index: target.index };
  } catch (error) {
    const failure = failureText(error, label);
    log.logAction({
      kind: "selection_error",
      content: `${failure.kind}: ${errorMessage(error)}`,
      chatId: action.chatId,
      userId: action.requesterId,
      metadata: { query, page: target.page, index: target.index, error }
    });
    await status.edit(failure.text).catch((editError: unknown) => {
      log.logAction({
        kind: "selection_error",
        content: `status_edit_failed: ${errorMessage(editError)}`,
        chatId: action.chatId
      });
    });
    return { kind: failure.kind, message: errorMessage(error) };
  }
}
