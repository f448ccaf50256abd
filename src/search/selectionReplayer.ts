import { silentActionSink } from "../actionLog.ts";
import { isChannelTimeout, type ChannelMessage, type ChannelSession } from "../channel/types.ts";
import { DeliveryTimeoutError, StateChangedError } from "./errors.ts";
import { findNextControl, flattenControls, openSearch, resolveRunOptions, type WalkOptions } from "./paginationWalker.ts";
import type { SelectionCoordinates } from "./types.ts";

/**
 * Rebuilds the remote menu state from scratch (same query, same page walk) and
 * clicks the selected position. Nothing from the discovery run is reused; the
 * coordinates are the only carried state.
 */
export async function replaySelection(
  session: ChannelSession,
  query: string,
  target: SelectionCoordinates,
  options: WalkOptions = {}
): Promise<ChannelMessage> {
  const { editTimeoutMs, responseTimeoutMs, deliveryPollAttempts } = resolveRunOptions(options);
  const log = options.log ?? silentActionSink;

  let current = await openSearch(session, query, options);
  if (!flattenControls(current).length) {
    throw new StateChangedError("The search no longer returns any results.");
  }

  for (let page = 1; page < target.page; page += 1) {
    const next = findNextControl(current);
    if (!next) {
      throw new StateChangedError(`Next button disappeared on page ${page} before reaching page ${target.page}.`);
    }
    await next.click();
    current = await session.awaitEdit(current.id, editTimeoutMs);
  }

  const controls = flattenControls(current);
  const chosen = controls[target.index];
  if (!chosen) {
    throw new StateChangedError(
      `Page ${target.page} has ${controls.length} buttons, position ${target.index} is gone.`
    );
  }

  log.logAction({
    kind: "selection_click",
    content: "selection_clicked",
    metadata: { page: target.page, index: target.index, label: chosen.text }
  });
  await chosen.click();

  for (let attempt = 1; attempt <= deliveryPollAttempts; attempt += 1) {
    let response: ChannelMessage;
    try {
      response = await session.awaitResponse(responseTimeoutMs);
    } catch (error) {
      if (isChannelTimeout(error)) throw new DeliveryTimeoutError(attempt - 1, error);
      throw error;
    }
    if (response.hasArtifact) return response;
  }

  throw new DeliveryTimeoutError(deliveryPollAttempts);
}
