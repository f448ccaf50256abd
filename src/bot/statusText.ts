export const MENU_PROMPT = "I found the following distinct results. Please choose one:";

export function discoveringText(query: string) {
  return `Discovering results for “${query}”...`;
}

export function noResultsText(query: string) {
  return `Sorry, no results for “${query}”.`;
}

export function noMatchesText(query: string, pagesScanned: number) {
  const pages = pagesScanned === 1 ? "1 page" : `${pagesScanned} pages`;
  return `Searched ${pages}, but couldn’t find relevant results for “${query}”.`;
}

export const DISCOVERY_ERROR_TEXT = "An error occurred during discovery.";

export function fetchingText(label: string) {
  return `Fetching “${label}”...`;
}

export const STATE_CHANGED_TEXT = "The results changed since this menu was built. Please search again.";

export function deliveryTimeoutText(label: string) {
  return `Nothing was delivered for “${label}”. Please try again.`;
}

export const RETRIEVAL_ERROR_TEXT = "An error occurred during retrieval.";
export const ORIGINAL_REQUEST_MISSING_TEXT = "Original request not found.";
export const DEFAULT_SELECTION_LABEL = "your selection";

// Lower-cased openings of every status line above, so an echoed status is
// never mistaken for a new query.
export const BOT_STATUS_PREFIXES = [
  "i found the following",
  "sorry, no results",
  "searched ",
  "an error occurred",
  "fetching",
  "discovering results for",
  "the results changed",
  "nothing was delivered"
] as const;
