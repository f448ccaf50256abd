import { BOT_STATUS_PREFIXES } from "./statusText.ts";
import type { IncomingQuery } from "./types.ts";

export type QueryAdmission =
  | { admitted: true; query: string }
  | {
      admitted: false;
      reason:
        | "not_private"
        | "empty"
        | "forwarded_or_media"
        | "sender_is_bot"
        | "command"
        | "reply"
        | "bot_status_echo";
    };

export function isBotStatusLine(text: string) {
  const lower = text.trim().toLowerCase();
  return BOT_STATUS_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

export function admitQuery(message: IncomingQuery): QueryAdmission {
  if (!message.isPrivate) return { admitted: false, reason: "not_private" };

  const text = String(message.text || "").trim();
  if (!text) return { admitted: false, reason: "empty" };

  // Forwards, media and via-bot posts never start a search.
  if (message.isForwarded || message.hasMedia || message.viaBot) {
    return { admitted: false, reason: "forwarded_or_media" };
  }
  if (message.senderIsBot) return { admitted: false, reason: "sender_is_bot" };
  if (text.startsWith("/")) return { admitted: false, reason: "command" };
  if (message.isReply) return { admitted: false, reason: "reply" };
  if (isBotStatusLine(text)) return { admitted: false, reason: "bot_status_echo" };

  return { admitted: true, query: text };
}
