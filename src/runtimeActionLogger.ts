import fs, { type WriteStream } from "node:fs";
import path from "node:path";
import type { ActionLog, RuntimeAction } from "./actionLog.ts";
import { nowIso } from "./utils.ts";

const MAX_STRING_LENGTH = 2_000;
const MAX_DEPTH = 6;
const MAX_ARRAY_LENGTH = 80;
const MAX_OBJECT_KEYS = 80;
const REDACTED_VALUE = "[REDACTED]";
const OMISSION_VALUE = "[OMITTED]";
const CIRCULAR_VALUE = "[CIRCULAR]";
const TRUNCATED_VALUE = "[TRUNCATED]";
const SENSITIVE_KEY_PATTERN =
  /(api[-_]?(key|hash)|token|secret|authorization|password|cookie|session|bearer|private[-_]?key|phone)/i;

// ── ANSI helpers ───────────────────────────────────────────────────────
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const WHITE = "\x1b[37m";
const BLACK = "\x1b[30m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_CYAN = "\x1b[46m";
const BG_MAGENTA = "\x1b[45m";
const BG_YELLOW = "\x1b[43m";

type AgentStyle = { bg: string; fg: string };

const AGENT_STYLES: Record<string, AgentStyle> = {
  discovery: { bg: BG_CYAN, fg: BLACK },
  selection: { bg: BG_MAGENTA, fg: BLACK },
  channel: { bg: BG_YELLOW, fg: BLACK },
  bot: { bg: BG_GREEN, fg: BLACK },
  runtime: { bg: "\x1b[100m", fg: WHITE } // bright-black bg
};

type SanitizedValue =
  | string
  | number
  | boolean
  | null
  | SanitizedValue[]
  | { [key: string]: SanitizedValue };

export type RuntimeActionEvent = {
  ts: string;
  source: "action_log";
  level: "info" | "error";
  kind: string;
  event: string;
  agent: string;
  chat_id: string | null;
  message_id: string | null;
  user_id: string | null;
  content: string | null;
  metadata: SanitizedValue;
};

type SanitizeContext = {
  depth?: number;
  keyName?: string;
  seen?: WeakSet<object>;
};

function formatAgentBadge(agent: string) {
  const style = AGENT_STYLES[agent] ?? AGENT_STYLES.runtime;
  const label = ` ${(agent || "runtime").padEnd(10)} `;
  return `${style.bg}${style.fg}${BOLD}${label}${RESET}`;
}

function formatMetadataInline(metadata: SanitizedValue) {
  if (!metadata || typeof metadata !== "object" || Array.isArray(metadata)) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(metadata)) {
    if (v === null) continue;
    const val = typeof v === "object" ? JSON.stringify(v) : String(v);
    if (val.length > 80) continue; // skip bulky values
    parts.push(`${DIM}${k}${RESET}${DIM}=${RESET}${val}`);
  }
  return parts.length > 0 ? `  ${parts.join("  ")}` : "";
}

export function formatPrettyLine(payload: RuntimeActionEvent) {
  const time = payload.ts.slice(11, 19); // HH:MM:SS
  const isError = payload.level === "error";

  const timePart = `${DIM}${time}${RESET}`;
  const agentPart = formatAgentBadge(payload.agent);
  const eventText = payload.event || payload.kind || "?";
  const eventPart = isError
    ? `${BG_RED}${WHITE}${BOLD} ${eventText} ${RESET}`
    : `${BOLD}${WHITE}${eventText}${RESET}`;

  return `${timePart} ${agentPart} ${eventPart}${formatMetadataInline(payload.metadata)}\n`;
}

function truncateString(value: unknown, maxLength = MAX_STRING_LENGTH) {
  const text = String(value ?? "");
  if (!text) return "";
  if (text.length <= maxLength) return text;
  const sliceLength = Math.max(0, maxLength - 1);
  return `${text.slice(0, sliceLength)}…`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  if (Array.isArray(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function sanitizeValue(value: unknown, { depth = 0, keyName = "", seen = new WeakSet() }: SanitizeContext = {}): SanitizedValue {
  if (keyName && SENSITIVE_KEY_PATTERN.test(keyName)) {
    return REDACTED_VALUE;
  }

  if (value === null || value === undefined) return null;

  if (typeof value === "string") {
    return truncateString(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "function" || typeof value === "symbol") {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: truncateString(value.name || "Error", 120),
      message: truncateString(value.message || "", 300),
      stack: truncateString(value.stack || "", 3_000)
    };
  }

  if (depth >= MAX_DEPTH) {
    return OMISSION_VALUE;
  }

  if (Array.isArray(value)) {
    const output: SanitizedValue[] = [];
    const boundedLength = Math.min(value.length, MAX_ARRAY_LENGTH);
    for (let i = 0; i < boundedLength; i += 1) {
      output.push(sanitizeValue(value[i], { depth: depth + 1, keyName, seen }));
    }
    if (value.length > MAX_ARRAY_LENGTH) {
      output.push(TRUNCATED_VALUE);
    }
    return output;
  }

  if (!isPlainObject(value)) {
    return truncateString(value);
  }

  if (seen.has(value)) {
    return CIRCULAR_VALUE;
  }
  seen.add(value);

  const output: { [key: string]: SanitizedValue } = {};
  const entries = Object.entries(value);
  const boundedLength = Math.min(entries.length, MAX_OBJECT_KEYS);
  for (let i = 0; i < boundedLength; i += 1) {
    const [entryKey, entryValue] = entries[i];
    output[entryKey] = sanitizeValue(entryValue, { depth: depth + 1, keyName: entryKey, seen });
  }
  if (entries.length > MAX_OBJECT_KEYS) {
    output._truncatedKeys = entries.length - MAX_OBJECT_KEYS;
  }
  seen.delete(value);
  return output;
}

function normalizeIdentifier(value: unknown, maxLength = 120) {
  const normalized = truncateString(value, maxLength).trim();
  return normalized || null;
}

function normalizeLevel(kind: string) {
  return kind.toLowerCase().includes("error") ? "error" : "info";
}

function resolveAgent(kind: string, metadata: unknown) {
  if (isPlainObject(metadata)) {
    const explicitAgent = normalizeIdentifier(metadata.agent, 80);
    if (explicitAgent) return explicitAgent;
  }

  if (kind.startsWith("discovery_")) return "discovery";
  if (kind.startsWith("selection_")) return "selection";
  if (kind.startsWith("channel_")) return "channel";
  if (kind.startsWith("bot_")) return "bot";
  return "runtime";
}

export function normalizeRuntimeActionEvent(action: Partial<RuntimeAction>): RuntimeActionEvent {
  const kind = normalizeIdentifier(action.kind, 120) || "bot_runtime";
  const event = normalizeIdentifier(action.content, 180) || kind;

  return {
    ts: normalizeIdentifier(action.createdAt, 40) || nowIso(),
    source: "action_log",
    level: normalizeLevel(kind),
    kind,
    event,
    agent: resolveAgent(kind, action.metadata),
    chat_id: normalizeIdentifier(action.chatId, 80),
    message_id: normalizeIdentifier(action.messageId, 80),
    user_id: normalizeIdentifier(action.userId, 80),
    content: normalizeIdentifier(action.content, MAX_STRING_LENGTH),
    metadata: sanitizeValue(action.metadata, { keyName: "metadata" })
  };
}

function resolveLogFilePath(value: string) {
  const normalized = value.trim();
  if (!normalized) return "";
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

type RuntimeActionLoggerOptions = {
  enabled?: boolean;
  writeToStdout?: boolean;
  logFilePath?: string;
  writeLine?: ((line: string, payload: RuntimeActionEvent) => void) | null;
};

export class RuntimeActionLogger {
  readonly enabled: boolean;
  readonly writeToStdout: boolean;
  readonly logFilePath: string;
  private readonly writeLine: ((line: string, payload: RuntimeActionEvent) => void) | null;
  private fileStream: WriteStream | null;

  constructor({ enabled = true, writeToStdout = true, logFilePath = "", writeLine = null }: RuntimeActionLoggerOptions = {}) {
    this.enabled = enabled;
    this.writeToStdout = writeToStdout;
    this.writeLine = writeLine;
    this.logFilePath = resolveLogFilePath(logFilePath);
    this.fileStream = null;

    if (this.enabled && this.logFilePath) {
      fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      this.fileStream = fs.createWriteStream(this.logFilePath, {
        flags: "a",
        encoding: "utf8"
      });
      this.fileStream.on("error", (error) => {
        this.fileStream = null;
        process.stderr.write(`runtime action log file disabled: ${error.message}\n`);
      });
    }
  }

  attachTo(log: ActionLog) {
    const previousActionListener = log.onActionLogged;

    log.onActionLogged = (action) => {
      if (previousActionListener) {
        try {
          previousActionListener(action);
        } catch (error) {
          this.logAction({ kind: "runtime_error", content: `action_listener_failed: ${String(error)}` });
        }
      }
      this.logAction(action);
    };
  }

  logAction(action: Partial<RuntimeAction>) {
    if (!this.enabled) return;
    const payload = normalizeRuntimeActionEvent(action);
    const line = `${JSON.stringify(payload)}\n`;

    // A broken sink must not break the action that is being logged.
    if (this.writeLine) {
      try {
        this.writeLine(line, payload);
      } catch (error) {
        process.stderr.write(`runtime action sink failed: ${String(error)}\n`);
      }
    }

    if (this.writeToStdout) {
      process.stdout.write(formatPrettyLine(payload));
    }

    this.fileStream?.write(line);
  }

  close() {
    if (!this.fileStream) return;
    this.fileStream.end();
    this.fileStream = null;
  }
}
