import dotenv from "dotenv";
import {
  parseBooleanFlag,
  parseBoundedInteger,
  parseNumberOrFallback,
  parseTrimmedString
} from "./normalization/valueParsers.ts";
import { DEFAULT_SEARCH_RUN_OPTIONS } from "./search/types.ts";
import { LABEL_MAX_LENGTH } from "./search/labelBuilder.ts";

dotenv.config();

export type AppConfig = ReturnType<typeof loadAppConfig>;

type Env = Record<string, string | undefined>;

export function normalizeBotUsername(value: unknown, fallback: string) {
  const normalized = parseTrimmedString(value).replace(/^@+/, "");
  return normalized || fallback;
}

export function loadAppConfig(env: Env = process.env) {
  return {
    apiId: parseNumberOrFallback(env.TELEGRAM_API_ID, 0),
    apiHash: parseTrimmedString(env.TELEGRAM_API_HASH),
    botToken: parseTrimmedString(env.TELEGRAM_BOT_TOKEN),
    userSession: parseTrimmedString(env.TELEGRAM_USER_SESSION),
    userPhone: parseTrimmedString(env.TELEGRAM_USER_PHONE),
    targetBotUsername: normalizeBotUsername(env.TARGET_BOT_USERNAME, "ProSearchM5Bot"),
    maxPages: parseBoundedInteger(env.SEARCH_MAX_PAGES, DEFAULT_SEARCH_RUN_OPTIONS.maxPages, 1, 50),
    responseTimeoutMs: parseBoundedInteger(
      env.SEARCH_RESPONSE_TIMEOUT_MS,
      DEFAULT_SEARCH_RUN_OPTIONS.responseTimeoutMs,
      1_000,
      180_000
    ),
    editTimeoutMs: parseBoundedInteger(
      env.SEARCH_EDIT_TIMEOUT_MS,
      DEFAULT_SEARCH_RUN_OPTIONS.editTimeoutMs,
      1_000,
      120_000
    ),
    gatePauseMs: parseBoundedInteger(env.SEARCH_GATE_PAUSE_MS, DEFAULT_SEARCH_RUN_OPTIONS.gatePauseMs, 0, 30_000),
    deliveryPollAttempts: parseBoundedInteger(
      env.SEARCH_DELIVERY_POLL_ATTEMPTS,
      DEFAULT_SEARCH_RUN_OPTIONS.deliveryPollAttempts,
      1,
      30
    ),
    labelMaxLength: parseBoundedInteger(env.MENU_LABEL_MAX_LENGTH, LABEL_MAX_LENGTH, 8, 64),
    runtimeStructuredLogsEnabled: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
    runtimeStructuredLogsStdout: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
    runtimeStructuredLogsFilePath: parseTrimmedString(
      env.RUNTIME_STRUCTURED_LOGS_FILE_PATH,
      "data/logs/runtime-actions.ndjson"
    )
  };
}

export const appConfig = loadAppConfig();

export function ensureRuntimeEnv(config: AppConfig = appConfig) {
  if (!Number.isInteger(config.apiId) || config.apiId <= 0) {
    throw new Error("Missing TELEGRAM_API_ID in environment.");
  }
  if (!config.apiHash) {
    throw new Error("Missing TELEGRAM_API_HASH in environment.");
  }
  if (!config.botToken) {
    throw new Error("Missing TELEGRAM_BOT_TOKEN in environment.");
  }
}

export function searchRunOptions(config: AppConfig) {
  return {
    maxPages: config.maxPages,
    responseTimeoutMs: config.responseTimeoutMs,
    editTimeoutMs: config.editTimeoutMs,
    gatePauseMs: config.gatePauseMs,
    deliveryPollAttempts: config.deliveryPollAttempts
  };
}
