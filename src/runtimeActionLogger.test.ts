import test from "node:test";
import assert from "node:assert/strict";
import { ActionLog, type RuntimeAction } from "./actionLog.ts";
import { RuntimeActionLogger, normalizeRuntimeActionEvent, type RuntimeActionEvent } from "./runtimeActionLogger.ts";

test("normalizeRuntimeActionEvent redacts credentials but keeps operational keys", () => {
  const event = normalizeRuntimeActionEvent({
    kind: "discovery_walk",
    content: "walk_finished",
    metadata: {
      apiHash: "test-hash",
      phone: "+10000000000",
      nested: {
        authorization: "Bearer test-token",
        ok: "safe"
      },
      query: "Dune",
      pagesScanned: 3
    }
  });

  assert.equal(event.kind, "discovery_walk");
  assert.equal(event.agent, "discovery");
  assert.equal(event.level, "info");
  assert.deepEqual(event.metadata, {
    apiHash: "[REDACTED]",
    phone: "[REDACTED]",
    nested: {
      authorization: "[REDACTED]",
      ok: "safe"
    },
    query: "Dune",
    pagesScanned: 3
  });
});

test("error kinds log at error level under their agent", () => {
  const event = normalizeRuntimeActionEvent({
    kind: "selection_error",
    content: "state_changed: next control missing",
    chatId: 42,
    metadata: { error: new RangeError("page out of range") }
  });

  assert.equal(event.level, "error");
  assert.equal(event.agent, "selection");
  assert.equal(event.chat_id, "42");
  assert.equal(event.message_id, null);
});

test("attachTo keeps the prior listener and emits one JSON line per action", () => {
  const lines: string[] = [];
  const payloads: RuntimeActionEvent[] = [];
  const priorActions: RuntimeAction[] = [];
  const logger = new RuntimeActionLogger({
    enabled: true,
    writeToStdout: false,
    logFilePath: "",
    writeLine(line, payload) {
      lines.push(line);
      payloads.push(payload);
    }
  });

  const log = new ActionLog();
  log.onActionLogged = (action) => {
    priorActions.push(action);
  };
  logger.attachTo(log);

  log.logAction({
    createdAt: "2026-03-01T10:11:12.000Z",
    kind: "bot_runtime",
    content: "runtime_started",
    metadata: { agent: "main" }
  });

  assert.equal(priorActions.length, 1);
  assert.equal(lines.length, 1);
  assert.equal(lines[0], `${JSON.stringify(payloads[0])}\n`);
  assert.equal(payloads[0].ts, "2026-03-01T10:11:12.000Z");
  assert.equal(payloads[0].kind, "bot_runtime");
  assert.equal(payloads[0].event, "runtime_started");
  assert.equal(payloads[0].agent, "main");

  logger.close();
});

test("a disabled logger writes nothing", () => {
  const lines: string[] = [];
  const logger = new RuntimeActionLogger({
    enabled: false,
    writeToStdout: false,
    writeLine(line) {
      lines.push(line);
    }
  });

  logger.logAction({ kind: "bot_runtime", content: "runtime_started" });
  assert.deepEqual(lines, []);
});
