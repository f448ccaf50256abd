import test from "node:test";
import assert from "node:assert/strict";
import { MessageInbox } from "./messageInbox.ts";
import { ChannelTimeoutError } from "./types.ts";

test("items pushed before a wait are buffered in order", async () => {
  const inbox = new MessageInbox<string>();
  inbox.push("first");
  inbox.push("second");

  assert.equal(await inbox.next("a response", 50), "first");
  assert.equal(await inbox.next("a response", 50), "second");
  assert.equal(inbox.bufferedCount, 0);
});

test("a pending wait resolves on the next matching push", async () => {
  const inbox = new MessageInbox<{ id: number }>();
  const waiting = inbox.next("an edit of message 7", 1_000, (item) => item.id === 7);
  inbox.push({ id: 3 });
  inbox.push({ id: 7 });

  assert.deepEqual(await waiting, { id: 7 });
  assert.equal(inbox.bufferedCount, 1);
});

test("an unanswered wait rejects with a channel timeout", async () => {
  const inbox = new MessageInbox<string>();
  await assert.rejects(inbox.next("a response", 5), (error: unknown) => {
    assert.ok(error instanceof ChannelTimeoutError);
    assert.equal(error.waitedMs, 5);
    assert.equal(error.message, "Timed out after 5ms waiting for a response");
    return true;
  });
});

test("closing rejects pending waits and drops later pushes", async () => {
  const inbox = new MessageInbox<string>();
  const waiting = inbox.next("a response", 1_000);
  inbox.close();
  inbox.push("late");

  await assert.rejects(waiting, /Inbox closed/);
  assert.equal(inbox.bufferedCount, 0);
  await assert.rejects(inbox.next("a response", 10), /Inbox closed while waiting for a response/);
});

test("discard drops stale buffered items so a later wait sees only fresh ones", async () => {
  const inbox = new MessageInbox<{ id: number; page: number }>();
  inbox.push({ id: 100, page: 2 });
  inbox.push({ id: 200, page: 1 });

  assert.equal(inbox.discard((item) => item.id === 100), 1);
  assert.equal(inbox.bufferedCount, 1);

  const waiting = inbox.next("an edit of message 100", 1_000, (item) => item.id === 100);
  inbox.push({ id: 100, page: 3 });
  assert.deepEqual(await waiting, { id: 100, page: 3 });
});
