import { ActionLog } from "./actionLog.ts";
import type { ControlRenderer, MenuContext, MenuRow, SelectionAction, StatusHandle } from "./bot/types.ts";
import {
  ChannelTimeoutError,
  type ChannelControl,
  type ChannelMessage,
  type ChannelSession,
  type ConversationChannel
} from "./channel/types.ts";

export const RESULTS_MESSAGE_ID = 100;
export const GATE_MESSAGE_ID = 50;
export const NEXT_LABEL = "Next ➡️";

export type RemotePage = {
  labels: string[];
  hasNext?: boolean;
};

export type RemoteScript = {
  gate?: boolean;
  pages: RemotePage[] | ((page: number) => RemotePage | null);
  // Clicking "next" on this page never produces an edit.
  stallOnPage?: number;
  deliverArtifact?: boolean;
  chatterBeforeArtifact?: number;
};

export type Delivery = {
  recipientId: string;
  messageId: number;
  text: string;
};

function makeControl(text: string, onClick: () => void): ChannelControl {
  return {
    text,
    async click() {
      onClick();
    }
  };
}

function makeMessage(id: number, text: string, controls: ChannelControl[][], hasArtifact = false, deliveries: Delivery[] = []): ChannelMessage {
  return {
    id,
    text,
    controls,
    hasArtifact,
    async forwardTo(recipientId: string) {
      deliveries.push({ recipientId, messageId: id, text });
    }
  };
}

/**
 * In-process stand-in for the remote search bot: a scripted pager that edits a
 * single results message per "next" click and answers a result click with a
 * file message.
 */
export class FakeRemoteSession implements ChannelSession {
  readonly sent: string[] = [];
  readonly clicked: string[] = [];
  readonly editWaits: number[] = [];
  nextClicks = 0;
  closed = false;
  private readonly responses: ChannelMessage[] = [];
  private readonly edits: ChannelMessage[] = [];
  private readonly script: RemoteScript;
  private readonly deliveries: Delivery[];
  private artifactSeq = 500;

  constructor(script: RemoteScript, deliveries: Delivery[]) {
    this.script = script;
    this.deliveries = deliveries;
  }

  private pageAt(page: number): RemotePage | null {
    const { pages } = this.script;
    if (typeof pages === "function") return pages(page);
    return pages[page - 1] ?? null;
  }

  private hasNext(page: number) {
    const current = this.pageAt(page);
    if (!current) return false;
    if (current.hasNext !== undefined) return current.hasNext;
    return this.pageAt(page + 1) !== null;
  }

  private resultsMessage(page: number): ChannelMessage {
    const current = this.pageAt(page);
    if (!current) return makeMessage(RESULTS_MESSAGE_ID, "No results found.", []);

    const rows = current.labels.map((label) => [makeControl(label, () => this.onResultClick(label))]);
    if (this.hasNext(page)) {
      rows.push([makeControl(NEXT_LABEL, () => this.onNextClick(page))]);
    }
    return makeMessage(RESULTS_MESSAGE_ID, `Results page ${page}`, rows);
  }

  private onNextClick(page: number) {
    this.nextClicks += 1;
    if (this.script.stallOnPage === page) return;
    this.edits.push(this.resultsMessage(page + 1));
  }

  private onResultClick(label: string) {
    this.clicked.push(label);
    const chatter = this.script.chatterBeforeArtifact ?? 1;
    for (let i = 0; i < chatter; i += 1) {
      this.responses.push(makeMessage(400 + i, "Preparing your file...", []));
    }
    if (this.script.deliverArtifact === false) return;
    this.artifactSeq += 1;
    this.responses.push(makeMessage(this.artifactSeq, label, [], true, this.deliveries));
  }

  async send(text: string) {
    this.sent.push(text);
    if (this.script.gate) {
      this.responses.push(
        makeMessage(GATE_MESSAGE_ID, "Please join our channel to use this bot.", [
          [makeControl("Join our channel", () => this.responses.push(this.resultsMessage(1)))]
        ])
      );
      return;
    }
    this.responses.push(this.resultsMessage(1));
  }

  async awaitResponse(timeoutMs: number) {
    const next = this.responses.shift();
    if (!next) throw new ChannelTimeoutError("a response", timeoutMs);
    return next;
  }

  async awaitEdit(messageId: number, timeoutMs: number) {
    this.editWaits.push(messageId);
    const index = this.edits.findIndex((edit) => edit.id === messageId);
    if (index < 0) throw new ChannelTimeoutError(`an edit of message ${messageId}`, timeoutMs);
    const [edit] = this.edits.splice(index, 1);
    return edit;
  }

  async close() {
    this.closed = true;
  }
}

export class FakeChannel implements ConversationChannel {
  readonly sessions: FakeRemoteSession[] = [];
  readonly deliveries: Delivery[] = [];
  private readonly scripts: RemoteScript[];

  constructor(scripts: RemoteScript | RemoteScript[]) {
    this.scripts = Array.isArray(scripts) ? scripts : [scripts];
  }

  async open() {
    const script = this.scripts[Math.min(this.sessions.length, this.scripts.length - 1)];
    const session = new FakeRemoteSession(script, this.deliveries);
    this.sessions.push(session);
    return session;
  }
}

export type RecordedStatus = {
  chatId: string;
  messageId: number;
  replyTo: number | undefined;
  texts: string[];
  removed: boolean;
};

export type RecordedMenu = {
  chatId: string;
  prompt: string;
  rows: MenuRow[];
  replyTo: number | undefined;
};

export class FakeRenderer implements ControlRenderer {
  readonly statuses: RecordedStatus[] = [];
  readonly menus: RecordedMenu[] = [];
  private nextMessageId = 900;

  async sendStatus(chatId: string, text: string, replyToMessageId?: number) {
    this.nextMessageId += 1;
    const status: RecordedStatus = {
      chatId,
      messageId: this.nextMessageId,
      replyTo: replyToMessageId,
      texts: [text],
      removed: false
    };
    this.statuses.push(status);
    return this.handleFor(status);
  }

  async sendMenu(chatId: string, prompt: string, rows: MenuRow[], replyToMessageId?: number) {
    this.menus.push({ chatId, prompt, rows, replyTo: replyToMessageId });
  }

  statusFor(chatId: string, messageId: number): StatusHandle {
    let status = this.statuses.find((entry) => entry.chatId === chatId && entry.messageId === messageId);
    if (!status) {
      status = { chatId, messageId, replyTo: undefined, texts: [], removed: false };
      this.statuses.push(status);
    }
    return this.handleFor(status);
  }

  private handleFor(status: RecordedStatus): StatusHandle {
    return {
      messageId: status.messageId,
      async edit(text: string) {
        status.texts.push(text);
      },
      async remove() {
        status.removed = true;
      }
    };
  }
}

export type RecordedAck = { text?: string; alert?: boolean };

export function createSelectionAction(
  overrides: Partial<Omit<SelectionAction, "ack" | "loadMenuContext">> & { menu?: MenuContext } = {}
) {
  const acks: RecordedAck[] = [];
  const menu = overrides.menu ?? { label: "Inception - 2010 - 1080p - English", originalQuery: "Inception" };
  const action: SelectionAction = {
    data: overrides.data ?? "get:1:0",
    isPrivate: overrides.isPrivate ?? true,
    chatId: overrides.chatId ?? "42",
    requesterId: overrides.requesterId ?? "42",
    menuMessageId: overrides.menuMessageId ?? 777,
    async ack(options = {}) {
      acks.push(options);
    },
    async loadMenuContext() {
      return menu;
    }
  };
  return { action, acks };
}

export function createTestLog() {
  return new ActionLog();
}
