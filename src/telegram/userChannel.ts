import bigInt from "big-integer";
import { Api, type TelegramClient } from "telegram";
import { NewMessage, type NewMessageEvent } from "telegram/events/NewMessage";
import { EditedMessage, type EditedMessageEvent } from "telegram/events/EditedMessage";
import { silentActionSink, type ActionSink } from "../actionLog.ts";
import { ConversationQueue } from "../channel/conversationQueue.ts";
import { MessageInbox } from "../channel/messageInbox.ts";
import type { ChannelMessage, ChannelSession, ConversationChannel } from "../channel/types.ts";

export function isArtifactMedia(media: Api.TypeMessageMedia | undefined) {
  return media instanceof Api.MessageMediaDocument || media instanceof Api.MessageMediaPhoto;
}

type RemoteButton = {
  readonly text: string;
  click(params: { password?: string }): Promise<unknown>;
};

// The slice of a GramJS message the channel reads.
export type RemoteMessage = Pick<Api.Message, "id" | "message" | "media" | "peerId"> & {
  getButtons(): Promise<RemoteButton[][] | undefined>;
};

/**
 * Buttons are read through `getButtons()`, which resolves the chat when the
 * synchronous `buttons` getter has no cached input peer. `beforeClick` runs
 * ahead of every control click.
 */
export async function toChannelMessage(
  client: Pick<TelegramClient, "forwardMessages">,
  message: RemoteMessage,
  beforeClick: () => void = () => {}
): Promise<ChannelMessage> {
  const buttons = (await message.getButtons()) ?? [];
  return {
    id: message.id,
    text: message.message ?? "",
    controls: buttons.map((row) =>
      row.map((button) => ({
        text: button.text ?? "",
        async click() {
          beforeClick();
          await button.click({});
        }
      }))
    ),
    hasArtifact: isArtifactMedia(message.media),
    async forwardTo(recipientId: string) {
      await client.forwardMessages(bigInt(recipientId), {
        messages: [message.id],
        fromPeer: message.peerId
      });
    }
  };
}

type TelegramUserChannelOptions = {
  client: TelegramClient;
  targetBotUsername: string;
  log?: ActionSink;
  queue?: ConversationQueue;
};

class TelegramUserSession implements ChannelSession {
  private readonly client: TelegramClient;
  private readonly targetBotUsername: string;
  private readonly release: () => void;
  private readonly responses = new MessageInbox<Api.Message>();
  private readonly edits = new MessageInbox<Api.Message>();
  private readonly newMessageFilter: NewMessage;
  private readonly editFilter: EditedMessage;
  private closed = false;

  constructor(client: TelegramClient, targetBotUsername: string, release: () => void) {
    this.client = client;
    this.targetBotUsername = targetBotUsername;
    this.release = release;
    this.newMessageFilter = new NewMessage({ chats: [targetBotUsername], incoming: true });
    this.editFilter = new EditedMessage({ chats: [targetBotUsername], incoming: true });
    this.client.addEventHandler(this.onNewMessage, this.newMessageFilter);
    this.client.addEventHandler(this.onEditedMessage, this.editFilter);
  }

  private readonly onNewMessage = (event: NewMessageEvent) => {
    this.responses.push(event.message);
  };

  private readonly onEditedMessage = (event: EditedMessageEvent) => {
    this.edits.push(event.message);
  };

  async send(text: string) {
    await this.client.sendMessage(this.targetBotUsername, { message: text });
  }

  // An edit is only awaited after a click on the same message, so edits
  // buffered before that click are stale.
  private adopt(message: Api.Message) {
    return toChannelMessage(this.client, message, () => {
      this.edits.discard((edit) => edit.id === message.id);
    });
  }

  async awaitResponse(timeoutMs: number) {
    const message = await this.responses.next("a response", timeoutMs);
    return this.adopt(message);
  }

  async awaitEdit(messageId: number, timeoutMs: number) {
    const message = await this.edits.next(`an edit of message ${messageId}`, timeoutMs, (edit) => edit.id === messageId);
    return this.adopt(message);
  }

  async close() {
    if (this.closed) return;
    this.closed = true;
    this.client.removeEventHandler(this.onNewMessage, this.newMessageFilter);
    this.client.removeEventHandler(this.onEditedMessage, this.editFilter);
    this.responses.close();
    this.edits.close();
    this.release();
  }
}

/**
 * Conversations with the remote search bot over the user account. Sessions are
 * handed out one at a time in request order.
 */
export class TelegramUserChannel implements ConversationChannel {
  private readonly client: TelegramClient;
  private readonly targetBotUsername: string;
  private readonly log: ActionSink;
  private readonly queue: ConversationQueue;

  constructor({ client, targetBotUsername, log = silentActionSink, queue = new ConversationQueue() }: TelegramUserChannelOptions) {
    this.client = client;
    this.targetBotUsername = targetBotUsername;
    this.log = log;
    this.queue = queue;
  }

  async open(): Promise<ChannelSession> {
    const waiting = this.queue.pendingCount + (this.queue.isHeld ? 1 : 0);
    if (waiting > 0) {
      this.log.logAction({
        kind: "channel_queue",
        content: "conversation_queued",
        metadata: { ahead: waiting, target: this.targetBotUsername }
      });
    }
    const release = await this.queue.acquire(this.targetBotUsername);
    try {
      return new TelegramUserSession(this.client, this.targetBotUsername, release);
    } catch (error) {
      release();
      throw error;
    }
  }
}
