import bigInt from "big-integer";
import { Api, type TelegramClient } from "telegram";
import type { CallbackQueryEvent } from "telegram/events/CallbackQuery";
import type { NewMessageEvent } from "telegram/events/NewMessage";
import { Button } from "telegram/tl/custom/button";
import type {
  ControlRenderer,
  IncomingQuery,
  MenuContext,
  MenuRow,
  SelectionAction,
  StatusHandle
} from "../bot/types.ts";
import { sanitizeBotText } from "../utils.ts";

function peerOf(chatId: string) {
  return bigInt(chatId);
}

export function peerIdToString(peer: Api.TypePeer) {
  if (peer instanceof Api.PeerUser) return peer.userId.toString();
  if (peer instanceof Api.PeerChat) return `-${peer.chatId.toString()}`;
  return `-100${peer.channelId.toString()}`;
}

export class TelegramControlRenderer implements ControlRenderer {
  private readonly client: TelegramClient;

  constructor(client: TelegramClient) {
    this.client = client;
  }

  async sendStatus(chatId: string, text: string, replyToMessageId?: number) {
    const sent = await this.client.sendMessage(peerOf(chatId), {
      message: sanitizeBotText(text),
      replyTo: replyToMessageId
    });
    return this.statusFor(chatId, sent.id);
  }

  async sendMenu(chatId: string, prompt: string, rows: MenuRow[], replyToMessageId?: number) {
    await this.client.sendMessage(peerOf(chatId), {
      message: sanitizeBotText(prompt),
      replyTo: replyToMessageId,
      buttons: rows.map((row) => [Button.inline(row.label, Buffer.from(row.token, "utf8"))])
    });
  }

  statusFor(chatId: string, messageId: number): StatusHandle {
    const client = this.client;
    return {
      messageId,
      async edit(text: string) {
        await client.editMessage(peerOf(chatId), { message: messageId, text: sanitizeBotText(text) });
      },
      async remove() {
        await client.deleteMessages(peerOf(chatId), [messageId], { revoke: true });
      }
    };
  }
}

export async function toIncomingQuery(event: NewMessageEvent): Promise<IncomingQuery> {
  const message = event.message;
  const sender = await message.getSender();
  return {
    chatId: peerIdToString(message.peerId),
    messageId: message.id,
    senderId: message.senderId ? message.senderId.toString() : null,
    text: message.message ?? "",
    isPrivate: message.peerId instanceof Api.PeerUser,
    isForwarded: Boolean(message.fwdFrom),
    hasMedia: Boolean(message.media),
    viaBot: Boolean(message.viaBotId),
    senderIsBot: sender instanceof Api.User && Boolean(sender.bot),
    isReply: Boolean(message.replyTo)
  };
}

function replyToMessageId(message: Api.Message) {
  return message.replyTo instanceof Api.MessageReplyHeader ? message.replyTo.replyToMsgId : undefined;
}

async function fetchMessage(client: TelegramClient, chatId: string, messageId: number) {
  const [message] = await client.getMessages(peerOf(chatId), { ids: [messageId] });
  return message instanceof Api.Message ? message : null;
}

export function toSelectionAction(client: TelegramClient, event: CallbackQueryEvent): SelectionAction {
  const query = event.query;
  const data = query.data ? Buffer.from(query.data).toString("utf8") : "";
  const peer = query instanceof Api.UpdateBotCallbackQuery ? query.peer : null;
  const chatId = peer ? peerIdToString(peer) : "";
  const menuMessageId = query instanceof Api.UpdateBotCallbackQuery ? query.msgId : 0;

  return {
    data,
    isPrivate: peer instanceof Api.PeerUser,
    chatId,
    requesterId: query.userId.toString(),
    menuMessageId,
    async ack(options = {}) {
      await event.answer({ message: options.text, alert: options.alert });
    },
    async loadMenuContext(): Promise<MenuContext> {
      if (!chatId || !menuMessageId) return { label: null, originalQuery: null };
      const menu = await fetchMessage(client, chatId, menuMessageId);
      if (!menu) return { label: null, originalQuery: null };

      const chosen = (menu.buttons ?? [])
        .flat()
        .find((button) => (button.data ? Buffer.from(button.data).toString("utf8") : "") === data);
      const originalId = replyToMessageId(menu);
      const original = originalId ? await fetchMessage(client, chatId, originalId) : null;

      return {
        label: chosen?.text ?? null,
        originalQuery: original?.message?.trim() || null
      };
    }
  };
}
