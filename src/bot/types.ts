export type MenuRow = {
  label: string;
  token: string;
};

export interface StatusHandle {
  readonly messageId: number;
  edit(text: string): Promise<void>;
  remove(): Promise<void>;
}

/**
 * Outbound surface of the UI bot. Labels and tokens arrive already bounded;
 * the renderer only decides how buttons are laid out.
 */
export interface ControlRenderer {
  sendStatus(chatId: string, text: string, replyToMessageId?: number): Promise<StatusHandle>;
  sendMenu(chatId: string, prompt: string, rows: MenuRow[], replyToMessageId?: number): Promise<void>;
  statusFor(chatId: string, messageId: number): StatusHandle;
}

export type IncomingQuery = {
  chatId: string;
  messageId: number;
  senderId: string | null;
  text: string;
  isPrivate: boolean;
  isForwarded: boolean;
  hasMedia: boolean;
  viaBot: boolean;
  senderIsBot: boolean;
  isReply: boolean;
};

export type MenuContext = {
  label: string | null;
  originalQuery: string | null;
};

export interface SelectionAction {
  readonly data: string;
  readonly isPrivate: boolean;
  readonly chatId: string;
  readonly requesterId: string;
  readonly menuMessageId: number;
  ack(options?: { text?: string; alert?: boolean }): Promise<void>;
  loadMenuContext(): Promise<MenuContext>;
}
