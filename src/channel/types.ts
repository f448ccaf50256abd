export type ChannelControl = {
  text: string;
  click(): Promise<void>;
};

export type ChannelMessage = {
  id: number;
  text: string;
  controls: ChannelControl[][];
  hasArtifact: boolean;
  forwardTo(recipientId: string): Promise<void>;
};

/**
 * One conversation with the remote search bot. Every await takes an explicit
 * timeout and rejects with {@link ChannelTimeoutError} when it elapses.
 */
export interface ChannelSession {
  send(text: string): Promise<void>;
  awaitResponse(timeoutMs: number): Promise<ChannelMessage>;
  // The remote pager edits the message in place instead of sending a new one.
  awaitEdit(messageId: number, timeoutMs: number): Promise<ChannelMessage>;
  close(): Promise<void>;
}

export interface ConversationChannel {
  open(): Promise<ChannelSession>;
}

export class ChannelTimeoutError extends Error {
  readonly waitedMs: number;

  constructor(operation: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for ${operation}`);
    this.name = "ChannelTimeoutError";
    this.waitedMs = waitedMs;
  }
}

export function isChannelTimeout(error: unknown): error is ChannelTimeoutError {
  return error instanceof ChannelTimeoutError;
}

export async function withSession<T>(channel: ConversationChannel, run: (session: ChannelSession) => Promise<T>) {
  const session = await channel.open();
  try {
    return await run(session);
  } finally {
    await session.close();
  }
}
