import { ChannelTimeoutError } from "./types.ts";

type Waiter<T> = {
  predicate: (item: T) => boolean;
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * Buffers pushed items until someone waits for them. Items that arrive before a
 * matching wait are kept, so a reply racing ahead of `next()` is not lost.
 */
export class MessageInbox<T> {
  private readonly buffered: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get bufferedCount() {
    return this.buffered.length;
  }

  push(item: T) {
    if (this.closed) return;
    const waiterIndex = this.waiters.findIndex((waiter) => waiter.predicate(item));
    if (waiterIndex < 0) {
      this.buffered.push(item);
      return;
    }
    const [waiter] = this.waiters.splice(waiterIndex, 1);
    clearTimeout(waiter.timer);
    waiter.resolve(item);
  }

  next(operation: string, timeoutMs: number, predicate: (item: T) => boolean = () => true): Promise<T> {
    const bufferedIndex = this.buffered.findIndex(predicate);
    if (bufferedIndex >= 0) {
      const [item] = this.buffered.splice(bufferedIndex, 1);
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.reject(new Error(`Inbox closed while waiting for ${operation}`));
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        predicate,
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new ChannelTimeoutError(operation, timeoutMs));
        }, Math.max(0, timeoutMs))
      };
      this.waiters.push(waiter);
    });
  }

  // Drops buffered items; pending waits are untouched.
  discard(predicate: (item: T) => boolean) {
    let dropped = 0;
    for (let index = this.buffered.length - 1; index >= 0; index -= 1) {
      if (!predicate(this.buffered[index])) continue;
      this.buffered.splice(index, 1);
      dropped += 1;
    }
    return dropped;
  }

  close() {
    this.closed = true;
    this.buffered.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new Error("Inbox closed"));
    }
  }
}
