type Waiter = {
  resolve: (release: () => void) => void;
  label: string;
};

/**
 * FIFO lease over the shared user account: one conversation with the remote
 * bot at a time, since its replies cannot be told apart across conversations.
 */
export class ConversationQueue {
  private held = false;
  private holderLabel: string | null = null;
  private readonly waiters: Waiter[] = [];

  get pendingCount() {
    return this.waiters.length;
  }

  get isHeld() {
    return this.held;
  }

  get currentHolder() {
    return this.holderLabel;
  }

  acquire(label = "conversation"): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      this.holderLabel = label;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push({ resolve, label });
    });
  }

  private createRelease() {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (!next) {
        this.held = false;
        this.holderLabel = null;
        return;
      }
      this.holderLabel = next.label;
      next.resolve(this.createRelease());
    };
  }
}
