import { nowIso } from "./utils.ts";

const RECENT_ACTION_LIMIT = 200;

export type RuntimeAction = {
  kind: string;
  content: string;
  createdAt?: string;
  chatId?: string | number | null;
  messageId?: string | number | null;
  userId?: string | number | null;
  metadata?: Record<string, unknown>;
};

export type ActionListener = (action: RuntimeAction) => void;

export interface ActionSink {
  logAction(action: RuntimeAction): void;
}

/**
 * In-memory action journal. Listeners see every action as it is logged; only
 * the most recent actions are retained.
 */
export class ActionLog implements ActionSink {
  onActionLogged: ActionListener | null = null;
  private readonly recentActions: RuntimeAction[] = [];

  logAction(action: RuntimeAction) {
    const stamped: RuntimeAction = { ...action, createdAt: action.createdAt || nowIso() };
    this.recentActions.push(stamped);
    if (this.recentActions.length > RECENT_ACTION_LIMIT) {
      this.recentActions.splice(0, this.recentActions.length - RECENT_ACTION_LIMIT);
    }
    this.onActionLogged?.(stamped);
  }

  recent(limit = RECENT_ACTION_LIMIT) {
    return this.recentActions.slice(-Math.max(0, limit));
  }
}

export const silentActionSink: ActionSink = {
  logAction() {}
};
