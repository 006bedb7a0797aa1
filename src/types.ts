export type Unsubscribe = () => void;

export type CloseReason = "dismissed" | "programmatic" | "action";

export type ReminderAction = "postpone";

export interface IdleTracker {
  /** Persistent: fires once per idle episode when inactivity reaches `thresholdMs`. */
  watchIdle(thresholdMs: number, onIdleStart: () => void): Unsubscribe;
  /** One-shot: fires with `context` the next time the user is active. */
  watchActive<T>(onIdleEnd: (context: T) => void, context: T): Unsubscribe;
}

export interface ReminderPresenter {
  show(): void;
  close(): void;
  onClosed(listener: (reason: CloseReason) => void): Unsubscribe;
  onAction(listener: (action: ReminderAction) => void): Unsubscribe;
}

export interface BreakDurations {
  workMs: number;
  breakMs: number;
  postponeMs: number;
  idleThresholdMs: number;
}

export type BreakPhase = "stopped" | "working" | "due" | "postponed" | "crediting" | "rested";

export interface BreakSnapshot {
  phase: BreakPhase;
  isIdle: boolean;
  promptVisible: boolean;
  workRemainingMs: number;
  breakCreditRemainingMs: number;
  postponeRemainingMs: number;
  breaksTaken: number;
}

export interface BreakPrompt {
  id: string;
  title: string;
  body: string;
  shownAt: string;
  sequence: number;
}

export interface BreakStatus {
  snapshot: BreakSnapshot;
  prompt: BreakPrompt | null;
}

export interface BreakUpdateResult {
  status: BreakStatus;
  message: string;
}
