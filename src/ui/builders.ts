import type { BreakPhase, BreakStatus } from "../types.js";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  actions?: Array<{
    label: string;
    action: "dismiss" | "postpone";
    promptId: string;
  }>;
  accessibilityLabel: string;
}

export interface TimerRow {
  surface: "inspect";
  id: "work" | "break-credit" | "postpone";
  title: string;
  subtitle: string;
  active: boolean;
}

export type BreakStructuredContent = {
  app: string;
  phase: BreakPhase;
  inlineCard: InlineCard;
  inspect: {
    items: TimerRow[];
  };
  breaksTaken: number;
};

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(Math.round(ms / 1000), 0);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0 && seconds > 0) {
    return `${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${seconds} second${seconds === 1 ? "" : "s"}`;
}

export function buildInlineCard(status: BreakStatus): InlineCard {
  const { snapshot, prompt } = status;
  if (prompt) {
    return {
      surface: "inline_card",
      heading: prompt.title,
      body: prompt.body,
      badge: "Break due",
      actions: [
        { label: "Postpone", action: "postpone", promptId: prompt.id },
        { label: "Dismiss", action: "dismiss", promptId: prompt.id }
      ],
      accessibilityLabel: `${prompt.title}. ${prompt.body}`
    };
  }

  const body = phaseCopy(status);
  return {
    surface: "inline_card",
    heading: headingFor(snapshot.phase),
    body,
    badge: snapshot.isIdle ? "Away" : undefined,
    accessibilityLabel: `Break reminder, ${body}`
  };
}

export function buildTimerRows(status: BreakStatus): TimerRow[] {
  const { snapshot } = status;
  return [
    {
      surface: "inspect",
      id: "work",
      title: "Work",
      subtitle: snapshot.phase === "working"
        ? `${formatDuration(snapshot.workRemainingMs)} until the next break`
        : `Paused with ${formatDuration(snapshot.workRemainingMs)} left`,
      active: snapshot.phase === "working"
    },
    {
      surface: "inspect",
      id: "break-credit",
      title: "Break credit",
      subtitle: snapshot.phase === "crediting"
        ? `${formatDuration(snapshot.breakCreditRemainingMs)} more idle time needed`
        : `${formatDuration(snapshot.breakCreditRemainingMs)} of idle time to earn after detection`,
      active: snapshot.phase === "crediting"
    },
    {
      surface: "inspect",
      id: "postpone",
      title: "Postponed",
      subtitle: snapshot.postponeRemainingMs > 0
        ? `Reminder returns in ${formatDuration(snapshot.postponeRemainingMs)}`
        : "Not postponed",
      active: snapshot.postponeRemainingMs > 0
    }
  ];
}

export function buildBreakStructuredContent(status: BreakStatus): BreakStructuredContent {
  return {
    app: "idlebreak",
    phase: status.snapshot.phase,
    inlineCard: buildInlineCard(status),
    inspect: {
      items: buildTimerRows(status)
    },
    breaksTaken: status.snapshot.breaksTaken
  };
}

function headingFor(phase: BreakPhase): string {
  switch (phase) {
    case "working":
      return "Working";
    case "due":
    case "postponed":
      return "Break due";
    case "crediting":
      return "On a break";
    case "rested":
      return "Break taken";
    case "stopped":
      return "Break reminder stopped";
  }
}

function phaseCopy(status: BreakStatus): string {
  const { snapshot } = status;
  switch (snapshot.phase) {
    case "working":
      return `Next break in ${formatDuration(snapshot.workRemainingMs)}.`;
    case "postponed":
      return `Reminder postponed, back in ${formatDuration(snapshot.postponeRemainingMs)}.`;
    case "due":
      return "A break is due. Step away to earn it.";
    case "crediting":
      return `Keep it up, ${formatDuration(snapshot.breakCreditRemainingMs)} to go.`;
    case "rested":
      return "Break complete. A fresh work interval starts when you return.";
    case "stopped":
      return "The scheduler is not running.";
  }
}
