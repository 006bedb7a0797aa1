import { test } from "node:test";
import assert from "node:assert/strict";
import type { BreakSnapshot, BreakStatus } from "../src/types.js";
import { buildBreakStructuredContent, buildInlineCard, buildTimerRows, formatDuration } from "../src/ui/builders.js";

function status(overrides: Partial<BreakSnapshot> = {}, prompt: BreakStatus["prompt"] = null): BreakStatus {
  return {
    snapshot: {
      phase: "working",
      isIdle: false,
      promptVisible: false,
      workRemainingMs: 600_000,
      breakCreditRemainingMs: 240_000,
      postponeRemainingMs: 0,
      breaksTaken: 0,
      ...overrides
    },
    prompt
  };
}

test("formatDuration mirrors minutes and seconds", () => {
  assert.equal(formatDuration(90_000), "1m 30s");
  assert.equal(formatDuration(120_000), "2 minutes");
  assert.equal(formatDuration(60_000), "1 minute");
  assert.equal(formatDuration(1_000), "1 second");
  assert.equal(formatDuration(-50), "0 seconds");
});

test("a visible prompt offers postpone and dismiss", () => {
  const prompt = {
    id: "0b5e3a8e-1d7c-4f8e-9a51-4f1f6a0c2d33",
    title: "Break Time",
    body: "Stretch.",
    shownAt: "2026-01-05T10:00:00Z",
    sequence: 1
  };
  const card = buildInlineCard(status({ phase: "due", promptVisible: true }, prompt));

  assert.equal(card.heading, "Break Time");
  assert.equal(card.badge, "Break due");
  assert.deepEqual(card.actions, [
    { label: "Postpone", action: "postpone", promptId: prompt.id },
    { label: "Dismiss", action: "dismiss", promptId: prompt.id }
  ]);
});

test("idle credit shows up in the card and the timer rows", () => {
  const crediting = status({ phase: "crediting", isIdle: true, workRemainingMs: 90_000, breakCreditRemainingMs: 45_000 });
  const card = buildInlineCard(crediting);
  const rows = buildTimerRows(crediting);

  assert.equal(card.heading, "On a break");
  assert.equal(card.body, "Keep it up, 45 seconds to go.");
  assert.equal(card.badge, "Away");
  assert.deepEqual(
    rows.map(row => [row.id, row.subtitle, row.active]),
    [
      ["work", "Paused with 1m 30s left", false],
      ["break-credit", "45 seconds more idle time needed", true],
      ["postpone", "Not postponed", false]
    ]
  );
});

test("structured content carries the phase and breaks taken", () => {
  const content = buildBreakStructuredContent(status({ phase: "rested", isIdle: true, breaksTaken: 2 }));

  assert.equal(content.phase, "rested");
  assert.equal(content.breaksTaken, 2);
  assert.equal(content.inlineCard.body, "Break complete. A fresh work interval starts when you return.");
  assert.equal(content.inspect.items.length, 3);
});
