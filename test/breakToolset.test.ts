import { test } from "node:test";
import assert from "node:assert/strict";
import { PromptNotFoundError } from "../src/errors.js";
import { breakInputSchema, runBreakAction } from "../src/server.js";
import { BreakScheduler } from "../src/state/breakScheduler.js";
import { ActivityIdleTracker } from "../src/state/idleTracker.js";
import { PromptBoard } from "../src/state/promptBoard.js";
import { BreakToolset } from "../src/tools/breakTool.js";
import { FakeClock } from "./helpers/fakeClock.js";

function createToolset() {
  const clock = new FakeClock();
  const tracker = new ActivityIdleTracker({ clock });
  const board = new PromptBoard();
  const scheduler = new BreakScheduler({
    durations: { workMs: 10_000, breakMs: 5_000, postponeMs: 3_000, idleThresholdMs: 2_000 },
    idleTracker: tracker,
    presenter: board,
    clock
  });
  scheduler.start();
  const toolset = new BreakToolset({ scheduler, board, activity: tracker, postponeMs: 3_000 });
  return { clock, toolset, scheduler };
}

function workUntilDue(clock: FakeClock, toolset: BreakToolset): string {
  for (let i = 0; i < 6; i += 1) {
    clock.advance(1_500);
    toolset.reportActivity();
  }
  clock.advance(1_000);
  const prompt = toolset.status().prompt;
  assert.ok(prompt, "expected the break prompt after the work interval");
  return prompt.id;
}

test("status starts out working with no prompt", () => {
  const { toolset } = createToolset();
  const status = toolset.status();

  assert.equal(status.snapshot.phase, "working");
  assert.equal(status.prompt, null);
});

test("regular activity keeps the user active until the break is due", async () => {
  const { clock, toolset } = createToolset();
  const promptId = workUntilDue(clock, toolset);

  const result = await toolset.dismissPrompt({ promptId });

  assert.equal(result.message, "Break reminder dismissed. It will be back in 3 seconds.");
  assert.equal(result.status.prompt, null);
  assert.equal(result.status.snapshot.phase, "postponed");
  assert.equal(result.status.snapshot.postponeRemainingMs, 3_000);
});

test("dismissing the prompt counts as activity and ends idle credit", async () => {
  const { clock, toolset } = createToolset();
  const promptId = workUntilDue(clock, toolset);

  clock.advance(1_000);
  assert.equal(toolset.status().snapshot.phase, "crediting");

  const result = await toolset.dismissPrompt({ promptId });
  assert.equal(result.status.snapshot.isIdle, false);
  assert.equal(result.status.snapshot.phase, "postponed");

  clock.advance(1_000);
  const snapshot = toolset.status().snapshot;
  assert.equal(snapshot.phase, "postponed");
  assert.equal(snapshot.breakCreditRemainingMs, 3_000);
  assert.equal(snapshot.breaksTaken, 0);
});

test("reporting activity after a short idle resumes the paused work timer", () => {
  const { clock, toolset } = createToolset();

  clock.advance(2_000);
  assert.equal(toolset.status().snapshot.phase, "crediting");
  clock.advance(1_000);
  const result = toolset.reportActivity();

  assert.equal(result.message, "Activity recorded.");
  assert.equal(result.status.snapshot.phase, "working");
  assert.equal(result.status.snapshot.workRemainingMs, 8_000);
});

test("reporting activity after a full break starts a fresh work interval", () => {
  const { clock, toolset } = createToolset();

  clock.advance(2_000);
  clock.advance(3_000);
  assert.equal(toolset.status().snapshot.phase, "rested");
  assert.equal(toolset.status().snapshot.breaksTaken, 1);

  const result = toolset.reportActivity();
  assert.equal(result.status.snapshot.phase, "working");
  assert.equal(result.status.snapshot.workRemainingMs, 10_000);
});

test("prompt actions validate their input", async () => {
  const { clock, toolset } = createToolset();
  workUntilDue(clock, toolset);

  await assert.rejects(toolset.postponePrompt({ promptId: "not-a-uuid" }), { name: "ZodError" });
  await assert.rejects(
    toolset.postponePrompt({ promptId: "7f0c4c2e-6f55-4b43-9c1a-2f54b2a4f0d1" }),
    PromptNotFoundError
  );
  assert.ok(toolset.status().prompt);
});

test("the MCP action runner reports status and postpones", async () => {
  const { clock, toolset } = createToolset();

  const initial = await runBreakAction(toolset, { action: "status" });
  assert.equal(initial.content[0].text, "Next break in 10 seconds.");
  assert.equal(initial.structuredContent.phase, "working");

  const promptId = workUntilDue(clock, toolset);
  const postponed = await runBreakAction(toolset, { action: "postpone", promptId });

  assert.equal(postponed.content[0].text, "Break postponed for 3 seconds.");
  assert.equal(postponed.structuredContent.inlineCard.heading, "Break due");
  assert.equal(postponed.structuredContent.inlineCard.body, "Reminder postponed, back in 3 seconds.");
});

test("MCP input needs a prompt id to act on the prompt", () => {
  assert.equal(breakInputSchema.safeParse({ action: "dismiss" }).success, false);
  assert.equal(breakInputSchema.safeParse({ action: "activity" }).success, true);
});
