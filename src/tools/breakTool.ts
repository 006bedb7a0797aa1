import { z } from "zod";
import type { BreakScheduler } from "../state/breakScheduler.js";
import type { PromptBoard } from "../state/promptBoard.js";
import type { BreakStatus, BreakUpdateResult } from "../types.js";
import { formatDuration } from "../ui/builders.js";

export const promptActionInput = z.object({
  promptId: z.string().uuid()
});

export interface ActivitySink {
  reportActivity(): void;
}

interface BreakToolsetDeps {
  scheduler: Pick<BreakScheduler, "snapshot">;
  board: PromptBoard;
  activity: ActivitySink;
  postponeMs: number;
}

/**
 * Operations shared by the MCP tool and the REST routes. Each returns the
 * scheduler status as it stands after the operation.
 */
export class BreakToolset {
  private readonly deps: BreakToolsetDeps;

  constructor(deps: BreakToolsetDeps) {
    this.deps = deps;
  }

  status(): BreakStatus {
    return {
      snapshot: this.deps.scheduler.snapshot(),
      prompt: this.deps.board.current()
    };
  }

  reportActivity(): BreakUpdateResult {
    this.deps.activity.reportActivity();
    return {
      status: this.status(),
      message: "Activity recorded."
    };
  }

  async dismissPrompt(input: z.input<typeof promptActionInput>): Promise<BreakUpdateResult> {
    const parsed = promptActionInput.parse(input);
    this.deps.activity.reportActivity();
    this.deps.board.dismiss(parsed.promptId);
    await settle();

    return {
      status: this.status(),
      message: `Break reminder dismissed. It will be back in ${formatDuration(this.deps.postponeMs)}.`
    };
  }

  async postponePrompt(input: z.input<typeof promptActionInput>): Promise<BreakUpdateResult> {
    const parsed = promptActionInput.parse(input);
    this.deps.activity.reportActivity();
    this.deps.board.postpone(parsed.promptId);
    await settle();

    return {
      status: this.status(),
      message: `Break postponed for ${formatDuration(this.deps.postponeMs)}.`
    };
  }
}

/** Lets the board's deferred notifications reach the scheduler before reporting status. */
function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
