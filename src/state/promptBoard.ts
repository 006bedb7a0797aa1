import { EventEmitter } from "events";
import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { PromptNotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../logging.js";
import type { BreakPrompt, CloseReason, ReminderAction, ReminderPresenter, Unsubscribe } from "../types.js";

type PromptEvents = {
  closed: (reason: CloseReason) => void;
  action: (action: ReminderAction) => void;
  change: (prompt: BreakPrompt | null) => void;
};

interface PromptBoardOptions {
  title?: string;
  body?: string;
  logger?: Logger;
}

const DEFAULT_TITLE = "Break Time";
const DEFAULT_BODY = "Step away from the keyboard. The reminder clears itself once you have been idle long enough.";

/**
 * Reminder presenter whose prompt lives in memory and is rendered by whoever
 * polls it over HTTP or MCP. Closed and action notifications are delivered on
 * a microtask, never from inside the call that caused them.
 */
export class PromptBoard implements ReminderPresenter {
  private readonly emitter = new EventEmitter();
  private readonly title: string;
  private readonly body: string;
  private readonly logger: Logger;
  private visible: BreakPrompt | null = null;
  private sequence = 0;

  constructor(options: PromptBoardOptions = {}) {
    this.title = options.title ?? DEFAULT_TITLE;
    this.body = options.body ?? DEFAULT_BODY;
    this.logger = options.logger ?? silentLogger;
  }

  current(): BreakPrompt | null {
    return this.visible;
  }

  show(): void {
    if (this.visible) {
      return;
    }
    this.sequence += 1;
    this.visible = {
      id: uuid(),
      title: this.title,
      body: this.body,
      shownAt: formatISO(new Date()),
      sequence: this.sequence
    };
    this.logger.info(`Showing break prompt #${this.sequence}`);
    this.emitter.emit("change", this.visible);
  }

  close(): void {
    if (!this.visible) {
      return;
    }
    this.finish("programmatic");
  }

  dismiss(promptId: string): BreakPrompt {
    const prompt = this.require(promptId);
    this.finish("dismissed");
    return prompt;
  }

  postpone(promptId: string): BreakPrompt {
    const prompt = this.require(promptId);
    this.finish("action");
    this.deliver(() => this.emitter.emit("action", "postpone"));
    return prompt;
  }

  onClosed(listener: PromptEvents["closed"]): Unsubscribe {
    return this.on("closed", listener);
  }

  onAction(listener: PromptEvents["action"]): Unsubscribe {
    return this.on("action", listener);
  }

  onChange(listener: PromptEvents["change"]): Unsubscribe {
    return this.on("change", listener);
  }

  private on<T extends keyof PromptEvents>(event: T, listener: PromptEvents[T]): Unsubscribe {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  private require(promptId: string): BreakPrompt {
    if (!this.visible || this.visible.id !== promptId) {
      throw new PromptNotFoundError(promptId);
    }
    return this.visible;
  }

  private finish(reason: CloseReason): void {
    this.logger.info(`Closing break prompt #${this.sequence} (${reason})`);
    this.visible = null;
    this.emitter.emit("change", null);
    this.deliver(() => this.emitter.emit("closed", reason));
  }

  private deliver(notify: () => void): void {
    queueMicrotask(notify);
  }
}
