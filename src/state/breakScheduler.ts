import { ContractViolationError, fail, ok, toError, type HandlerResult } from "../errors.js";
import { silentLogger, type Logger } from "../logging.js";
import { PausableTimer, systemClock, type Clock } from "../timers.js";
import type {
  BreakDurations,
  BreakPhase,
  BreakSnapshot,
  CloseReason,
  IdleTracker,
  ReminderAction,
  ReminderPresenter,
  Unsubscribe
} from "../types.js";

export type SchedulerEvent =
  | "start"
  | "work-expired"
  | "idle-start"
  | "idle-end"
  | "break-expired"
  | "prompt-closed"
  | "prompt-action"
  | "postpone-expired";

interface IdleContext {
  wasWorking: boolean;
  idleSince: number;
}

export interface BreakSchedulerOptions {
  durations: BreakDurations;
  idleTracker: IdleTracker;
  presenter: ReminderPresenter;
  clock?: Clock;
  logger?: Logger;
  onFatal?: (error: Error, event: SchedulerEvent) => void;
}

function rethrow(error: Error): never {
  throw error;
}

/**
 * Decides when a break is due and when idle time pays it off.
 *
 * The work timer counts active time only: it is stopped while the user is
 * idle and resumed with whatever it had left. Each idle episode runs the
 * break-credit timer, whose interval is the break length minus the idle
 * detection threshold because that much idle time has already passed by the
 * time the tracker reports it. A due break keeps coming back through the
 * postpone timer until an idle episode earns the full credit.
 */
export class BreakScheduler {
  private readonly durations: BreakDurations;
  private readonly idleTracker: IdleTracker;
  private readonly presenter: ReminderPresenter;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onFatal: (error: Error, event: SchedulerEvent) => void;
  private readonly workTimer: PausableTimer;
  private readonly breakTimer: PausableTimer;
  private readonly postponeTimer: PausableTimer;
  private subscriptions: Unsubscribe[] = [];
  private activeWatch: Unsubscribe | null = null;
  private started = false;
  private isIdle = false;
  private promptVisible = false;
  private breaksTaken = 0;

  constructor(options: BreakSchedulerOptions) {
    this.durations = options.durations;
    this.idleTracker = options.idleTracker;
    this.presenter = options.presenter;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.onFatal = options.onFatal ?? rethrow;

    const { workMs, breakMs, postponeMs, idleThresholdMs } = options.durations;
    this.workTimer = new PausableTimer({
      name: "work",
      intervalMs: workMs,
      clock: this.clock,
      onExpire: () => this.dispatch("work-expired", () => this.handleWorkExpired())
    });
    this.breakTimer = new PausableTimer({
      name: "break-credit",
      intervalMs: Math.max(breakMs - idleThresholdMs, 0),
      clock: this.clock,
      onExpire: () => this.dispatch("break-expired", () => this.handleBreakExpired())
    });
    this.postponeTimer = new PausableTimer({
      name: "postpone",
      intervalMs: postponeMs,
      clock: this.clock,
      onExpire: () => this.dispatch("postpone-expired", () => this.handlePostponeExpired())
    });
  }

  start(): void {
    this.dispatch("start", () => {
      if (this.started) {
        return fail(new ContractViolationError("Break scheduler is already started."));
      }
      this.started = true;
      this.isIdle = false;
      this.workTimer.start(true);
      this.subscriptions = [
        this.idleTracker.watchIdle(this.durations.idleThresholdMs, () =>
          this.dispatch("idle-start", () => this.handleIdleStart())
        ),
        this.presenter.onClosed(reason => this.dispatch("prompt-closed", () => this.handlePromptClosed(reason))),
        this.presenter.onAction(action => this.dispatch("prompt-action", () => this.handleAction(action)))
      ];
      this.logger.info(`Break scheduler started, next break in ${Math.round(this.durations.workMs / 1000)}s`);
      return ok;
    });
  }

  /** Stops every timer, detaches from collaborators and hides the prompt. */
  stop(): void {
    if (!this.started) {
      return;
    }
    for (const timer of [this.workTimer, this.breakTimer, this.postponeTimer]) {
      if (timer.isRunning) {
        timer.stop();
      }
    }
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
    this.activeWatch?.();
    this.activeWatch = null;
    this.closePrompt();
    this.started = false;
    this.isIdle = false;
    this.logger.info("Break scheduler stopped");
  }

  snapshot(): BreakSnapshot {
    return {
      phase: this.phase(),
      isIdle: this.isIdle,
      promptVisible: this.promptVisible,
      workRemainingMs: Math.round(this.workTimer.timeLeft()),
      breakCreditRemainingMs: this.breakTimer.isRunning ? Math.round(this.breakTimer.timeLeft()) : this.breakTimer.interval(),
      postponeRemainingMs: this.postponeTimer.isRunning ? Math.round(this.postponeTimer.timeLeft()) : 0,
      breaksTaken: this.breaksTaken
    };
  }

  private phase(): BreakPhase {
    if (!this.started) {
      return "stopped";
    }
    if (this.isIdle) {
      return this.breakTimer.isRunning ? "crediting" : "rested";
    }
    if (this.workTimer.isRunning) {
      return "working";
    }
    return this.postponeTimer.isRunning ? "postponed" : "due";
  }

  private handleWorkExpired(): HandlerResult {
    this.logger.info("Work interval elapsed, break is due");
    this.showPrompt();
    return ok;
  }

  private handleIdleStart(): HandlerResult {
    if (this.isIdle) {
      return fail(new ContractViolationError("Idle start received while already idle."));
    }
    const wasWorking = this.workTimer.isRunning;
    if (wasWorking) {
      this.workTimer.stop();
      this.logger.debug(`Pausing work timer with ${Math.round(this.workTimer.remaining() / 1000)}s left`);
    }
    this.breakTimer.start(true);
    this.isIdle = true;
    this.logger.info("Idle start");

    const context: IdleContext = { wasWorking, idleSince: this.clock.now() };
    this.activeWatch = this.idleTracker.watchActive<IdleContext>(
      idle => this.dispatch("idle-end", () => this.handleIdleEnd(idle)),
      context
    );
    return ok;
  }

  private handleIdleEnd(context: IdleContext): HandlerResult {
    this.activeWatch = null;
    this.isIdle = false;
    const awaySeconds = Math.round((this.clock.now() - context.idleSince + this.durations.idleThresholdMs) / 1000);
    this.logger.info(`Idle end after about ${awaySeconds}s away`);

    if (this.breakTimer.isRunning) {
      this.breakTimer.stop();
      this.logger.debug(`Break credit short by ${Math.round(this.breakTimer.remaining() / 1000)}s`);
      if (context.wasWorking) {
        this.workTimer.start(false);
        this.logger.debug(`Resuming work timer with ${Math.round(this.workTimer.remaining() / 1000)}s left`);
      }
      return ok;
    }

    this.workTimer.start(true);
    this.logger.info("Starting a fresh work interval");
    return ok;
  }

  private handleBreakExpired(): HandlerResult {
    this.breaksTaken += 1;
    this.logger.info("Break credit earned");
    this.closePrompt();
    if (this.postponeTimer.isRunning) {
      this.postponeTimer.stop();
    }
    return ok;
  }

  private handlePromptClosed(reason: CloseReason): HandlerResult {
    // closePrompt already cleared the flag; a late notice must not hide a newer prompt.
    if (reason === "programmatic") {
      return ok;
    }
    this.promptVisible = false;
    if (reason !== "dismissed") {
      this.logger.debug(`Prompt closed (${reason}), not postponing`);
      return ok;
    }
    return this.postpone();
  }

  private handleAction(action: ReminderAction): HandlerResult {
    switch (action) {
      case "postpone":
        return this.postpone();
    }
  }

  private handlePostponeExpired(): HandlerResult {
    this.logger.info("Postponement over, showing the break prompt again");
    this.showPrompt();
    return ok;
  }

  private postpone(): HandlerResult {
    this.closePrompt();
    this.postponeTimer.start(true);
    this.logger.info(`Break postponed for ${Math.round(this.durations.postponeMs / 1000)}s`);
    return ok;
  }

  private showPrompt(): void {
    if (this.promptVisible) {
      return;
    }
    this.promptVisible = true;
    this.presenter.show();
  }

  private closePrompt(): void {
    if (!this.promptVisible) {
      return;
    }
    this.promptVisible = false;
    this.presenter.close();
  }

  private dispatch(event: SchedulerEvent, handler: () => HandlerResult): void {
    let result: HandlerResult;
    try {
      result = handler();
    } catch (error) {
      result = { ok: false, error: toError(error) };
    }
    if (!result.ok) {
      this.logger.error(`Handler for ${event} failed`, result.error, this.snapshot());
      this.onFatal(result.error, event);
    }
  }
}
