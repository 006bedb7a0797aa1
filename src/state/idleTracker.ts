import { systemClock, type Cancel, type Clock } from "../timers.js";
import type { IdleTracker, Unsubscribe } from "../types.js";
import { silentLogger, type Logger } from "../logging.js";

interface IdleWatch {
  thresholdMs: number;
  onIdleStart: () => void;
  cancel: Cancel | null;
}

interface ActiveWatch {
  fire: () => void;
}

interface ActivityIdleTrackerOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Idle detection fed by activity reports from outside the process (shell
 * hooks, editor plugins, a browser extension). No report for a watch's
 * threshold is an idle start; the next report after it ends the episode.
 */
export class ActivityIdleTracker implements IdleTracker {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly idleWatches = new Set<IdleWatch>();
  private activeWatches: ActiveWatch[] = [];
  private lastActivityAt: number;

  constructor(options: ActivityIdleTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.lastActivityAt = this.clock.now();
  }

  idleForMs(): number {
    return Math.max(this.clock.now() - this.lastActivityAt, 0);
  }

  reportActivity(): void {
    this.lastActivityAt = this.clock.now();

    const pending = this.activeWatches;
    this.activeWatches = [];
    if (pending.length > 0) {
      this.logger.debug(`Activity resumed, notifying ${pending.length} watcher(s)`);
    }
    for (const watch of pending) {
      watch.fire();
    }

    for (const watch of this.idleWatches) {
      this.arm(watch);
    }
  }

  watchIdle(thresholdMs: number, onIdleStart: () => void): Unsubscribe {
    if (!Number.isFinite(thresholdMs) || thresholdMs < 0) {
      throw new RangeError(`Idle threshold must be a non-negative number, got ${thresholdMs}.`);
    }
    const watch: IdleWatch = { thresholdMs, onIdleStart, cancel: null };
    this.idleWatches.add(watch);
    this.arm(watch);

    return () => {
      watch.cancel?.();
      watch.cancel = null;
      this.idleWatches.delete(watch);
    };
  }

  watchActive<T>(onIdleEnd: (context: T) => void, context: T): Unsubscribe {
    const watch: ActiveWatch = { fire: () => onIdleEnd(context) };
    this.activeWatches.push(watch);

    return () => {
      this.activeWatches = this.activeWatches.filter(candidate => candidate !== watch);
    };
  }

  dispose(): void {
    for (const watch of this.idleWatches) {
      watch.cancel?.();
      watch.cancel = null;
    }
    this.idleWatches.clear();
    this.activeWatches = [];
  }

  private arm(watch: IdleWatch): void {
    watch.cancel?.();
    const delay = Math.max(watch.thresholdMs - this.idleForMs(), 0);
    watch.cancel = this.clock.schedule(() => {
      watch.cancel = null;
      this.logger.debug(`No activity for ${Math.round(this.idleForMs())}ms, user is idle`);
      watch.onIdleStart();
    }, delay);
  }
}
