import { ContractViolationError } from "./errors.js";

export type Cancel = () => void;

/**
 * Monotonic time plus one-shot scheduling. Production code uses
 * `systemClock`; tests drive a fake one explicitly.
 */
export interface Clock {
  now(): number;
  schedule(callback: () => void, delayMs: number): Cancel;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }
};

export interface PausableTimerOptions {
  name: string;
  intervalMs: number;
  onExpire: () => void;
  clock?: Clock;
}

/**
 * Single-shot countdown that can be stopped and later resumed with exactly
 * the time it had left. `remaining()` only changes while the timer is
 * stopped; use `timeLeft()` for a live reading.
 */
export class PausableTimer {
  readonly name: string;
  private readonly intervalMs: number;
  private readonly onExpire: () => void;
  private readonly clock: Clock;
  private remainingMs: number;
  private startedAt: number | null = null;
  private cancelExpiry: Cancel | null = null;

  constructor(options: PausableTimerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new RangeError(`Timer ${options.name} needs a non-negative interval, got ${options.intervalMs}.`);
    }
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.onExpire = options.onExpire;
    this.clock = options.clock ?? systemClock;
    this.remainingMs = options.intervalMs;
  }

  get isRunning(): boolean {
    return this.startedAt !== null;
  }

  interval(): number {
    return this.intervalMs;
  }

  remaining(): number {
    return this.remainingMs;
  }

  timeLeft(): number {
    if (this.startedAt === null) {
      return this.remainingMs;
    }
    return Math.max(this.remainingMs - (this.clock.now() - this.startedAt), 0);
  }

  start(reset = false): void {
    if (this.startedAt !== null) {
      throw new ContractViolationError(`Timer ${this.name} is already running.`);
    }
    if (reset) {
      this.remainingMs = this.intervalMs;
    }
    this.startedAt = this.clock.now();
    this.cancelExpiry = this.clock.schedule(() => this.expire(), this.remainingMs);
  }

  stop(): void {
    if (this.startedAt === null || this.cancelExpiry === null) {
      throw new ContractViolationError(`Timer ${this.name} is not running.`);
    }
    this.cancelExpiry();
    const elapsed = this.clock.now() - this.startedAt;
    this.remainingMs = Math.max(this.remainingMs - elapsed, 0);
    this.startedAt = null;
    this.cancelExpiry = null;
  }

  private expire(): void {
    this.startedAt = null;
    this.cancelExpiry = null;
    this.remainingMs = this.intervalMs;
    this.onExpire();
  }
}
