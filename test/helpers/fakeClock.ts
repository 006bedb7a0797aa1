import type { Cancel, Clock } from "../../src/timers.js";

interface Scheduled {
  id: number;
  at: number;
  callback: () => void;
}

/** Manual clock: nothing happens until `advance` moves time forward. */
export class FakeClock implements Clock {
  private current = 0;
  private nextId = 0;
  private pending: Scheduled[] = [];

  now(): number {
    return this.current;
  }

  schedule(callback: () => void, delayMs: number): Cancel {
    const entry: Scheduled = { id: this.nextId++, at: this.current + delayMs, callback };
    this.pending.push(entry);
    return () => {
      this.pending = this.pending.filter(candidate => candidate !== entry);
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.pending
        .filter(entry => entry.at <= target)
        .sort((a, b) => a.at - b.at || a.id - b.id)[0];
      if (!due) {
        break;
      }
      this.pending = this.pending.filter(entry => entry !== due);
      this.current = due.at;
      due.callback();
    }
    this.current = target;
  }

  pendingCount(): number {
    return this.pending.length;
  }
}

export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
