import type { Clock } from '../../src/durable/clock';

interface PendingTimer {
  id: number;
  fireAt: number;
  callback: () => void;
}

/**
 * Deterministic clock: `sleep` resolves at once and is recorded, scheduled
 * callbacks only run from `advance`.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;
  private timers: PendingTimer[] = [];
  private nextId = 1;

  constructor(start: Date = new Date('2026-03-02T09:00:00.000Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    return Promise.resolve();
  }

  schedule(ms: number, callback: () => void): () => void {
    const timer: PendingTimer = { id: this.nextId++, fireAt: this.current + ms, callback };
    this.timers.push(timer);
    return () => {
      this.timers = this.timers.filter((pending) => pending.id !== timer.id);
    };
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  advance(ms: number): void {
    const target = this.current + ms;

    for (;;) {
      const due = this.timers
        .filter((timer) => timer.fireAt <= target)
        .sort((a, b) => a.fireAt - b.fireAt || a.id - b.id)[0];
      if (!due) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer.id !== due.id);
      this.current = Math.max(this.current, due.fireAt);
      due.callback();
    }

    this.current = target;
  }
}

/** Lets every pending promise continuation run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
