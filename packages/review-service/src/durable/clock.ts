/**
 * Time source of the durable runtime. Timers scheduled here are the only
 * way a suspended instance is resumed by time passing.
 */
export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
  /** Runs `callback` once after `ms`; the returned function cancels it. */
  schedule(ms: number, callback: () => void): () => void;
}

// setTimeout overflows past 2^31-1 ms.
const MAX_TIMER_MS = 2_147_483_647;

export const systemClock: Clock = {
  now: () => new Date(),

  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),

  schedule(ms: number, callback: () => void): () => void {
    let handle: NodeJS.Timeout;
    const fireAt = Date.now() + ms;

    const arm = (): void => {
      const remaining = fireAt - Date.now();
      if (remaining > MAX_TIMER_MS) {
        handle = setTimeout(arm, MAX_TIMER_MS);
      } else {
        handle = setTimeout(callback, Math.max(0, remaining));
      }
    };

    arm();
    return () => clearTimeout(handle);
  },
};
