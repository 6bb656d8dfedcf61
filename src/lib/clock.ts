import { setTimeout as delay } from "node:timers/promises";

/**
 * Monotonic time source plus a way to wait. The frame loop only reads time
 * through this, so tests can drive it with a synthetic clock.
 */
export interface Clock {
  /** Milliseconds from an arbitrary, fixed origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};
