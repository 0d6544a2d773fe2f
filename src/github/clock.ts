import { runtimeSetTimeout } from "../runtime/timers.js";

/**
 * Time source injected into the rate budget, the retry loop and the
 * comparison aggregator. Tests substitute a manual clock so backoff delays and
 * permit waits are observable without sleeping.
 */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
  /** Suspends the caller for {@link ms} milliseconds. */
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise<void>((resolve) => {
      runtimeSetTimeout(resolve, Math.max(0, ms));
    }),
};
