import type { RateLimitConfig } from "../config/github.js";
import type { Clock } from "./clock.js";

/** Counters exposed for diagnostics and tests. */
export interface RateBudgetStats {
  /** Permits granted since construction. */
  readonly granted: number;
  /** Total time callers spent suspended waiting for a permit. */
  readonly waitedMs: number;
  /** Acquisitions queued behind the current one. */
  readonly pending: number;
}

/**
 * Process-wide permit source bounding the upstream call rate. The budget keeps
 * the timestamps of the grants issued during the last window and hands out a
 * new permit only when fewer than `permits` of them remain, so any window of
 * `windowMs` contains at most `permits` grants.
 *
 * Acquisitions are chained on a single promise: concurrent callers are served
 * strictly in arrival order and only the head of the queue ever sleeps.
 */
export class RateBudget {
  private readonly permits: number;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private readonly grants: number[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private granted = 0;
  private waitedMs = 0;
  private pending = 0;

  constructor(config: RateLimitConfig, clock: Clock) {
    if (!Number.isInteger(config.permits) || config.permits < 1) {
      throw new RangeError(`permits must be a positive integer (received ${config.permits})`);
    }
    if (!(config.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive (received ${config.windowMs})`);
    }
    this.permits = config.permits;
    this.windowMs = config.windowMs;
    this.clock = clock;
  }

  /** Resolves with the grant timestamp once a permit is available. */
  acquire(): Promise<number> {
    this.pending += 1;
    const turn = this.queue.then(() => this.waitForPermit());
    // A failed turn releases the queue; the grant log stays as it was.
    this.queue = turn.catch(() => undefined);
    return turn.finally(() => {
      this.pending -= 1;
    });
  }

  stats(): RateBudgetStats {
    return { granted: this.granted, waitedMs: this.waitedMs, pending: this.pending };
  }

  private async waitForPermit(): Promise<number> {
    for (;;) {
      const now = this.clock.now();
      this.evictExpired(now);
      if (this.grants.length < this.permits) {
        this.grants.push(now);
        this.granted += 1;
        return now;
      }
      const waitMs = this.grants[0] + this.windowMs - now;
      this.waitedMs += waitMs;
      await this.clock.sleep(waitMs);
    }
  }

  private evictExpired(now: number): void {
    while (this.grants.length > 0 && now - this.grants[0] >= this.windowMs) {
      this.grants.shift();
    }
  }
}
