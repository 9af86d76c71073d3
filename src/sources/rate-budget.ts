import type { Logger } from "../logging/logger.js";
import { RateLimitedError } from "../utils/errors.js";

export interface RateBudgetConfig {
  readonly maxRequests: number;
  readonly windowMs: number;
}

/** Sliding-window request budget for one platform account. */
export class RateBudget {
  private timestamps: number[] = [];
  private blockedUntil = 0;

  constructor(
    private readonly config: RateBudgetConfig,
    private readonly now: () => number = Date.now,
  ) {}

  /** Milliseconds to wait before the next request fits the budget; 0 when it fits now. */
  waitTime(): number {
    const now = this.now();
    if (this.blockedUntil > now) return this.blockedUntil - now;

    this.prune(now);
    if (this.timestamps.length < this.config.maxRequests) return 0;

    const oldest = this.timestamps[0] ?? now;
    return Math.max(0, oldest + this.config.windowMs - now);
  }

  hit(): void {
    this.timestamps.push(this.now());
  }

  /** Treat the budget as exhausted until `resetAt` (epoch ms). */
  blockUntil(resetAt: number): void {
    this.blockedUntil = Math.max(this.blockedUntil, resetAt);
  }

  get used(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  private prune(now: number): void {
    const windowStart = now - this.config.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > windowStart);
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RateGateOptions {
  /** Rate-limit responses tolerated for one call before giving up. */
  readonly maxRateLimitRetries?: number;
}

const DEFAULT_MAX_RATE_LIMIT_RETRIES = 5;

/**
 * Runs platform calls within a `RateBudget`, sleeping when the budget is spent
 * and retrying the same call after a rate-limit response.
 */
export class RateGate {
  private readonly maxRateLimitRetries: number;

  constructor(
    private readonly budget: RateBudget,
    private readonly sleepFn: Sleep,
    private readonly log: Logger,
    opts: RateGateOptions = {},
  ) {
    this.maxRateLimitRetries = opts.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES;
  }

  async run<T>(what: string, fn: () => Promise<T>): Promise<T> {
    for (let limited = 0; ; limited++) {
      const wait = this.budget.waitTime();
      if (wait > 0) {
        this.log.info({ call: what, waitMs: wait }, "rate budget exhausted, waiting");
        await this.sleepFn(wait);
      }

      this.budget.hit();
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof RateLimitedError) || limited >= this.maxRateLimitRetries) {
          throw err;
        }
        this.log.warn(
          { call: what, resetAt: new Date(err.resetAt).toISOString() },
          "rate limited by platform",
        );
        this.budget.blockUntil(err.resetAt);
      }
    }
  }
}
