/**
 * Per-scope hourly message budget. Each scope (a group, or one user's
 * private chat) gets a fixed window aligned to the wall-clock hour; the
 * window rolls over lazily on the first check after the boundary.
 */
import type { ChannelType } from "../config/types.js";
import { normalizeId } from "../config/types.js";
import { MutationGate } from "../infra/mutation-gate.js";
import { logDebug } from "../logger.js";

export const HOUR_MS = 3_600_000;

type RateLimitWindow = {
  bucket: number;
  count: number;
};

export type RateDecision = {
  allowed: boolean;
  /** Messages left in the current window after this one; `Infinity` when unlimited. */
  remaining: number;
  /** Epoch ms at which the current window ends. */
  resetAt: number;
};

export function hourBucket(nowMs: number): number {
  return Math.floor(nowMs / HOUR_MS);
}

export function rateScopeKey(channelType: ChannelType, id: string | number): string {
  return `${channelType}:${normalizeId(id)}`;
}

export class RateLimiter {
  private readonly windows = new Map<string, RateLimitWindow>();
  private readonly gate = new MutationGate("rate");
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Count one message against `scopeKey`. Only admitted messages are
   * counted; `limitPerHour <= 0` admits everything without counting.
   */
  check(scopeKey: string, limitPerHour: number): RateDecision {
    const nowMs = this.now();
    const bucket = hourBucket(nowMs);
    const resetAt = (bucket + 1) * HOUR_MS;
    if (limitPerHour <= 0) {
      return { allowed: true, remaining: Number.POSITIVE_INFINITY, resetAt };
    }
    // A fractional limit admits ceil(limit) messages per window.
    const capacity = Math.ceil(limitPerHour);

    return this.gate.run(scopeKey, () => {
      let window = this.windows.get(scopeKey);
      if (!window || window.bucket !== bucket) {
        window = { bucket, count: 0 };
        this.windows.set(scopeKey, window);
      }
      if (window.count >= limitPerHour) {
        logDebug(`Rate limit reached for ${scopeKey}: ${window.count}/${limitPerHour}`);
        return { allowed: false, remaining: 0, resetAt };
      }
      window.count += 1;
      return { allowed: true, remaining: capacity - window.count, resetAt };
    });
  }

  /** Messages counted in the current window, without counting a new one. */
  peek(scopeKey: string): number {
    const window = this.windows.get(scopeKey);
    return window && window.bucket === hourBucket(this.now()) ? window.count : 0;
  }

  /** Forget every window (the admin "reset counts" command). */
  reset(): void {
    this.gate.run("reset", () => this.windows.clear());
  }

  get size(): number {
    return this.windows.size;
  }
}
