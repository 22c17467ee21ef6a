export interface RateLimiterOptions {
  /**
   * Maximum total cost allowed within the sliding window: a number of frames
   * or tool calls for count limits, a number of bytes for audio.
   * Non-positive values disable the limiter.
   */
  maxTokens: number;
  windowMs: number;
}

export interface RateLimitCheckResult {
  allowed: boolean;
  /**
   * When not allowed, a hint in milliseconds for when the caller may retry.
   */
  retryAfterMs?: number;
  /**
   * True for the first rejection after an allowed event. Callers use it to
   * report an exceeded limit once instead of on every rejected event.
   */
  firstRejection?: boolean;
}

interface WindowEntry {
  at: number;
  cost: number;
}

/**
 * In-memory sliding-window limiter, one instance per session and concern.
 */
export class RateLimiter {
  private readonly maxTokens: number;
  private readonly windowMs: number;
  private entries: WindowEntry[] = [];
  private used = 0;
  private rejecting = false;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.maxTokens;
    this.windowMs = options.windowMs;
  }

  get enabled(): boolean {
    return Number.isFinite(this.maxTokens) && this.maxTokens > 0;
  }

  check(cost = 1, now = Date.now()): RateLimitCheckResult {
    if (!this.enabled || !Number.isFinite(cost) || cost <= 0) {
      return { allowed: true };
    }

    this.evictBefore(now - this.windowMs);

    if (this.used + cost <= this.maxTokens) {
      this.entries.push({ at: now, cost });
      this.used += cost;
      this.rejecting = false;
      return { allowed: true };
    }

    const oldest = this.entries[0];
    const retryAfterMs = oldest ? Math.max(0, oldest.at + this.windowMs - now) : this.windowMs;
    const firstRejection = !this.rejecting;
    this.rejecting = true;
    return { allowed: false, retryAfterMs, firstRejection };
  }

  /**
   * Cost consumed inside the window ending at `now`.
   */
  usage(now = Date.now()): number {
    this.evictBefore(now - this.windowMs);
    return this.used;
  }

  reset(): void {
    this.entries = [];
    this.used = 0;
    this.rejecting = false;
  }

  private evictBefore(cutoff: number): void {
    const firstLive = this.entries.findIndex((entry) => entry.at > cutoff);
    if (firstLive === 0) {
      return;
    }
    const expired = firstLive === -1 ? this.entries : this.entries.slice(0, firstLive);
    for (const entry of expired) {
      this.used -= entry.cost;
    }
    this.entries = firstLive === -1 ? [] : this.entries.slice(firstLive);
    if (this.entries.length === 0) {
      this.used = 0;
    }
  }
}
