/**
 * Client-side throttle for Drive API calls
 */

export interface RateLimitConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
}

/**
 * Sliding-window rate limiter
 */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(private readonly config: RateLimitConfig) {}

  private prune(now: number): void {
    const windowStart = now - this.config.windowMs;
    this.timestamps = this.timestamps.filter(t => t > windowStart);
  }

  /**
   * Wait if necessary to comply with rate limit
   */
  async waitIfNeeded(): Promise<void> {
    const now = Date.now();
    this.prune(now);

    if (this.timestamps.length >= this.config.maxRequestsPerWindow) {
      const waitTime = this.config.windowMs - (now - this.timestamps[0]);

      if (waitTime > 0) {
        console.log(`Drive rate limit reached, waiting ${waitTime}ms`);
        await new Promise(resolve => setTimeout(resolve, waitTime));
        this.prune(Date.now());
      }
    }

    this.timestamps.push(Date.now());
  }
}

/**
 * Drive allows 1000 queries per 100 seconds per user; the default stays at 90%.
 */
export function createDriveLimiter(maxRequestsPer100s: number = 900): RateLimiter {
  return new RateLimiter({
    maxRequestsPerWindow: maxRequestsPer100s,
    windowMs: 100 * 1000,
  });
}
