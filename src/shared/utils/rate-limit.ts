export interface RateLimiter {
  allow(key: string): boolean;
}

export interface SlidingWindowOptions {
  enabled: boolean;
  maxRequests: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Per-key sliding window shared by every session in the process.
 * Each check runs to completion synchronously, so interleaved async turns
 * cannot observe a half-updated window.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: SlidingWindowOptions) {
    this.now = options.now ?? Date.now;
  }

  allow(key: string): boolean {
    if (!this.options.enabled) {
      return true;
    }

    const now = this.now();
    const current = this.windows.get(key) ?? [];
    const filtered = current.filter((timestamp) => now - timestamp < this.options.windowMs);

    if (filtered.length >= this.options.maxRequests) {
      this.windows.set(key, filtered);
      return false;
    }

    filtered.push(now);
    this.windows.set(key, filtered);
    return true;
  }
}
