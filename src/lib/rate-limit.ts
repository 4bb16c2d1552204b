export interface RateLimiter {
  isAllowed(identifier: string): boolean;
}

export interface FixedWindowOptions {
  maxRequests: number;
  windowSeconds: number;
  /** Milliseconds since epoch; defaults to Date.now. */
  now?: () => number;
}

interface Window {
  startedAt: number;
  count: number;
}

/**
 * In-process fixed-window counter per identifier (client IP). A window
 * opens on the first request and admits `maxRequests` until it expires.
 */
export class FixedWindowRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, Window>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: FixedWindowOptions) {
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  isAllowed(identifier: string): boolean {
    const now = this.now();
    this.prune(now);

    const current = this.windows.get(identifier);
    if (!current || now - current.startedAt >= this.windowMs) {
      this.windows.set(identifier, { startedAt: now, count: 1 });
      return this.maxRequests > 0;
    }

    if (current.count >= this.maxRequests) return false;
    current.count += 1;
    return true;
  }

  private prune(now: number): void {
    for (const [id, window] of this.windows) {
      if (now - window.startedAt >= this.windowMs) this.windows.delete(id);
    }
  }
}
