interface WindowState {
  startMs: number;
  count: number;
}

export interface RateLimitOptions {
  maxPerWindow: number;
  windowMs: number;
  nowMs?: () => number;
}

export class FixedWindowRateLimiter {
  private readonly windows = new Map<string, WindowState>();
  private readonly maxPerWindow: number;
  private readonly windowMs: number;
  private readonly nowMs: () => number;

  constructor(options: RateLimitOptions) {
    this.maxPerWindow = options.maxPerWindow;
    this.windowMs = options.windowMs;
    this.nowMs = options.nowMs ?? Date.now;
  }

  allow(key: string): boolean {
    const now = this.nowMs();
    const existing = this.windows.get(key);
    if (!existing || (now - existing.startMs) >= this.windowMs) {
      this.windows.set(key, { startMs: now, count: 1 });
      return true;
    }

    if (existing.count >= this.maxPerWindow) {
      return false;
    }

    existing.count += 1;
    return true;
  }

  forget(key: string): void {
    this.windows.delete(key);
  }

  get trackedKeys(): number {
    return this.windows.size;
  }
}
