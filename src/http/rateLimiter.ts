import { sleep } from "../utils/time";

export interface Clock {
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = { sleep };

export class RateLimiter {
  readonly intervalMs: number;
  private readonly clock: Clock;

  constructor(intervalMs: number, clock: Clock = systemClock) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new Error(`Rate limiter interval must be a non-negative number, got ${intervalMs}`);
    }
    this.intervalMs = intervalMs;
    this.clock = clock;
  }

  async afterRequest(): Promise<void> {
    if (this.intervalMs > 0) {
      await this.clock.sleep(this.intervalMs);
    }
  }
}
