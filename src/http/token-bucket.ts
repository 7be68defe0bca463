/**
 * Token bucket used to pace outbound calls per tenant
 */

import { CancelledError } from "../services/sync/errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TokenBucketOptions {
  capacity: number;
  refillPerSec: number;
  now?: () => number;
  sleep: Sleep;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;

  constructor(private readonly options: TokenBucketOptions) {
    this.now = options.now ?? Date.now;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Wait until a token is available and consume it.
   *
   * Waiters re-check after sleeping, so concurrent callers never push the
   * rate above `refillPerSec` once the initial burst is spent.
   */
  async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted === true) {
        throw new CancelledError();
      }
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil(
        ((1 - this.tokens) / this.options.refillPerSec) * 1000
      );
      try {
        await this.options.sleep(waitMs, signal);
      } catch (error) {
        if (signal?.aborted === true) {
          throw new CancelledError();
        }
        throw error;
      }
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSec = (now - this.lastRefill) / 1000;
    if (elapsedSec > 0) {
      this.tokens = Math.min(
        this.options.capacity,
        this.tokens + elapsedSec * this.options.refillPerSec
      );
      this.lastRefill = now;
    }
  }
}
