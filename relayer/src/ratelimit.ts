import { sleep } from "./time.js";

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per second

  constructor(maxTokens: number, refillRate: number) {
    this.tokens = maxTokens;
    this.maxTokens = maxTokens;
    this.refillRate = refillRate;
    this.lastRefill = Date.now();
  }

  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      const waitMs = ((1 - this.tokens) / this.refillRate) * 1000;
      await sleep(waitMs);
      this.refill();
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(
      this.maxTokens,
      this.tokens + elapsed * this.refillRate,
    );
    this.lastRefill = now;
  }
}

/** One bucket per chain so a busy chain does not starve the other. */
export class ChainRateLimiter {
  private readonly buckets = new Map<number, TokenBucket>();

  constructor(private readonly requestsPerSecond: number) {}

  acquire(chainId: number): Promise<void> {
    let bucket = this.buckets.get(chainId);
    if (!bucket) {
      bucket = new TokenBucket(this.requestsPerSecond, this.requestsPerSecond);
      this.buckets.set(chainId, bucket);
    }
    return bucket.acquire();
  }
}
