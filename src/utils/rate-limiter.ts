export class RateLimiter {
  private tokens: number;
  private last_refill: number;
  private readonly max_tokens: number;
  private readonly refill_rate: number; // tokens per second
  // Acquisitions run one after another so concurrent callers never share a token.
  private queue: Promise<void> = Promise.resolve();

  constructor(max_tokens: number, refill_rate: number) {
    this.max_tokens = max_tokens;
    this.tokens = max_tokens;
    this.refill_rate = refill_rate;
    this.last_refill = Date.now();
  }

  /** One call at a time, at least `interval_ms` apart. */
  static fromMinInterval(interval_ms: number): RateLimiter {
    return new RateLimiter(1, 1000 / Math.max(1, interval_ms));
  }

  acquire(): Promise<void> {
    const next = this.queue.then(() => this.take());
    this.queue = next;
    return next;
  }

  private async take(): Promise<void> {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }
    // Wait until a token is available
    const wait_ms = ((1 - this.tokens) / this.refill_rate) * 1000;
    await new Promise((resolve) => setTimeout(resolve, wait_ms));
    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
  }

  private refill(): void {
    const now = Date.now();
    const elapsed_s = (now - this.last_refill) / 1000;
    this.tokens = Math.min(this.max_tokens, this.tokens + elapsed_s * this.refill_rate);
    this.last_refill = now;
  }
}
