import {
  HttpError,
  RateLimitedError,
  SourceUnavailable,
  isPermanentFailure,
  isRateLimitSignal,
} from "../errors.js";
import type { RateLimiter } from "./rate-limiter.js";

export interface RetrierOptions {
  max_retries?: number;
  base_delay_ms?: number;
  limiter?: RateLimiter;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Wraps every outbound call of one source: throttles through the limiter,
 * backs off exponentially on rate limits and by a fixed delay on other
 * transient failures, and turns the final failure into SourceUnavailable.
 */
export class Retrier {
  readonly source: string;
  private readonly max_retries: number;
  private readonly base_delay_ms: number;
  private readonly limiter?: RateLimiter;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(source: string, options: RetrierOptions = {}) {
    this.source = source;
    this.max_retries = options.max_retries ?? 3;
    this.base_delay_ms = options.base_delay_ms ?? 1000;
    this.limiter = options.limiter;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      if (this.limiter) await this.limiter.acquire();
      try {
        return await fn();
      } catch (err) {
        if (isPermanentFailure(err) || attempt >= this.max_retries) {
          throw new SourceUnavailable(this.source, err);
        }

        const delay = this.delayFor(err, attempt);
        console.error(
          `[${this.source}] attempt ${attempt + 1}/${this.max_retries + 1} failed (${describe(err)}), retrying in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }
  }

  delayFor(err: unknown, attempt: number): number {
    if (!isRateLimitSignal(err)) return this.base_delay_ms;
    const backoff = this.base_delay_ms * 2 ** attempt;
    const hinted =
      err instanceof HttpError || err instanceof RateLimitedError
        ? err.retryAfterMs ?? 0
        : 0;
    return Math.max(backoff, hinted);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
