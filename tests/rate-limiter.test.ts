import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimiter } from "../src/utils/rate-limiter.js";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("RateLimiter", () => {
  it("serves a full bucket immediately, then waits for a refill", async () => {
    const limiter = new RateLimiter(2, 1);
    await limiter.acquire();
    await limiter.acquire();

    let done = false;
    const third = limiter.acquire().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await third;
    expect(done).toBe(true);
  });

  it("serves concurrent callers one after another", async () => {
    const limiter = new RateLimiter(1, 1);
    await limiter.acquire();

    const order: string[] = [];
    const a = limiter.acquire().then(() => order.push("a"));
    const b = limiter.acquire().then(() => order.push("b"));

    await vi.advanceTimersByTimeAsync(1000);
    await a;
    expect(order).toEqual(["a"]);
    await vi.advanceTimersByTimeAsync(1000);
    await b;
    expect(order).toEqual(["a", "b"]);
  });

  it("enforces a minimum interval", async () => {
    const limiter = RateLimiter.fromMinInterval(2000);
    await limiter.acquire();

    let done = false;
    const next = limiter.acquire().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await next;
    expect(done).toBe(true);
  });
});
