import { describe, it, expect } from "vitest";
import { RateLimiter, TokenBucket } from "../rate-limiter.js";
import { ManualClock } from "./manual-clock.js";
import {
  ModelProviderError,
  ModelRateLimitedError,
  ModelTimeoutError,
  RateLimitExceededError,
} from "../../errors.js";

describe("TokenBucket", () => {
  it("grants immediately while tokens remain", async () => {
    const bucket = new TokenBucket(5, 2, new ManualClock());

    for (let i = 0; i < 5; i++) {
      expect(await bucket.acquire()).toBe(0);
    }
    expect(bucket.currentTokens).toBe(0);
  });

  it("waits (requested - available) / refillRate when empty", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(5, 2, clock);
    for (let i = 0; i < 5; i++) await bucket.acquire();

    const waited = await bucket.acquire();

    expect(waited).toBeCloseTo(0.5);
    expect(clock.sleeps).toEqual([500]);
    expect(bucket.currentTokens).toBe(0);
  });

  it("charges a wait of 1/refillRate for maxTokens + 1 on a full bucket", async () => {
    const bucket = new TokenBucket(10, 4, new ManualClock());

    const waited = await bucket.acquire(11);

    expect(waited).toBeCloseTo(1 / 4);
    expect(bucket.currentTokens).toBe(0);
  });

  it("refills with elapsed time but never above maxTokens", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(3, 1, clock);
    await bucket.acquire(3);

    clock.advance(60_000);
    expect(await bucket.acquire()).toBe(0);
    expect(bucket.currentTokens).toBe(2);
  });

  it("keeps the token count within [0, maxTokens] over a mixed sequence", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(4, 1.5, clock);
    const requests = [1, 3, 2, 4, 1, 1, 5, 2, 1, 3];
    const gaps = [0, 200, 0, 1500, 50, 0, 3000, 10, 700, 0];

    for (let i = 0; i < requests.length; i++) {
      clock.advance(gaps[i]);
      await bucket.acquire(requests[i]);
      expect(bucket.currentTokens).toBeGreaterThanOrEqual(0);
      expect(bucket.currentTokens).toBeLessThanOrEqual(4);
    }
  });

  it("serializes concurrent acquirers", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(1, 1, clock);

    const waits = await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);

    expect(waits).toEqual([0, 1, 1]);
    expect(clock.time).toBe(2000);
    expect(bucket.currentTokens).toBe(0);
  });

  it("ignores a clock that moves backwards", async () => {
    const clock = new ManualClock(10_000);
    const bucket = new TokenBucket(2, 1, clock);
    await bucket.acquire(2);

    clock.time = 5_000;
    const waited = await bucket.acquire();

    expect(waited).toBe(1);
    expect(bucket.currentTokens).toBe(0);
  });

  it("rejects non-positive configuration and requests", async () => {
    expect(() => new TokenBucket(0, 1)).toThrow("maxTokens must be positive");
    expect(() => new TokenBucket(1, 0)).toThrow("refillRate must be positive");
    await expect(new TokenBucket(1, 1).acquire(0)).rejects.toThrow("Token request must be positive");
  });
});

describe("RateLimiter", () => {
  function makeLimiter(clock = new ManualClock()) {
    const limiter = new RateLimiter({ clock, random: () => 0.5, backoffBaseMs: 1000, backoffMaxMs: 60_000 });
    return { limiter, clock };
  }

  it("returns the result and records a success", async () => {
    const { limiter } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 2 });

    await expect(limiter.callWithLimit("api", async () => "ok")).resolves.toBe("ok");

    const m = limiter.getCallMetrics("api").api;
    expect(m.totalCalls).toBe(1);
    expect(m.successfulCalls).toBe(1);
    expect(m.failedCalls).toBe(0);
    expect(m.successRate).toBe(100);
    expect(m.callsLastMinute).toBe(1);
    expect(m.lastCallAt).not.toBeNull();
  });

  it("backs off and retries transient failures", async () => {
    const { limiter, clock } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 3 });
    let calls = 0;

    const result = await limiter.callWithLimit("api", async () => {
      calls++;
      if (calls === 1) throw new ModelRateLimitedError("HTTP 429");
      return "ok";
    });

    expect(result).toBe("ok");
    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([1000]);

    const m = limiter.getCallMetrics("api").api;
    expect(m.totalCalls).toBe(2);
    expect(m.failedCalls).toBe(1);
    expect(m.rateLimitedCalls).toBe(1);
    expect(m.retries).toBe(1);
    expect(m.successRate).toBe(50);
  });

  it("doubles the delay each retry and surfaces RateLimitExceededError when retries run out", async () => {
    const { limiter, clock } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 2 });
    let calls = 0;

    const err = await limiter
      .callWithLimit("api", async () => {
        calls++;
        throw new ModelTimeoutError(100);
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitExceededError);
    expect(err).toMatchObject({ endpoint: "api", attempts: 3 });
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("rethrows permanent errors without retrying", async () => {
    const { limiter, clock } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 3 });
    const failure = new ModelProviderError("bad request", 400);
    let calls = 0;

    await expect(
      limiter.callWithLimit("api", async () => {
        calls++;
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("starts no further attempt once the caller aborts", async () => {
    const { limiter, clock } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 5 });
    const controller = new AbortController();
    const gaveUp = new Error("caller gave up");
    let calls = 0;

    const err = await limiter
      .callWithLimit("api", async () => {
        calls++;
        controller.abort(gaveUp);
        throw new ModelRateLimitedError("HTTP 429");
      }, controller.signal)
      .catch((e: unknown) => e);

    expect(err).toBe(gaveUp);
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([1000]);
    expect(limiter.getCallMetrics("api").api.totalCalls).toBe(1);
  });

  it("makes no attempt on an already aborted signal", async () => {
    const { limiter } = makeLimiter();
    limiter.configureEndpoint("api", { maxTokens: 5, refillRate: 1, maxRetries: 5 });
    const controller = new AbortController();
    const gaveUp = new Error("caller gave up");
    controller.abort(gaveUp);
    let calls = 0;

    await expect(
      limiter.callWithLimit("api", async () => {
        calls++;
        return "ok";
      }, controller.signal),
    ).rejects.toBe(gaveUp);
    expect(calls).toBe(0);
    expect(limiter.getCallMetrics("api").api.totalCalls).toBe(0);
  });

  it("takes a fresh token for every retry", async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter({ clock, random: () => 0.5, backoffBaseMs: 100 });
    limiter.configureEndpoint("api", { maxTokens: 1, refillRate: 1, maxRetries: 1 });
    let calls = 0;

    await limiter.callWithLimit("api", async () => {
      calls++;
      if (calls === 1) throw new Error("socket hang up");
      return "ok";
    });

    // 100ms backoff, then 900ms waiting for the bucket to refill to one token
    expect(clock.sleeps).toHaveLength(2);
    expect(clock.sleeps[0]).toBe(100);
    expect(clock.sleeps[1]).toBeCloseTo(900);
    expect(limiter.getCallMetrics("api").api.totalWaitSeconds).toBeCloseTo(0.9);
  });

  it("computes capped exponential backoff with jitter", () => {
    const low = new RateLimiter({ random: () => 0, backoffBaseMs: 1000, backoffMaxMs: 5000 });
    const mid = new RateLimiter({ random: () => 0.5, backoffBaseMs: 1000, backoffMaxMs: 5000 });

    expect(low.calculateBackoffMs(1)).toBeCloseTo(900);
    expect(mid.calculateBackoffMs(1)).toBeCloseTo(1000);
    expect(mid.calculateBackoffMs(3)).toBeCloseTo(4000);
    expect(mid.calculateBackoffMs(4)).toBeCloseTo(5000);
    expect(low.calculateBackoffMs(10)).toBeCloseTo(4500);
  });

  it("configures unknown endpoints with defaults on first use", async () => {
    const { limiter } = makeLimiter();
    expect(limiter.isConfigured("other")).toBe(false);

    await limiter.acquire("other");

    expect(limiter.isConfigured("other")).toBe(true);
    expect(limiter.getCallMetrics().other.totalCalls).toBe(0);
  });

  it("rejects a negative retry budget", () => {
    const { limiter } = makeLimiter();
    expect(() => limiter.configureEndpoint("api", { maxTokens: 1, refillRate: 1, maxRetries: -1 })).toThrow(
      "maxRetries must be a non-negative integer, got -1",
    );
  });

  it("reports metrics only for endpoints it knows", () => {
    const { limiter } = makeLimiter();
    limiter.configureEndpoint("a", { maxTokens: 1, refillRate: 1, maxRetries: 0 });

    expect(Object.keys(limiter.getCallMetrics())).toEqual(["a"]);
    expect(limiter.getCallMetrics("missing")).toEqual({});
  });
});
