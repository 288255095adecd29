import { Semaphore } from "./semaphore.js";
import { systemClock, type Clock } from "./clock.js";
import { logger } from "./logger.js";
import {
  RateLimitExceededError,
  describeError,
  isRateLimitError,
  isTransientError,
} from "../errors.js";

const MAX_HISTORY = 100;
const WAIT_LOG_THRESHOLD_SECONDS = 0.1;
const JITTER_RANGE: [number, number] = [0.9, 1.1];

const DEFAULT_ENDPOINT: EndpointConfig = {
  maxTokens: 10,
  refillRate: 1,
  maxRetries: 3,
};

/**
 * Token bucket. Tokens refill continuously at `refillRate` per second up to
 * `maxTokens`; refill and grant happen under one lock so concurrent callers
 * never observe or produce a count outside [0, maxTokens].
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly lock = new Semaphore(1);

  constructor(
    readonly maxTokens: number,
    readonly refillRate: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!(maxTokens > 0)) throw new Error(`maxTokens must be positive, got ${maxTokens}`);
    if (!(refillRate > 0)) throw new Error(`refillRate must be positive, got ${refillRate}`);
    this.tokens = maxTokens;
    this.lastRefill = clock.now();
  }

  /** Token count as of the last refill. */
  get currentTokens(): number {
    return this.tokens;
  }

  /**
   * Takes `tokens` from the bucket, suspending until enough have accrued.
   * Resolves to the number of seconds the caller had to wait.
   */
  acquire(tokens = 1): Promise<number> {
    if (!(tokens > 0)) {
      return Promise.reject(new Error(`Token request must be positive, got ${tokens}`));
    }

    return this.lock.run(async () => {
      this.refill();

      if (this.tokens >= tokens) {
        this.tokens -= tokens;
        return 0;
      }

      const waitSeconds = (tokens - this.tokens) / this.refillRate;
      logger.debug(
        { waitSeconds, deficit: tokens - this.tokens },
        "Token bucket empty, waiting for refill",
      );
      await this.clock.sleep(waitSeconds * 1000);

      this.refill();
      this.tokens = Math.max(0, this.tokens - tokens);
      return waitSeconds;
    });
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      this.tokens = Math.min(this.maxTokens, this.tokens + elapsedSeconds * this.refillRate);
      this.lastRefill = now;
    }
  }
}

export interface EndpointConfig {
  maxTokens: number;
  /** Tokens per second */
  refillRate: number;
  maxRetries: number;
}

export interface RateLimiterOptions {
  clock?: Clock;
  /** Returns a value in [0, 1); drives backoff jitter */
  random?: () => number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
}

interface CallRecord {
  timestamp: number;
  success: boolean;
  rateLimited: boolean;
}

interface EndpointState {
  bucket: TokenBucket;
  maxRetries: number;
  history: CallRecord[];
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rateLimitedCalls: number;
  retries: number;
  totalWaitSeconds: number;
}

export interface EndpointMetrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rateLimitedCalls: number;
  retries: number;
  totalWaitSeconds: number;
  /** Percentage over the recent call history */
  successRate: number;
  callsLastMinute: number;
  lastCallAt: number | null;
}

/**
 * Per-endpoint admission control for outbound model calls: a token bucket
 * per endpoint plus exponential backoff on transient failures. Metrics are
 * for monitoring only and never influence admission.
 */
export class RateLimiter {
  private endpoints = new Map<string, EndpointState>();
  private clock: Clock;
  private random: () => number;
  private backoffBaseMs: number;
  private backoffMaxMs: number;

  constructor(options: RateLimiterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.backoffMaxMs = options.backoffMaxMs ?? 60000;
  }

  configureEndpoint(endpoint: string, config: EndpointConfig): void {
    this.endpoints.set(endpoint, this.createState(config));
    logger.info({ endpoint, ...config }, "Rate limiter configured");
  }

  isConfigured(endpoint: string): boolean {
    return this.endpoints.has(endpoint);
  }

  /** Waits for a token on `endpoint`; resolves to the seconds waited. */
  async acquire(endpoint: string, tokens = 1): Promise<number> {
    const state = this.getState(endpoint);
    const waited = await state.bucket.acquire(tokens);
    state.totalWaitSeconds += waited;
    return waited;
  }

  /**
   * Runs `fn` under the endpoint's admission control. Each attempt takes a
   * token first. Transient failures are retried after an exponential backoff
   * until `maxRetries` is spent, then surface as RateLimitExceededError;
   * permanent failures are rethrown as they are. Once `signal` aborts no
   * further attempt starts and the call rejects with the abort reason.
   */
  async callWithLimit<T>(endpoint: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const state = this.getState(endpoint);
    let attempt = 0;

    for (;;) {
      signal?.throwIfAborted();
      attempt++;
      const waited = await state.bucket.acquire(1);
      state.totalWaitSeconds += waited;
      // The wait for a token can outlast the caller
      signal?.throwIfAborted();
      if (waited > WAIT_LOG_THRESHOLD_SECONDS) {
        logger.info({ endpoint, waitSeconds: Number(waited.toFixed(2)) }, "Rate limited, waited for token");
      }

      try {
        const result = await fn();
        this.recordCall(state, true, false);
        return result;
      } catch (err) {
        this.recordCall(state, false, isRateLimitError(err));

        if (!isTransientError(err)) {
          logger.error({ endpoint, attempt, error: describeError(err) }, "Call failed with permanent error");
          throw err;
        }

        if (attempt > state.maxRetries) {
          logger.error({ endpoint, attempts: attempt, error: describeError(err) }, "Retries exhausted");
          throw new RateLimitExceededError(endpoint, attempt, err);
        }

        const delayMs = this.calculateBackoffMs(attempt);
        state.retries++;
        logger.warn(
          { endpoint, retry: attempt, maxRetries: state.maxRetries, delayMs: Math.round(delayMs), error: describeError(err) },
          "Transient error, backing off before retry",
        );
        await this.clock.sleep(delayMs);
      }
    }
  }

  /** Backoff before retry number `retry` (1-based): base, 2×base, 4×base… capped, with jitter. */
  calculateBackoffMs(retry: number): number {
    const exponential = Math.min(this.backoffBaseMs * 2 ** (retry - 1), this.backoffMaxMs);
    const [low, high] = JITTER_RANGE;
    return exponential * (low + (high - low) * this.random());
  }

  getCallMetrics(endpoint?: string): Record<string, EndpointMetrics> {
    const metrics: Record<string, EndpointMetrics> = {};
    const names = endpoint ? [endpoint] : [...this.endpoints.keys()];
    const minuteAgo = Date.now() - 60_000;

    for (const name of names) {
      const state = this.endpoints.get(name);
      if (!state) continue;

      const recent = state.history;
      const recentSuccesses = recent.filter((c) => c.success).length;
      metrics[name] = {
        totalCalls: state.totalCalls,
        successfulCalls: state.successfulCalls,
        failedCalls: state.failedCalls,
        rateLimitedCalls: state.rateLimitedCalls,
        retries: state.retries,
        totalWaitSeconds: state.totalWaitSeconds,
        successRate: recent.length > 0 ? (recentSuccesses / recent.length) * 100 : 100,
        callsLastMinute: recent.filter((c) => c.timestamp >= minuteAgo).length,
        lastCallAt: recent.length > 0 ? recent[recent.length - 1].timestamp : null,
      };
    }

    return metrics;
  }

  private getState(endpoint: string): EndpointState {
    const existing = this.endpoints.get(endpoint);
    if (existing) return existing;

    logger.warn({ endpoint, ...DEFAULT_ENDPOINT }, "No rate limit configured for endpoint, using defaults");
    const state = this.createState(DEFAULT_ENDPOINT);
    this.endpoints.set(endpoint, state);
    return state;
  }

  private createState(config: EndpointConfig): EndpointState {
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw new Error(`maxRetries must be a non-negative integer, got ${config.maxRetries}`);
    }
    return {
      bucket: new TokenBucket(config.maxTokens, config.refillRate, this.clock),
      maxRetries: config.maxRetries,
      history: [],
      totalCalls: 0,
      successfulCalls: 0,
      failedCalls: 0,
      rateLimitedCalls: 0,
      retries: 0,
      totalWaitSeconds: 0,
    };
  }

  private recordCall(state: EndpointState, success: boolean, rateLimited: boolean): void {
    state.totalCalls++;
    if (success) state.successfulCalls++;
    else state.failedCalls++;
    if (rateLimited) state.rateLimitedCalls++;

    state.history.push({ timestamp: Date.now(), success, rateLimited });
    if (state.history.length > MAX_HISTORY) {
      state.history.shift();
    }
  }
}
