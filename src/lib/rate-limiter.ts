/**
 * Token-bucket rate limiter for archive API calls.
 *
 * Default capacity: 6 tokens, refill rate: 6 tokens/second.
 * Also handles 429 responses with exponential backoff + jitter.
 * One instance per client; nothing is shared between clients.
 */

import { sleep } from "./retry";

export interface RateLimiterOptions {
  capacity?: number;
  refillPerSecond?: number;
  maxRetries?: number; // 429 retries before the response is handed back
  random?: () => number;
  now?: () => number;
}

const DEFAULT_BACKOFF_MS = 2000;
const MAX_BACKOFF_MS = 60_000;
const JITTER_MS = 500;

export class RateLimiter {
  private readonly capacity: number;
  private readonly refillIntervalMs: number;
  private readonly maxRetries: number;
  private readonly random: () => number;
  private readonly now: () => number;

  private tokens: number;
  private lastRefillTime: number;
  private backoffUntil = 0; // if > now, we are in backoff

  constructor(options: RateLimiterOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 6);
    this.refillIntervalMs = 1000 / Math.max(1, options.refillPerSecond ?? 6);
    this.maxRetries = Math.max(1, options.maxRetries ?? 5);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.tokens = this.capacity;
    this.lastRefillTime = this.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  private refill() {
    const now = this.now();
    const newTokens = Math.floor((now - this.lastRefillTime) / this.refillIntervalMs);

    if (newTokens > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + newTokens);
      this.lastRefillTime = now;
    }
  }

  /** Wait for a token, honouring any 429 backoff in effect. */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const wait = this.backoffUntil - this.now();
      if (wait > 0) {
        await sleep(wait, signal);
      }

      this.refill();
      if (this.tokens > 0) {
        this.tokens--;
        return;
      }
      await sleep(this.refillIntervalMs, signal);
    }
  }

  /**
   * Call this when a 429 response is received. Parses Retry-After (seconds)
   * and starts a backoff shared by every caller of this limiter.
   */
  handleRateLimit(retryAfterHeader?: string | null): number {
    let backoffMs = DEFAULT_BACKOFF_MS;
    if (retryAfterHeader) {
      const seconds = parseInt(retryAfterHeader, 10);
      if (!isNaN(seconds)) {
        backoffMs = seconds * 1000;
      }
    }

    backoffMs += this.random() * JITTER_MS;
    this.backoffUntil = Math.max(this.backoffUntil, this.now() + backoffMs);
    return backoffMs;
  }

  /**
   * Run `fn` under the limiter, retrying 429 answers with exponential backoff.
   * After `maxRetries` the last 429 response is returned to the caller.
   */
  async withRateLimit(fn: () => Promise<Response>, signal?: AbortSignal): Promise<Response> {
    for (let attempt = 1; ; attempt++) {
      await this.acquire(signal);

      const response = await fn();
      if (response.status !== 429 || attempt >= this.maxRetries) {
        return response;
      }

      const baseDelay = this.handleRateLimit(response.headers.get("Retry-After"));
      // release the connection before waiting
      await response.body?.cancel();
      const expDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), MAX_BACKOFF_MS);
      await sleep(expDelay + this.random() * JITTER_MS, signal);
    }
  }

  reset() {
    this.tokens = this.capacity;
    this.lastRefillTime = this.now();
    this.backoffUntil = 0;
  }
}
