/**
 * Rate-limited transport and the retry policy that sits one layer above it.
 *
 * The transport issues calls, throttles them client-side and classifies every
 * failure as rate-limited, transient or fatal. It never retries: callers wrap
 * their unit of work (a page, a group) in `withRetry` so their own bookkeeping
 * stays correct across attempts.
 */

import type { RetryConfig, ThrottleConfig } from "./config.js";
import {
  FatalError,
  RateLimitedError,
  SyncError,
  TransientError,
  describeError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { systemClock } from "./runtime.js";
import type { Clock } from "./types.js";

/** Delay used when a 429 arrives without a usable Retry-After header */
export const DEFAULT_RATE_LIMIT_DELAY_MS = 60_000;

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * Throttler for rate limiting calls within a sliding window.
 */
class Throttler {
  private requests: number[] = [];

  constructor(
    private readonly maxReqs: number,
    private readonly intervalMs: number,
    private readonly clock: Clock
  ) {}

  /**
   * Wait if necessary to respect the request budget.
   */
  async acquire(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      const cutoff = now - this.intervalMs;

      // Drop requests outside the window
      this.requests = this.requests.filter((ts) => ts > cutoff);

      if (this.requests.length < this.maxReqs) {
        this.requests.push(now);
        return;
      }

      // Wait until the oldest request leaves the window
      const waitMs = this.requests[0] + this.intervalMs - now;
      await this.clock.sleep(Math.max(waitMs, 1));
    }
  }
}

export interface TransportStats {
  requests: number;
  rateLimited: number;
  transientFailures: number;
  fatalFailures: number;
}

export interface TransportOptions {
  throttle: ThrottleConfig;
  clock?: Clock;
  logger?: Logger;
}

export class RateLimitedTransport {
  private readonly throttler: Throttler;
  private readonly logger: Logger;
  private readonly counters: TransportStats = {
    requests: 0,
    rateLimited: 0,
    transientFailures: 0,
    fatalFailures: 0,
  };

  constructor(options: TransportOptions) {
    const clock = options.clock ?? systemClock;
    this.throttler = new Throttler(
      options.throttle.maxReqs,
      options.throttle.intervalSec * 1000,
      clock
    );
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Issue one call. Failures are rethrown as SyncError subclasses.
   * @param label - Short description for logs, e.g. "list highlight"
   */
  async send<T>(label: string, call: () => Promise<T>): Promise<T> {
    await this.throttler.acquire();
    this.counters.requests++;

    try {
      return await call();
    } catch (error) {
      const classified = classifyError(error);
      switch (classified.kind) {
        case "rate_limited":
          this.counters.rateLimited++;
          break;
        case "transient":
          this.counters.transientFailures++;
          break;
        default:
          this.counters.fatalFailures++;
      }
      this.logger.debug("transport call failed", {
        call: label,
        kind: classified.kind,
        error: classified.message,
      });
      throw classified;
    }
  }

  get stats(): TransportStats {
    return { ...this.counters };
  }
}

/**
 * Map any thrown value onto the error taxonomy.
 * Network-level failures are transient; anything unrecognised is fatal.
 */
export function classifyError(error: unknown): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  if (error instanceof TypeError) {
    // fetch() rejects with a TypeError when the connection fails
    return new TransientError(error.message, { cause: error });
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new TransientError(error.message, { cause: error });
    }
    const code = errorCode(error);
    if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
      return new TransientError(`${code}: ${error.message}`, { cause: error });
    }
  }
  return new FatalError(describeError(error), { cause: error });
}

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if (error.cause instanceof Error) {
    return errorCode(error.cause);
  }
  return undefined;
}

/**
 * Translate an HTTP error status into the error taxonomy.
 */
export function errorForStatus(
  status: number,
  retryAfterMs: number | undefined,
  detail: string
): SyncError {
  if (status === 429) {
    return new RateLimitedError(
      retryAfterMs ?? DEFAULT_RATE_LIMIT_DELAY_MS,
      `HTTP 429: ${detail}`
    );
  }
  if (status === 408 || status >= 500) {
    return new TransientError(`HTTP ${status}: ${detail}`);
  }
  return new FatalError(`HTTP ${status}: ${detail}`, { status });
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(
  header: string | null | undefined,
  now: number
): number | undefined {
  if (!header) {
    return undefined;
  }
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.ceil(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Exponential backoff with jitter for the given attempt (1-based).
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs" | "jitter">,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const factor = 1 + policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(capped * factor));
}

export interface RetryContext {
  policy: RetryConfig;
  clock: Clock;
  logger: Logger;
  /** Describes the unit of work in logs and in the exhaustion message */
  label: string;
  random?: () => number;
}

/**
 * Run `operation` until it succeeds, retrying transient failures with backoff
 * and waiting out rate limits. Exhausted retries surface as FatalError; fatal
 * and validation errors pass straight through.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  context: RetryContext
): Promise<T> {
  const { policy, clock, logger, label } = context;
  let attempt = 1;
  let rateLimitWaits = 0;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classified = classifyError(error);

      if (classified instanceof RateLimitedError) {
        if (rateLimitWaits >= policy.maxRateLimitWaits) {
          throw new FatalError(
            `${label}: still rate limited after ${rateLimitWaits} waits`,
            { cause: classified }
          );
        }
        rateLimitWaits++;
        logger.warn("rate limited, waiting before resubmitting", {
          call: label,
          retryAfterMs: classified.retryAfterMs,
        });
        await clock.sleep(Math.max(0, classified.retryAfterMs));
        continue;
      }

      if (classified instanceof TransientError) {
        if (attempt >= policy.maxAttempts) {
          throw new FatalError(
            `${label}: failed after ${attempt} attempts: ${classified.message}`,
            { cause: classified }
          );
        }
        const delayMs = backoffDelay(attempt, policy, context.random);
        logger.warn("transient failure, retrying", {
          call: label,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          error: classified.message,
        });
        await clock.sleep(delayMs);
        attempt++;
        continue;
      }

      throw classified;
    }
  }
}
