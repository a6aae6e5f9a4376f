/**
 * Engine configuration. A single value is built once and passed explicitly to
 * every component; nothing reads ambient state.
 */

import type { FieldLimits, RecordKind } from "./types.js";

/**
 * Retry configuration for handling transient errors and rate limits.
 */
export interface RetryConfig {
  /** Attempts per unit of work (page, group or call), first try included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay randomly added or removed, 0 disables jitter */
  jitter: number;
  /** Rate-limit waits tolerated per unit of work before giving up */
  maxRateLimitWaits: number;
}

/**
 * Client-side throttle to stay under the remote's request budget.
 */
export interface ThrottleConfig {
  maxReqs: number;
  intervalSec: number;
}

export interface EngineConfig {
  /** Largest group the remote accepts in one createOrUpdate call */
  batchSize: number;
  retry: RetryConfig;
  throttle: ThrottleConfig;
  fieldLimits: { [kind in RecordKind]: FieldLimits };
}

export interface EngineConfigInput {
  batchSize?: number;
  retry?: Partial<RetryConfig>;
  throttle?: Partial<ThrottleConfig>;
  fieldLimits?: { [kind in RecordKind]?: FieldLimits };
}

export const DEFAULT_BATCH_SIZE = 100;

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitter: 0.2,
  maxRateLimitWaits: 10,
};

export const DEFAULT_THROTTLE: ThrottleConfig = {
  maxReqs: 50,
  intervalSec: 60,
};

export const HIGHLIGHT_FIELD_LIMITS: FieldLimits = {
  text: 8191,
  note: 8191,
  title: 511,
  author: 1024,
};

export const DOCUMENT_FIELD_LIMITS: FieldLimits = {
  title: 511,
  author: 1024,
  summary: 8191,
  notes: 8191,
};

/**
 * Merge caller overrides over the defaults and reject values the engine cannot
 * work with.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const config: EngineConfig = {
    batchSize: input.batchSize ?? DEFAULT_BATCH_SIZE,
    retry: { ...DEFAULT_RETRY, ...input.retry },
    throttle: { ...DEFAULT_THROTTLE, ...input.throttle },
    fieldLimits: {
      highlight: input.fieldLimits?.highlight ?? { ...HIGHLIGHT_FIELD_LIMITS },
      document: input.fieldLimits?.document ?? { ...DOCUMENT_FIELD_LIMITS },
    },
  };

  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    throw new Error(`batchSize must be a positive integer, got ${config.batchSize}`);
  }
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    throw new Error(
      `retry.maxAttempts must be a positive integer, got ${config.retry.maxAttempts}`
    );
  }
  if (config.retry.jitter < 0 || config.retry.jitter >= 1) {
    throw new Error(`retry.jitter must be in [0, 1), got ${config.retry.jitter}`);
  }
  if (config.throttle.maxReqs < 1 || config.throttle.intervalSec <= 0) {
    throw new Error("throttle.maxReqs and throttle.intervalSec must be positive");
  }
  for (const [kind, limits] of Object.entries(config.fieldLimits)) {
    for (const [field, limit] of Object.entries(limits)) {
      if (!Number.isInteger(limit) || limit < 0) {
        throw new Error(`fieldLimits.${kind}.${field} must be a non-negative integer`);
      }
    }
  }

  return config;
}
