/**
 * Error taxonomy shared by every layer of the engine.
 *
 * - transient: retried automatically, bounded by the retry policy
 * - rate_limited: retried after the remote's mandated delay, not counted
 *   against the transient budget
 * - fatal: never retried, always surfaced for its unit of work
 * - validation: one item rejected by the remote; its batch carries on
 */

import type { SyncCursor } from "./types.js";

export type SyncErrorKind = "transient" | "rate_limited" | "fatal" | "validation";

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientError extends SyncError {
  readonly kind = "transient" as const;
}

export class RateLimitedError extends SyncError {
  readonly kind = "rate_limited" as const;

  constructor(
    readonly retryAfterMs: number,
    message = `Rate limited, retry after ${retryAfterMs}ms`,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class FatalError extends SyncError {
  readonly kind = "fatal" as const;
  /** HTTP status that produced the error, when there was one */
  readonly status: number | undefined;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export class ValidationError extends SyncError {
  readonly kind = "validation" as const;
}

/**
 * The pull phase could not finish. `resumeFrom` points at the page that failed
 * so a later pull can continue instead of starting over.
 */
export class PullError extends FatalError {
  constructor(
    message: string,
    readonly resumeFrom: SyncCursor,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Another pass for the same account and kind is still running.
 */
export class PassInProgressError extends Error {
  constructor(readonly passKey: string) {
    super(`A sync pass for '${passKey}' is already in flight`);
    this.name = "PassInProgressError";
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
