/**
 * @notesync/core - Synchronization engine for NoteSync
 *
 * This package provides:
 * - Type definitions and contracts (SyncRecord, SyncCursor, RemoteEndpoint, RecordCodec, CursorStore)
 * - Rate-limited transport and retry policy
 * - Paginated fetcher, truncation policy and batch pusher
 * - SyncManager for reconciliation passes and BackgroundPoller for unattended runs
 *
 * Core never imports remotes or stores; the CLI wires everything together at runtime.
 */

// Export all type definitions
export {
  EMPTY_CURSOR,
  type RecordKind,
  type FieldValue,
  type SyncRecord,
  type SyncCursor,
  type FieldTruncation,
  type TruncationInfo,
  type FieldLimits,
  type PushResult,
  type WirePayload,
  type WriteKind,
  type ListRequest,
  type RemotePage,
  type ItemOutcome,
  type RemoteEndpoint,
  type RecordCodec,
  type CursorStore,
  type Clock,
} from "./types.js";

export {
  SyncError,
  TransientError,
  RateLimitedError,
  FatalError,
  ValidationError,
  PullError,
  PassInProgressError,
  describeError,
  type SyncErrorKind,
} from "./errors.js";

export {
  resolveEngineConfig,
  DEFAULT_BATCH_SIZE,
  DEFAULT_RETRY,
  DEFAULT_THROTTLE,
  HIGHLIGHT_FIELD_LIMITS,
  DOCUMENT_FIELD_LIMITS,
  type EngineConfig,
  type EngineConfigInput,
  type RetryConfig,
  type ThrottleConfig,
} from "./config.js";

export {
  createJsonLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogData,
  type JsonLoggerOptions,
} from "./logger.js";

export {
  systemClock,
  blockingExecutor,
  concurrentExecutor,
  type Executor,
  type ExecutionMode,
} from "./runtime.js";

export {
  RateLimitedTransport,
  classifyError,
  errorForStatus,
  parseRetryAfter,
  backoffDelay,
  withRetry,
  DEFAULT_RATE_LIMIT_DELAY_MS,
  type TransportOptions,
  type TransportStats,
  type RetryContext,
} from "./transport.js";

export { PaginatedFetcher, type FetchedPage, type FetcherOptions } from "./fetcher.js";

export {
  enforce,
  isTruncated,
  truncatedFieldNames,
  charsRemoved,
  type EnforcedRecord,
} from "./truncation.js";

export { BatchPusher, DUPLICATE_REASON, type PusherOptions } from "./pusher.js";

export {
  SyncManager,
  diffSnapshot,
  runPasses,
  type PassJob,
  type PassOutcome,
  type PassReport,
  type PassStage,
  type PassState,
  type PassStats,
  type SnapshotDiff,
  type SyncManagerOptions,
} from "./manager.js";

export { InFlightRegistry } from "./inflight.js";

export {
  BackgroundPoller,
  startPolling,
  type PollerOptions,
  type PollerState,
  type PollerHandle,
  type PassListener,
  type PollerErrorListener,
} from "./poller.js";
