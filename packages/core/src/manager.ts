/**
 * SyncManager - one reconciliation pass between a local snapshot and the remote
 * collection: pull, diff, push, advance the cursor.
 */

import { resolveEngineConfig, type EngineConfig } from "./config.js";
import { describeError, type SyncError } from "./errors.js";
import { PaginatedFetcher } from "./fetcher.js";
import { silentLogger, type Logger } from "./logger.js";
import { BatchPusher } from "./pusher.js";
import { blockingExecutor, systemClock, type Executor } from "./runtime.js";
import { RateLimitedTransport, classifyError } from "./transport.js";
import { isTruncated } from "./truncation.js";
import {
  EMPTY_CURSOR,
  type Clock,
  type PushResult,
  type RecordCodec,
  type RecordKind,
  type RemoteEndpoint,
  type SyncCursor,
  type SyncRecord,
} from "./types.js";

export type PassStage = "pulling" | "diffing" | "pushing";
export type PassState = "idle" | PassStage | "completed" | "failed";

/**
 * succeeded: every queued record was created, updated or skipped
 * partial: some results failed, see `results`
 * failed: the pass stopped before producing any usable result
 */
export type PassOutcome = "succeeded" | "partial" | "failed";

export interface PassStats {
  pages: number;
  pulled: number;
  undecodable: number;
  queued: number;
  inSync: number;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  truncated: number;
}

export interface PassReport {
  passId: string;
  account: string;
  kind: RecordKind;
  outcome: PassOutcome;
  state: "completed" | "failed";
  failure?: { stage: PassStage; error: SyncError };
  /** One result per entry of `pushed`, same order */
  results: PushResult[];
  pushed: SyncRecord[];
  /** Remote records the local snapshot does not contain */
  remoteAdditions: SyncRecord[];
  /** Remote records newer than their local copy */
  remoteUpdates: SyncRecord[];
  previousCursor: SyncCursor;
  cursor: SyncCursor;
  stats: PassStats;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
}

export interface SnapshotDiff {
  queue: SyncRecord[];
  inSync: number;
  remoteAdditions: SyncRecord[];
  remoteUpdates: SyncRecord[];
}

export interface SyncManagerOptions {
  kind: RecordKind;
  account?: string;
  remote: RemoteEndpoint;
  codec: RecordCodec;
  config?: EngineConfig;
  /** Share one transport between managers of an account to share its throttle */
  transport?: RateLimitedTransport;
  clock?: Clock;
  logger?: Logger;
  /** Schedules push groups; blocking by default */
  executor?: Executor;
  random?: () => number;
  onStateChange?: (state: PassState, passId: string) => void;
  onBatch?: (records: SyncRecord[], results: PushResult[]) => void;
}

/**
 * Compare the local snapshot with the records pulled since `cursor`.
 *
 * A local record without an id is matched to a pulled record by key, so a
 * record created by an earlier pass is recognized before the caller has
 * stored its id; unmatched ones are created. A local record whose id was
 * pulled is pushed when it is newer than the remote copy. A local record whose
 * id was not pulled is unchanged remotely since the cursor, so it is pushed
 * only when it changed at or after the cursor's watermark (or there is no
 * watermark yet).
 */
export function diffSnapshot(
  local: readonly SyncRecord[],
  remote: ReadonlyMap<string, SyncRecord>,
  cursor: SyncCursor
): SnapshotDiff {
  const queue: SyncRecord[] = [];
  const remoteUpdates: SyncRecord[] = [];
  const matchedIds = new Set<string>();
  let inSync = 0;

  const byKey = new Map<string, SyncRecord>();
  for (const record of remote.values()) {
    if (!byKey.has(record.key)) {
      byKey.set(record.key, record);
    }
  }

  for (const record of local) {
    const remoteRecord =
      record.id === undefined ? byKey.get(record.key) : remote.get(record.id);

    if (remoteRecord === undefined) {
      if (record.id === undefined) {
        queue.push(record);
      } else {
        matchedIds.add(record.id);
        if (cursor.watermark === null || record.revision >= cursor.watermark) {
          queue.push(record);
        } else {
          inSync++;
        }
      }
      continue;
    }

    const id = remoteRecord.id ?? record.id;
    if (id !== undefined) {
      matchedIds.add(id);
    }
    if (record.revision > remoteRecord.revision) {
      queue.push(record.id === undefined && id !== undefined ? { ...record, id } : record);
    } else if (remoteRecord.revision > record.revision) {
      remoteUpdates.push(remoteRecord);
    } else {
      inSync++;
    }
  }

  const remoteAdditions: SyncRecord[] = [];
  for (const [id, record] of remote) {
    if (!matchedIds.has(id)) {
      remoteAdditions.push(record);
    }
  }

  return { queue, inSync, remoteAdditions, remoteUpdates };
}

export class SyncManager {
  readonly kind: RecordKind;
  readonly account: string;
  private readonly config: EngineConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly fetcher: PaginatedFetcher;
  private readonly pusher: BatchPusher;
  private readonly onStateChange?: (state: PassState, passId: string) => void;

  constructor(options: SyncManagerOptions) {
    this.kind = options.kind;
    this.account = options.account ?? "default";
    this.config = options.config ?? resolveEngineConfig();
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({
      account: this.account,
      kind: this.kind,
    });
    this.onStateChange = options.onStateChange;

    const transport =
      options.transport ??
      new RateLimitedTransport({
        throttle: this.config.throttle,
        clock: this.clock,
        logger: this.logger,
      });

    this.fetcher = new PaginatedFetcher({
      kind: options.kind,
      remote: options.remote,
      codec: options.codec,
      transport,
      retry: this.config.retry,
      clock: this.clock,
      logger: this.logger,
      random: options.random,
    });

    this.pusher = new BatchPusher({
      kind: options.kind,
      remote: options.remote,
      codec: options.codec,
      transport,
      config: this.config,
      clock: this.clock,
      logger: this.logger,
      executor: options.executor ?? blockingExecutor,
      random: options.random,
      onBatch: options.onBatch,
    });
  }

  /**
   * Run one reconciliation pass. Never throws: failures are reported in the
   * returned PassReport together with whatever results were gathered.
   * @param localSnapshot - The caller's current records of this kind
   * @param cursor - Where the previous pass left off
   */
  async runOnce(
    localSnapshot: readonly SyncRecord[],
    cursor: SyncCursor = EMPTY_CURSOR
  ): Promise<PassReport> {
    const passId = this.generatePassId();
    const startedAt = new Date(this.clock.now());
    const stats: PassStats = {
      pages: 0,
      pulled: 0,
      undecodable: 0,
      queued: 0,
      inSync: 0,
      created: 0,
      updated: 0,
      skipped: 0,
      failed: 0,
      truncated: 0,
    };
    let pushed: SyncRecord[] = [];
    let results: PushResult[] = [];
    let remoteAdditions: SyncRecord[] = [];
    let remoteUpdates: SyncRecord[] = [];

    const finish = (
      state: "completed" | "failed",
      nextCursor: SyncCursor,
      failure?: { stage: PassStage; error: SyncError }
    ): PassReport => {
      for (const result of results) {
        stats[result.status]++;
        if (isTruncated(result.truncation)) {
          stats.truncated++;
        }
      }
      const endedAt = new Date(this.clock.now());
      const report: PassReport = {
        passId,
        account: this.account,
        kind: this.kind,
        outcome: this.outcomeFor(state, results),
        state,
        failure,
        results,
        pushed,
        remoteAdditions,
        remoteUpdates,
        previousCursor: cursor,
        cursor: nextCursor,
        stats,
        startedAt,
        endedAt,
        durationMs: endedAt.getTime() - startedAt.getTime(),
      };
      this.transition(state, passId);
      if (failure) {
        this.logger.error("sync pass failed", {
          passId,
          stage: failure.stage,
          outcome: report.outcome,
          error: failure.error.message,
        });
      } else {
        this.logger.info("sync pass completed", {
          passId,
          outcome: report.outcome,
          ...stats,
        });
      }
      return report;
    };

    this.transition("idle", passId);

    // Step 1: Pull everything changed since the cursor
    this.transition("pulling", passId);
    const working = new Map<string, SyncRecord>();
    let maxRevision: number | null = null;
    try {
      for await (const page of this.fetcher.pages(cursor)) {
        stats.pages++;
        stats.undecodable += page.skipped;
        for (const record of page.records) {
          if (record.id === undefined) {
            stats.undecodable++;
            continue;
          }
          stats.pulled++;
          const seen = working.get(record.id);
          if (seen === undefined || record.revision >= seen.revision) {
            working.set(record.id, record);
          }
        }
        if (
          page.maxRevision !== null &&
          (maxRevision === null || page.maxRevision > maxRevision)
        ) {
          maxRevision = page.maxRevision;
        }
      }
    } catch (error) {
      return finish("failed", cursor, { stage: "pulling", error: classifyError(error) });
    }

    // Step 2: Diff against the local snapshot
    this.transition("diffing", passId);
    try {
      const diff = diffSnapshot(localSnapshot, working, cursor);
      pushed = diff.queue;
      remoteAdditions = diff.remoteAdditions;
      remoteUpdates = diff.remoteUpdates;
      stats.queued = diff.queue.length;
      stats.inSync = diff.inSync;
    } catch (error) {
      return finish("failed", cursor, { stage: "diffing", error: classifyError(error) });
    }

    // Step 3: Push the queue
    this.transition("pushing", passId);
    try {
      results = await this.pusher.push(pushed);
    } catch (error) {
      this.logger.error("push stage threw", { passId, error: describeError(error) });
      return finish("failed", cursor, { stage: "pushing", error: classifyError(error) });
    }

    // Step 4: Advance the cursor to the highest revision observed, but not past
    // a record whose push failed, so the next pass pulls and retries it
    const retryFrom = lowestFailedRevision(pushed, results, working);
    return finish("completed", {
      token: null,
      watermark: maxWatermark(
        cursor.watermark,
        maxRevision === null ? null : minWatermark(maxRevision, retryFrom)
      ),
    });
  }

  private outcomeFor(state: "completed" | "failed", results: PushResult[]): PassOutcome {
    const anyFailed = results.some((result) => result.status === "failed");
    if (state === "completed") {
      return anyFailed ? "partial" : "succeeded";
    }
    const anyUsable = results.some((result) => result.status !== "failed");
    return anyUsable ? "partial" : "failed";
  }

  private transition(state: PassState, passId: string): void {
    this.logger.debug("pass state", { passId, state });
    if (this.onStateChange) {
      try {
        this.onStateChange(state, passId);
      } catch (error) {
        this.logger.warn("state listener threw", { passId, error: describeError(error) });
      }
    }
  }

  private generatePassId(): string {
    return `pass_${this.clock.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}

/**
 * Lowest revision the next pass must still see for the failed pushes of known
 * records: the pulled copy's revision, or the local one when it was not pulled.
 * Failed creates are queued again regardless of the cursor.
 */
function lowestFailedRevision(
  pushed: readonly SyncRecord[],
  results: readonly PushResult[],
  pulled: ReadonlyMap<string, SyncRecord>
): number | null {
  let lowest: number | null = null;
  for (let i = 0; i < results.length && i < pushed.length; i++) {
    const id = pushed[i].id;
    if (results[i].status !== "failed" || id === undefined) {
      continue;
    }
    lowest = minWatermark(lowest, pulled.get(id)?.revision ?? pushed[i].revision);
  }
  return lowest;
}

function minWatermark(a: number | null, b: number | null): number | null {
  if (a === null) {
    return b;
  }
  if (b === null) {
    return a;
  }
  return Math.min(a, b);
}

function maxWatermark(a: number | null, b: number | null): number | null {
  if (a === null) {
    return b;
  }
  if (b === null) {
    return a;
  }
  return Math.max(a, b);
}

export interface PassJob {
  manager: SyncManager;
  snapshot: readonly SyncRecord[];
  cursor: SyncCursor;
}

/**
 * Run passes for several kinds or accounts. Passes share nothing, so the
 * executor may interleave them freely; a (account, kind) pair may appear once.
 */
export async function runPasses(
  jobs: readonly PassJob[],
  executor: Executor = blockingExecutor
): Promise<PassReport[]> {
  const keys = new Set<string>();
  for (const { manager } of jobs) {
    const key = `${manager.account}:${manager.kind}`;
    if (keys.has(key)) {
      throw new Error(`Duplicate pass for '${key}': one pass per account and kind`);
    }
    keys.add(key);
  }
  return executor.all(
    jobs.map((job) => () => job.manager.runOnce(job.snapshot, job.cursor))
  );
}
