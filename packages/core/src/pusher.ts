/**
 * BatchPusher - submits grouped writes and reports one PushResult per input
 * record, in input order.
 */

import type { EngineConfig } from "./config.js";
import { ValidationError, describeError, type SyncError } from "./errors.js";
import type { Logger } from "./logger.js";
import { blockingExecutor, type Executor } from "./runtime.js";
import {
  classifyError,
  withRetry,
  type RateLimitedTransport,
} from "./transport.js";
import { enforce, isTruncated } from "./truncation.js";
import type {
  Clock,
  ItemOutcome,
  PushResult,
  RecordCodec,
  RecordKind,
  RemoteEndpoint,
  SyncRecord,
  TruncationInfo,
  WirePayload,
  WriteKind,
} from "./types.js";

export const DUPLICATE_REASON = "duplicate";

/**
 * One push in flight. Owned by a single push() call and dropped once its
 * results are returned.
 */
interface BatchJob {
  readonly records: readonly SyncRecord[];
  readonly batchSize: number;
  readonly results: Array<PushResult | undefined>;
}

export interface PusherOptions {
  kind: RecordKind;
  remote: RemoteEndpoint;
  codec: RecordCodec;
  transport: RateLimitedTransport;
  config: Pick<EngineConfig, "batchSize" | "retry" | "fieldLimits">;
  clock: Clock;
  logger: Logger;
  /** Schedules the groups of one round; defaults to one group at a time */
  executor?: Executor;
  random?: () => number;
  /** Called after each group resolves, with that group's records and results */
  onBatch?: (records: SyncRecord[], results: PushResult[]) => void;
}

export class BatchPusher {
  private readonly executor: Executor;

  constructor(private readonly options: PusherOptions) {
    this.executor = options.executor ?? blockingExecutor;
  }

  /**
   * Push records to the remote.
   * @returns results aligned with `records`: results[i] describes records[i]
   */
  async push(records: readonly SyncRecord[]): Promise<PushResult[]> {
    const job: BatchJob = {
      records,
      batchSize: this.options.config.batchSize,
      results: new Array<PushResult | undefined>(records.length).fill(undefined),
    };

    const succeededKeys = new Set<string>();
    let pending = records.map((_, index) => index);

    // Each round submits the first unresolved occurrence of every key. Later
    // occurrences wait for that outcome: a success makes them duplicates, a
    // failure lets the next one try in the following round.
    while (pending.length > 0) {
      const round: number[] = [];
      const deferred: number[] = [];
      const keysThisRound = new Set<string>();

      for (const index of pending) {
        const key = records[index].key;
        if (succeededKeys.has(key)) {
          job.results[index] = { status: "skipped", key, reason: DUPLICATE_REASON };
        } else if (keysThisRound.has(key)) {
          deferred.push(index);
        } else {
          keysThisRound.add(key);
          round.push(index);
        }
      }

      const groups = this.partition(job, round);
      await this.executor.all(groups.map((group) => () => this.submitGroup(job, group)));

      for (const index of round) {
        const result = job.results[index];
        if (result?.status === "created" || result?.status === "updated") {
          succeededKeys.add(result.key);
        }
      }
      pending = deferred;
    }

    return job.results.map((result, index) => {
      if (result === undefined) {
        // Every index is resolved by the loop above; this guards the invariant
        throw new Error(`Push result ${index} was never resolved`);
      }
      return result;
    });
  }

  /**
   * Split a round into groups of at most batchSize. A remote that declares a
   * group capacity gets groups of one write kind within that capacity.
   */
  private partition(job: BatchJob, round: readonly number[]): number[][] {
    const { remote } = this.options;
    const groups: number[][] = [];
    let current: number[] = [];
    let currentWrite: WriteKind | null = null;
    let limit = job.batchSize;

    for (const index of round) {
      const write: WriteKind = job.records[index].id === undefined ? "create" : "update";
      const kindChanged = remote.groupCapacity !== undefined && write !== currentWrite;
      if (current.length > 0 && (current.length >= limit || kindChanged)) {
        groups.push(current);
        current = [];
      }
      if (current.length === 0) {
        currentWrite = write;
        limit = this.capacityFor(write, job.batchSize);
      }
      current.push(index);
    }
    if (current.length > 0) {
      groups.push(current);
    }
    return groups;
  }

  private capacityFor(write: WriteKind, batchSize: number): number {
    const { remote, kind } = this.options;
    if (remote.groupCapacity === undefined) {
      return batchSize;
    }
    const capacity = remote.groupCapacity(kind, write);
    return Math.max(1, Math.min(batchSize, Math.floor(capacity)));
  }

  /**
   * Truncate, encode and submit one group, retrying the whole group on
   * transport failures. Never throws: every failure lands in job.results.
   */
  private async submitGroup(job: BatchJob, group: number[]): Promise<void> {
    const { kind, codec, remote, transport, logger } = this.options;
    const limits = this.options.config.fieldLimits[kind];

    const submitted: number[] = [];
    const payloads: WirePayload[] = [];
    const truncations = new Map<number, TruncationInfo>();

    for (const index of group) {
      const { record, truncation } = enforce(job.records[index], limits);
      truncations.set(index, truncation);
      try {
        payloads.push(codec.encode(record));
        submitted.push(index);
      } catch (error) {
        job.results[index] = failed(
          record.key,
          new ValidationError(`Could not encode record: ${describeError(error)}`, {
            cause: error,
          }),
          truncation
        );
      }
    }

    if (submitted.length > 0) {
      const label = `createOrUpdate ${kind} x${payloads.length}`;
      let outcomes: ItemOutcome[] | undefined;
      let groupError: SyncError | undefined;

      try {
        outcomes = await withRetry(
          () => transport.send(label, () => remote.createOrUpdate(kind, payloads)),
          {
            policy: this.options.config.retry,
            clock: this.options.clock,
            logger,
            label,
            random: this.options.random,
          }
        );
      } catch (error) {
        groupError = classifyError(error);
        logger.error("group submission failed", {
          kind,
          size: submitted.length,
          error: groupError.message,
        });
      }

      if (outcomes !== undefined && outcomes.length > submitted.length) {
        logger.warn("remote returned more outcomes than items submitted", {
          kind,
          submitted: submitted.length,
          returned: outcomes.length,
        });
      }

      submitted.forEach((index, position) => {
        const key = job.records[index].key;
        const truncation = truncations.get(index);
        if (groupError !== undefined) {
          job.results[index] = failed(key, groupError, truncation);
          return;
        }
        job.results[index] = resultFromOutcome(key, outcomes?.[position], truncation);
      });
    }

    this.notifyBatch(job, group);
  }

  private notifyBatch(job: BatchJob, group: number[]): void {
    const { onBatch } = this.options;
    if (!onBatch) {
      return;
    }
    const records: SyncRecord[] = [];
    const results: PushResult[] = [];
    for (const index of group) {
      const result = job.results[index];
      if (result !== undefined) {
        records.push(job.records[index]);
        results.push(result);
      }
    }
    try {
      onBatch(records, results);
    } catch (error) {
      this.options.logger.warn("batch callback threw", { error: describeError(error) });
    }
  }
}

function resultFromOutcome(
  key: string,
  outcome: ItemOutcome | undefined,
  truncation: TruncationInfo | undefined
): PushResult {
  if (outcome === undefined) {
    return failed(key, new ValidationError("No result returned for item"), truncation);
  }
  switch (outcome.status) {
    case "created":
      return withTruncation({ status: "created", key, id: outcome.id }, truncation);
    case "updated":
      return withTruncation({ status: "updated", key, id: outcome.id }, truncation);
    case "rejected":
      return failed(key, new ValidationError(outcome.message), truncation);
  }
}

function failed(
  key: string,
  error: SyncError,
  truncation: TruncationInfo | undefined
): PushResult {
  return withTruncation({ status: "failed", key, error }, truncation);
}

function withTruncation(
  result: PushResult,
  truncation: TruncationInfo | undefined
): PushResult {
  if (truncation === undefined || !isTruncated(truncation)) {
    return result;
  }
  return { ...result, truncation };
}
