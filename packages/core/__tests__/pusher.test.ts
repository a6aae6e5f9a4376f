/**
 * Tests for BatchPusher
 * Uses InMemoryRemote and a manual clock so retries and rate limits are observable.
 */

import { InMemoryRemote, plainCodec } from "@notesync/remote-in-memory";
import { resolveEngineConfig } from "../src/config";
import { FatalError, RateLimitedError, TransientError, ValidationError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { BatchPusher, DUPLICATE_REASON } from "../src/pusher";
import { blockingExecutor, concurrentExecutor, type Executor } from "../src/runtime";
import { RateLimitedTransport } from "../src/transport";
import type {
  ItemOutcome,
  PushResult,
  RecordCodec,
  RemoteEndpoint,
  SyncRecord,
  WirePayload,
} from "../src/types";
import { FAST_RETRY, ManualClock } from "./helpers/manual-clock";

function newRecord(key: string, fields: SyncRecord["fields"] = { text: `Text of ${key}` }): SyncRecord {
  return { key, revision: 1, fields };
}

interface PusherSetup {
  remote?: RemoteEndpoint;
  codec?: RecordCodec;
  executor?: Executor;
  onBatch?: (records: SyncRecord[], results: PushResult[]) => void;
}

function createPusher(setup: PusherSetup = {}) {
  const clock = new ManualClock();
  const remote = new InMemoryRemote();
  const pusher = new BatchPusher({
    kind: "highlight",
    remote: setup.remote ?? remote,
    codec: setup.codec ?? plainCodec,
    transport: new RateLimitedTransport({ throttle: { maxReqs: 1000, intervalSec: 1 }, clock }),
    config: resolveEngineConfig({
      batchSize: 2,
      retry: FAST_RETRY,
      fieldLimits: { highlight: { note: 100 } },
    }),
    clock,
    logger: silentLogger,
    executor: setup.executor,
    onBatch: setup.onBatch,
  });
  return { pusher, remote, clock };
}

function summary(results: PushResult[]): string[] {
  return results.map((result) => `${result.status}:${result.key}`);
}

describe("BatchPusher", () => {
  it("returns one result per record, in input order", async () => {
    const { pusher, remote } = createPusher();
    const records = ["k1", "k2", "k3", "k4", "k5"].map((key) => newRecord(key));

    const results = await pusher.push(records);

    expect(results).toEqual([
      { status: "created", key: "k1", id: "highlight-1" },
      { status: "created", key: "k2", id: "highlight-2" },
      { status: "created", key: "k3", id: "highlight-3" },
      { status: "created", key: "k4", id: "highlight-4" },
      { status: "created", key: "k5", id: "highlight-5" },
    ]);
    expect(remote.callsFor("createOrUpdate").map((call) => call.group.length)).toEqual([2, 2, 1]);
  });

  it("returns an empty result list for an empty push", async () => {
    const { pusher, remote } = createPusher();
    expect(await pusher.push([])).toEqual([]);
    expect(remote.calls).toHaveLength(0);
  });

  it("updates records that already have an id", async () => {
    const { pusher, remote } = createPusher();
    remote.addRecord("highlight", { id: "h9", key: "k9", revision: 1, fields: { text: "old" } });

    const results = await pusher.push([{ id: "h9", key: "k9", revision: 2, fields: { text: "new" } }]);

    expect(results).toEqual([{ status: "updated", key: "k9", id: "h9" }]);
    expect(remote.getRecord("highlight", "h9")?.fields.text).toBe("new");
  });

  it("pushes a repeated key once and reports the rest as duplicates", async () => {
    const { pusher, remote } = createPusher();

    const results = await pusher.push([newRecord("k1"), newRecord("k2"), newRecord("k1")]);

    expect(results[2]).toEqual({ status: "skipped", key: "k1", reason: DUPLICATE_REASON });
    expect(summary(results)).toEqual(["created:k1", "created:k2", "skipped:k1"]);
    expect(remote.getAllRecords("highlight")).toHaveLength(2);
  });

  it("lets a later occurrence of a key try again when the first one fails", async () => {
    const { pusher, remote } = createPusher();
    remote.setRejectWhen((record) => (record.fields.text === "bad" ? "text is invalid" : null));

    const results = await pusher.push([
      newRecord("k1", { text: "bad" }),
      newRecord("k1", { text: "good" }),
    ]);

    expect(summary(results)).toEqual(["failed:k1", "created:k1"]);
    expect(remote.callsFor("createOrUpdate")).toHaveLength(2);
  });

  it("isolates a rejected item from the rest of its batch", async () => {
    const { pusher, remote } = createPusher();
    remote.setRejectWhen((record) => (record.key === "k3" ? "text is required" : null));

    const results = await pusher.push(["k1", "k2", "k3", "k4", "k5"].map((key) => newRecord(key)));

    expect(summary(results)).toEqual([
      "created:k1",
      "created:k2",
      "failed:k3",
      "created:k4",
      "created:k5",
    ]);
    const failed = results[2];
    expect(failed.status === "failed" && failed.error).toBeInstanceOf(ValidationError);
    expect(failed.status === "failed" && failed.error.message).toBe("text is required");
  });

  it("waits out a rate limit and resubmits the same group", async () => {
    const { pusher, remote, clock } = createPusher();
    remote.failNext("createOrUpdate", new RateLimitedError(5000));

    const results = await pusher.push([newRecord("k1"), newRecord("k2")]);

    expect(summary(results)).toEqual(["created:k1", "created:k2"]);
    expect(clock.sleeps).toEqual([5000]);
    const calls = remote.callsFor("createOrUpdate");
    expect(calls).toHaveLength(2);
    expect(calls[1].group).toEqual(calls[0].group);
  });

  it("fails every member of a group whose retries run out", async () => {
    const { pusher, remote, clock } = createPusher();
    remote.failNext(
      "createOrUpdate",
      new TransientError("down"),
      new TransientError("down"),
      new TransientError("down")
    );

    const results = await pusher.push([newRecord("k1"), newRecord("k2"), newRecord("k3")]);

    expect(summary(results)).toEqual(["failed:k1", "failed:k2", "created:k3"]);
    for (const result of results.slice(0, 2)) {
      expect(result.status === "failed" && result.error).toBeInstanceOf(FatalError);
      expect(result.status === "failed" && result.error.message).toBe(
        "createOrUpdate highlight x2: failed after 3 attempts: down"
      );
    }
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it("fails items the remote returned no outcome for", async () => {
    const shortRemote: RemoteEndpoint = {
      list: async () => ({ items: [], nextPageToken: null }),
      createOrUpdate: async (_kind, group: WirePayload[]): Promise<ItemOutcome[]> =>
        group.slice(1).map((_, index): ItemOutcome => ({ status: "created", id: `r${index}` })),
    };
    const { pusher } = createPusher({ remote: shortRemote });

    const results = await pusher.push([newRecord("k1"), newRecord("k2")]);

    expect(results[0]).toEqual({ status: "created", key: "k1", id: "r0" });
    expect(results[1].status).toBe("failed");
    expect(results[1].status === "failed" && results[1].error.message).toBe(
      "No result returned for item"
    );
  });

  it("fails records the codec cannot encode without submitting them", async () => {
    const codec: RecordCodec = {
      decode: plainCodec.decode,
      encode(record) {
        if (record.key === "k1") {
          throw new Error("unsupported field");
        }
        return plainCodec.encode(record);
      },
    };
    const { pusher, remote } = createPusher({ codec });

    const results = await pusher.push([newRecord("k1"), newRecord("k2")]);

    expect(summary(results)).toEqual(["failed:k1", "created:k2"]);
    expect(results[0].status === "failed" && results[0].error.message).toBe(
      "Could not encode record: unsupported field"
    );
    expect(remote.callsFor("createOrUpdate")[0].group).toHaveLength(1);
  });

  it("truncates long fields and reports it on the result", async () => {
    const { pusher, remote } = createPusher();

    const [result] = await pusher.push([newRecord("k1", { text: "t", note: "n".repeat(120) })]);

    expect(result).toEqual({
      status: "created",
      key: "k1",
      id: "highlight-1",
      truncation: {
        note: { field: "note", originalLength: 120, truncatedLength: 100, limit: 100 },
      },
    });
    expect(remote.getRecord("highlight", "highlight-1")?.fields.note).toBe("n".repeat(100));
  });

  it("reports each group to onBatch as it resolves", async () => {
    const batches: string[][] = [];
    const { pusher } = createPusher({
      onBatch: (records) => batches.push(records.map((record) => record.key)),
    });

    await pusher.push(["k1", "k2", "k3"].map((key) => newRecord(key)));

    expect(batches).toEqual([["k1", "k2"], ["k3"]]);
  });

  it("keeps creates and updates apart when the remote declares group capacities", async () => {
    const batches: string[][] = [];
    const cappedRemote: RemoteEndpoint = {
      list: async () => ({ items: [], nextPageToken: null }),
      createOrUpdate: async (_kind, group: WirePayload[]): Promise<ItemOutcome[]> =>
        group.map((_, index): ItemOutcome => ({ status: "created", id: `r${index}` })),
      groupCapacity: (_kind, write) => (write === "create" ? Number.POSITIVE_INFINITY : 1),
    };
    const { pusher } = createPusher({
      remote: cappedRemote,
      onBatch: (records) => batches.push(records.map((record) => record.key)),
    });

    await pusher.push([
      newRecord("k1"),
      newRecord("k2"),
      newRecord("k3"),
      { ...newRecord("k4"), id: "x4" },
      { ...newRecord("k5"), id: "x5" },
      newRecord("k6"),
    ]);

    expect(batches).toEqual([["k1", "k2"], ["k3"], ["k4"], ["k5"], ["k6"]]);
  });

  it("produces the same results under blocking and concurrent executors", async () => {
    const records = ["k1", "k2", "k3", "k1", "k4", "k5"].map((key) => newRecord(key));

    const run = async (executor: Executor): Promise<string[]> => {
      const { pusher, remote } = createPusher({ executor });
      remote.setRejectWhen((record) => (record.key === "k4" ? "rejected" : null));
      return summary(await pusher.push(records));
    };

    const blocking = await run(blockingExecutor);
    const concurrent = await run(concurrentExecutor(3));

    expect(blocking).toEqual([
      "created:k1",
      "created:k2",
      "created:k3",
      "skipped:k1",
      "failed:k4",
      "created:k5",
    ]);
    expect(concurrent).toEqual(blocking);
  });
});
