/**
 * InMemoryRemote - An in-memory implementation of RemoteEndpoint for testing.
 * Stores records per kind and simulates cursor-based pagination, id assignment
 * and injected failures.
 */

import type {
  ItemOutcome,
  ListRequest,
  RecordKind,
  RemoteEndpoint,
  RemotePage,
  SyncRecord,
  WirePayload,
} from "@notesync/core";
import { plainCodec } from "./plain-codec.js";

/**
 * Configuration options for InMemoryRemote.
 */
export interface InMemoryRemoteOptions {
  /**
   * Initial records per kind. Records without an id get one assigned.
   */
  initialRecords?: { [kind in RecordKind]?: SyncRecord[] };
  /**
   * Items per list page.
   */
  pageSize?: number;
  /**
   * Item-level validation: return a message to reject the payload.
   */
  rejectWhen?: (record: SyncRecord, kind: RecordKind) => string | null;
}

export type RemoteOperation = "list" | "createOrUpdate";

/**
 * One recorded call, in call order.
 */
export type RemoteCall =
  | { operation: "list"; request: ListRequest }
  | { operation: "createOrUpdate"; kind: RecordKind; group: WirePayload[] };

export class InMemoryRemote implements RemoteEndpoint {
  private readonly records = new Map<RecordKind, Map<string, SyncRecord>>();
  private readonly pendingFailures = new Map<RemoteOperation, unknown[]>();
  private readonly pageSize: number;
  private rejectWhen?: (record: SyncRecord, kind: RecordKind) => string | null;
  private nextId = 1;

  /** Every call received, including the ones that failed */
  readonly calls: RemoteCall[] = [];

  constructor(options: InMemoryRemoteOptions = {}) {
    this.pageSize = options.pageSize ?? 50;
    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new Error(`pageSize must be a positive integer, got ${this.pageSize}`);
    }
    this.rejectWhen = options.rejectWhen;

    for (const [kind, records] of entries(options.initialRecords ?? {})) {
      for (const record of records) {
        this.addRecord(kind, record);
      }
    }
  }

  /**
   * List records with revision >= updatedAfter, ordered by revision then id.
   * Page tokens are offsets into that ordering.
   */
  async list(request: ListRequest): Promise<RemotePage> {
    this.calls.push({ operation: "list", request: { ...request } });
    this.throwPendingFailure("list");

    const offset = request.pageToken === null ? 0 : parseInt(request.pageToken, 10);
    if (isNaN(offset) || offset < 0) {
      throw new Error(`Invalid page token '${request.pageToken}'`);
    }

    const updatedAfter = request.updatedAfter;
    const matching = this.getAllRecords(request.kind)
      .filter((record) => updatedAfter === null || record.revision >= updatedAfter)
      .sort((a, b) => a.revision - b.revision || compareIds(a, b));

    const page = matching.slice(offset, offset + this.pageSize);
    const nextOffset = offset + page.length;

    return {
      items: page.map((record) => plainCodec.encode(record)),
      nextPageToken: nextOffset < matching.length ? String(nextOffset) : null,
    };
  }

  /**
   * Apply a group of writes. Payloads with an id update that record, the rest
   * create a new one.
   */
  async createOrUpdate(kind: RecordKind, group: WirePayload[]): Promise<ItemOutcome[]> {
    this.calls.push({
      operation: "createOrUpdate",
      kind,
      group: group.map((payload) => ({ ...payload })),
    });
    this.throwPendingFailure("createOrUpdate");

    const store = this.storeFor(kind);
    return group.map((payload): ItemOutcome => {
      let record: SyncRecord;
      try {
        record = plainCodec.decode(payload);
      } catch (error) {
        return {
          status: "rejected",
          message: error instanceof Error ? error.message : String(error),
        };
      }

      const rejection = this.rejectWhen?.(record, kind) ?? null;
      if (rejection !== null) {
        return { status: "rejected", message: rejection };
      }

      if (record.id !== undefined) {
        if (!store.has(record.id)) {
          return { status: "rejected", message: `Record ${record.id} not found` };
        }
        store.set(record.id, record);
        return { status: "updated", id: record.id };
      }

      const id = this.assignId(kind);
      store.set(id, { ...record, id });
      return { status: "created", id };
    });
  }

  /**
   * Queue errors to throw from the next calls of `operation`, one per call.
   */
  failNext(operation: RemoteOperation, ...errors: unknown[]): void {
    const queue = this.pendingFailures.get(operation) ?? [];
    queue.push(...errors);
    this.pendingFailures.set(operation, queue);
  }

  setRejectWhen(rule: ((record: SyncRecord, kind: RecordKind) => string | null) | undefined): void {
    this.rejectWhen = rule;
  }

  /**
   * Calls made for one operation (useful for testing/debugging).
   */
  callsFor<O extends RemoteOperation>(
    operation: O
  ): Array<Extract<RemoteCall, { operation: O }>> {
    return this.calls.filter(
      (call): call is Extract<RemoteCall, { operation: O }> => call.operation === operation
    );
  }

  /**
   * Get all current records of a kind (useful for testing/debugging).
   */
  getAllRecords(kind: RecordKind): SyncRecord[] {
    return Array.from(this.storeFor(kind).values());
  }

  /**
   * Get a specific record by id (useful for testing/debugging).
   */
  getRecord(kind: RecordKind, id: string): SyncRecord | undefined {
    return this.storeFor(kind).get(id);
  }

  /**
   * Manually add or replace a record, as if another client wrote it.
   * @returns the record's id
   */
  addRecord(kind: RecordKind, record: SyncRecord): string {
    const id = record.id ?? this.assignId(kind);
    this.storeFor(kind).set(id, { ...record, id });
    return id;
  }

  /**
   * Clear all records, queued failures and recorded calls.
   */
  clear(): void {
    this.records.clear();
    this.pendingFailures.clear();
    this.calls.length = 0;
    this.nextId = 1;
  }

  private throwPendingFailure(operation: RemoteOperation): void {
    const queue = this.pendingFailures.get(operation);
    if (queue !== undefined && queue.length > 0) {
      throw queue.shift();
    }
  }

  private storeFor(kind: RecordKind): Map<string, SyncRecord> {
    let store = this.records.get(kind);
    if (store === undefined) {
      store = new Map();
      this.records.set(kind, store);
    }
    return store;
  }

  private assignId(kind: RecordKind): string {
    const store = this.storeFor(kind);
    let id = `${kind}-${this.nextId++}`;
    while (store.has(id)) {
      id = `${kind}-${this.nextId++}`;
    }
    return id;
  }
}

function compareIds(a: SyncRecord, b: SyncRecord): number {
  return (a.id ?? "").localeCompare(b.id ?? "");
}

function entries(
  byKind: { [kind in RecordKind]?: SyncRecord[] }
): Array<[RecordKind, SyncRecord[]]> {
  const result: Array<[RecordKind, SyncRecord[]]> = [];
  if (byKind.highlight) {
    result.push(["highlight", byKind.highlight]);
  }
  if (byKind.document) {
    result.push(["document", byKind.document]);
  }
  return result;
}
