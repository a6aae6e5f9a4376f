/**
 * Core type definitions and contracts for NoteSync.
 * These interfaces define the protocol that remote endpoints, codecs and cursor
 * stores must implement.
 */

import type { SyncError } from "./errors.js";

/**
 * Kind of record being reconciled. The engine treats it as an opaque label;
 * remotes route on it.
 */
export type RecordKind = "highlight" | "document";

/**
 * A single field value carried by a record.
 */
export type FieldValue = string | number | boolean | null | string[];

/**
 * A domain item (highlight or document).
 */
export interface SyncRecord {
  /** Remote identifier, absent until the remote has created the record */
  id?: string;
  /** Caller-assigned idempotency key; identity before `id` is known */
  key: string;
  fields: { [name: string]: FieldValue };
  /** Modification marker: epoch milliseconds or a sequence number */
  revision: number;
}

/**
 * Resumption point for incremental pulls of one record kind.
 */
export interface SyncCursor {
  /** Opaque page token, null when the last pull ran to completion */
  token: string | null;
  /** Highest revision seen so far, null for "from the beginning" */
  watermark: number | null;
}

export const EMPTY_CURSOR: SyncCursor = { token: null, watermark: null };

export interface FieldTruncation {
  field: string;
  originalLength: number;
  truncatedLength: number;
  limit: number;
}

/**
 * Per-record truncation accounting, keyed by field name.
 */
export type TruncationInfo = { [field: string]: FieldTruncation };

/**
 * Maximum length per field name.
 */
export type FieldLimits = { [field: string]: number };

/**
 * Per-record push outcome. Results are aligned 1:1 with the pushed records.
 */
export type PushResult =
  | { status: "created"; key: string; id: string; truncation?: TruncationInfo }
  | { status: "updated"; key: string; id: string; truncation?: TruncationInfo }
  | { status: "skipped"; key: string; reason: string; truncation?: TruncationInfo }
  | { status: "failed"; key: string; error: SyncError; truncation?: TruncationInfo };

/**
 * Untyped wire representation of a record. Only codecs look inside it.
 */
export type WirePayload = { [key: string]: unknown };

export interface ListRequest {
  kind: RecordKind;
  pageToken: string | null;
  /** Inclusive lower bound on revision; null lists everything */
  updatedAfter: number | null;
}

export interface RemotePage {
  items: WirePayload[];
  nextPageToken: string | null;
}

/**
 * Outcome the remote reports for one item of a createOrUpdate group.
 */
export type ItemOutcome =
  | { status: "created"; id: string }
  | { status: "updated"; id: string }
  | { status: "rejected"; message: string };

/**
 * The remote service as seen by the engine.
 * Implementations throw the errors from errors.ts (or anything the transport
 * can classify) on failure.
 */
export interface RemoteEndpoint {
  list(request: ListRequest): Promise<RemotePage>;

  /**
   * Create or update a group of records.
   * @returns one outcome per payload, in payload order
   */
  createOrUpdate(kind: RecordKind, group: WirePayload[]): Promise<ItemOutcome[]>;

  /**
   * How many writes of one kind a single request can carry. When present, a
   * createOrUpdate call never mixes creates with updates and never exceeds this
   * size, so that each call is exactly one request. Unbounded when omitted.
   */
  groupCapacity?(kind: RecordKind, write: WriteKind): number;
}

/** A payload with an id updates that record; one without creates a new one */
export type WriteKind = "create" | "update";

/**
 * Converts records to and from wire payloads. Must round-trip every present field.
 */
export interface RecordCodec {
  encode(record: SyncRecord): WirePayload;
  decode(payload: WirePayload): SyncRecord;
}

/**
 * Persistence for cursors between poller runs.
 */
export interface CursorStore {
  load(account: string, kind: RecordKind): Promise<SyncCursor>;
  save(account: string, kind: RecordKind, cursor: SyncCursor): Promise<void>;
  /** Forget one kind's cursor, or every cursor of the account */
  reset(account: string, kind?: RecordKind): Promise<void>;
  list(): Promise<Array<{ account: string; kind: RecordKind; cursor: SyncCursor }>>;
}

/**
 * Suspension primitive. Every wait in the engine goes through it.
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without throwing) when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
