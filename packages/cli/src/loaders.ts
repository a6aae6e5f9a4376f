/**
 * Construction of remotes, cursor stores and local snapshots from configuration.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type {
  CursorStore,
  FieldValue,
  Logger,
  PushResult,
  RecordCodec,
  RecordKind,
  RemoteEndpoint,
  SyncRecord,
} from "@notesync/core";
import { FileCursorStore, InMemoryCursorStore } from "@notesync/cursor-store";
import { HttpRemoteEndpoint, codecFor } from "@notesync/remote-http";
import { InMemoryRemote, plainCodec } from "@notesync/remote-in-memory";
import type { RemoteConfigRaw, StateConfigRaw } from "./config.js";

export interface LoadedRemote {
  remote: RemoteEndpoint;
  codecFor(kind: RecordKind): RecordCodec;
}

/**
 * Load a remote endpoint and its codecs based on the remote configuration.
 * @throws Error if the configuration still holds an unexpanded variable
 */
export function loadRemote(config: RemoteConfigRaw): LoadedRemote {
  switch (config.driver) {
    case "http": {
      if (/\$\{[^}]+\}/.test(config.token)) {
        throw new Error(`remote.token references an unset environment variable: ${config.token}`);
      }
      return {
        remote: new HttpRemoteEndpoint({
          baseUrl: config.base_url,
          token: config.token,
          pageSize: config.page_size,
          timeoutMs: config.timeout_ms,
        }),
        codecFor,
      };
    }
    case "in-memory":
      return {
        remote: new InMemoryRemote({ pageSize: config.page_size }),
        codecFor: () => plainCodec,
      };
  }
}

/**
 * Load the cursor store. Relative paths resolve against the config file's directory.
 */
export function loadCursorStore(
  config: StateConfigRaw,
  configFilePath: string,
  logger: Logger
): CursorStore {
  switch (config.driver) {
    case "file":
      return new FileCursorStore({
        path: path.resolve(path.dirname(configFilePath), config.path),
        logger,
      });
    case "in-memory":
      return new InMemoryCursorStore();
  }
}

/**
 * Load a local snapshot: a JSON array of records. A missing file is an empty
 * snapshot, so a first run can start from nothing.
 * @throws Error if the file is not a valid record array
 */
export async function loadSnapshot(snapshotPath: string): Promise<SyncRecord[]> {
  let content: string;
  try {
    content = await fs.readFile(snapshotPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Snapshot ${snapshotPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!Array.isArray(parsed)) {
    throw new Error(`Snapshot ${snapshotPath} must contain an array of records`);
  }
  return parsed.map((item: unknown, index) => toSyncRecord(item, `${snapshotPath}[${index}]`));
}

/**
 * Write records as a JSON array, creating parent directories as needed.
 */
export async function writeRecords(outputPath: string, records: readonly SyncRecord[]): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(records, null, 2)}\n`, "utf-8");
}

/**
 * Give snapshot records that still lack an id the one a pass created or updated
 * them under, matched by key. The file is re-read first and rewritten only when
 * a record gained an id.
 * @returns the number of records that gained an id
 */
export async function writeBackIds(snapshotPath: string, results: readonly PushResult[]): Promise<number> {
  const idsByKey = new Map<string, string>();
  for (const result of results) {
    if (result.status === "created" || result.status === "updated") {
      idsByKey.set(result.key, result.id);
    }
  }
  if (idsByKey.size === 0) {
    return 0;
  }

  const records = await loadSnapshot(snapshotPath);
  let assigned = 0;
  for (const record of records) {
    const id = idsByKey.get(record.key);
    if (record.id === undefined && id !== undefined) {
      record.id = id;
      assigned++;
    }
  }
  if (assigned > 0) {
    await writeRecords(snapshotPath, records);
  }
  return assigned;
}

function toSyncRecord(item: unknown, where: string): SyncRecord {
  if (typeof item !== "object" || item === null || Array.isArray(item)) {
    throw new Error(`${where}: record must be an object`);
  }
  const key = "key" in item ? item.key : undefined;
  const revision = "revision" in item ? item.revision : undefined;
  const id = "id" in item ? item.id : undefined;
  const fields = "fields" in item ? item.fields : undefined;

  if (typeof key !== "string" || key === "") {
    throw new Error(`${where}: record must have a string 'key'`);
  }
  if (typeof revision !== "number" || !Number.isFinite(revision)) {
    throw new Error(`${where}: record '${key}' must have a numeric 'revision'`);
  }
  if (id !== undefined && typeof id !== "string") {
    throw new Error(`${where}: record '${key}' has a non-string 'id'`);
  }
  if (typeof fields !== "object" || fields === null || Array.isArray(fields)) {
    throw new Error(`${where}: record '${key}' must have a 'fields' object`);
  }

  const record: SyncRecord = { key, revision, fields: {} };
  for (const [name, value] of Object.entries(fields)) {
    if (!isFieldValue(value)) {
      throw new Error(`${where}: field '${name}' of record '${key}' has an unsupported value`);
    }
    record.fields[name] = value;
  }
  if (id !== undefined) {
    record.id = id;
  }
  return record;
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    (Array.isArray(value) && value.every((item) => typeof item === "string"))
  );
}
