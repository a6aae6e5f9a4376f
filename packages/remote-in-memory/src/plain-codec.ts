/**
 * Codec for the in-memory remote: the wire payload is the record itself,
 * copied so neither side can mutate the other's data.
 */

import type { FieldValue, RecordCodec, SyncRecord, WirePayload } from "@notesync/core";

export const plainCodec: RecordCodec = {
  encode(record: SyncRecord): WirePayload {
    const payload: WirePayload = {
      key: record.key,
      revision: record.revision,
      fields: copyFields(record.fields),
    };
    if (record.id !== undefined) {
      payload.id = record.id;
    }
    return payload;
  },

  decode(payload: WirePayload): SyncRecord {
    const { id, key, revision, fields } = payload;
    if (typeof key !== "string") {
      throw new Error("Payload is missing a string 'key'");
    }
    if (typeof revision !== "number" || !Number.isFinite(revision)) {
      throw new Error(`Payload '${key}' is missing a numeric 'revision'`);
    }
    if (id !== undefined && typeof id !== "string") {
      throw new Error(`Payload '${key}' has a non-string 'id'`);
    }
    if (!isFieldMap(fields)) {
      throw new Error(`Payload '${key}' has malformed 'fields'`);
    }
    const record: SyncRecord = { key, revision, fields: copyFields(fields) };
    if (id !== undefined) {
      record.id = id;
    }
    return record;
  },
};

function copyFields(fields: SyncRecord["fields"]): SyncRecord["fields"] {
  const copy: SyncRecord["fields"] = {};
  for (const [name, value] of Object.entries(fields)) {
    copy[name] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
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

function isFieldMap(value: unknown): value is SyncRecord["fields"] {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isFieldValue);
}
