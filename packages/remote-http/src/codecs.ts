/**
 * Record codecs for the REST API. Highlights follow the v2 item shape,
 * documents the v3 (reader) item shape.
 */

import { z } from "zod";
import {
  ValidationError,
  type FieldValue,
  type RecordCodec,
  type RecordKind,
  type SyncRecord,
  type WirePayload,
} from "@notesync/core";
import {
  DocumentFieldsSchema,
  DocumentItemSchema,
  HighlightFieldsSchema,
  HighlightItemSchema,
  formatIssues,
} from "./schemas.js";

/**
 * Wire attribute carrying the record's revision, per kind.
 */
export const REVISION_FIELD: { [kind in RecordKind]: string } = {
  highlight: "updated",
  document: "updated_at",
};

/**
 * Attributes the codec adds for bookkeeping; the API never receives them in a
 * write body.
 */
export const READ_ONLY_FIELDS: { [kind in RecordKind]: readonly string[] } = {
  highlight: ["id", "key", REVISION_FIELD.highlight],
  document: ["id", "key", REVISION_FIELD.document],
};

interface CodecDefinition {
  kind: RecordKind;
  item: z.ZodType<{ id?: string | number; key?: string; tags?: unknown }>;
  fields: z.ZodType<unknown>;
  fieldNames: readonly string[];
}

function createCodec(definition: CodecDefinition): RecordCodec {
  const { kind } = definition;
  const revisionField = REVISION_FIELD[kind];

  return {
    encode(record: SyncRecord): WirePayload {
      const checked = definition.fields.safeParse(record.fields);
      if (!checked.success) {
        throw new ValidationError(
          `Invalid ${kind} '${record.key}': ${formatIssues(checked.error)}`
        );
      }
      if (!Number.isFinite(record.revision)) {
        throw new ValidationError(`Invalid ${kind} '${record.key}': revision must be finite`);
      }

      const payload: WirePayload = {
        key: record.key,
        [revisionField]: new Date(record.revision).toISOString(),
      };
      for (const [name, value] of Object.entries(record.fields)) {
        payload[name] = Array.isArray(value) ? [...value] : value;
      }
      if (record.id !== undefined) {
        payload.id = record.id;
      }
      return payload;
    },

    decode(payload: WirePayload): SyncRecord {
      const parsed = definition.item.safeParse(payload);
      if (!parsed.success) {
        throw new Error(`Malformed ${kind} payload: ${formatIssues(parsed.error)}`);
      }

      const revision = Date.parse(String(payload[revisionField]));
      if (isNaN(revision)) {
        throw new Error(`Malformed ${kind} payload: '${revisionField}' is not a timestamp`);
      }

      const id = parsed.data.id === undefined ? undefined : String(parsed.data.id);
      const key = parsed.data.key ?? (id === undefined ? undefined : `${kind}:${id}`);
      if (key === undefined) {
        throw new Error(`Malformed ${kind} payload: neither 'id' nor 'key' present`);
      }

      const fields: SyncRecord["fields"] = {};
      for (const name of definition.fieldNames) {
        if (!(name in payload)) {
          continue;
        }
        const value = name === "tags" ? tagNames(parsed.data.tags) : toFieldValue(payload[name]);
        if (value !== undefined) {
          fields[name] = value;
        }
      }

      const record: SyncRecord = { key, revision, fields };
      if (id !== undefined) {
        record.id = id;
      }
      return record;
    },
  };
}

function toFieldValue(value: unknown): FieldValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return undefined;
}

function tagNames(tags: unknown): string[] | undefined {
  if (Array.isArray(tags)) {
    const names: string[] = [];
    for (const tag of tags) {
      if (typeof tag === "string") {
        names.push(tag);
      } else if (typeof tag === "object" && tag !== null && "name" in tag && typeof tag.name === "string") {
        names.push(tag.name);
      }
    }
    return names;
  }
  if (typeof tags === "object" && tags !== null) {
    return Object.keys(tags);
  }
  return undefined;
}

export const highlightCodec: RecordCodec = createCodec({
  kind: "highlight",
  item: HighlightItemSchema,
  fields: HighlightFieldsSchema,
  fieldNames: Object.keys(HighlightFieldsSchema.shape),
});

export const documentCodec: RecordCodec = createCodec({
  kind: "document",
  item: DocumentItemSchema,
  fields: DocumentFieldsSchema,
  fieldNames: Object.keys(DocumentFieldsSchema.shape),
});

export function codecFor(kind: RecordKind): RecordCodec {
  return kind === "highlight" ? highlightCodec : documentCodec;
}
