/**
 * Field-level truncation. Lengths are counted in Unicode code points so a cut
 * never splits a surrogate pair.
 */

import type {
  FieldLimits,
  FieldTruncation,
  SyncRecord,
  TruncationInfo,
} from "./types.js";

export interface EnforcedRecord {
  record: SyncRecord;
  truncation: TruncationInfo;
}

/**
 * Cut every limited string field that exceeds its limit. Pure: the input record
 * is never modified and the same input always yields the same output.
 */
export function enforce(record: SyncRecord, limits: FieldLimits): EnforcedRecord {
  const truncation: TruncationInfo = {};
  let fields = record.fields;

  for (const [field, limit] of Object.entries(limits)) {
    const value = record.fields[field];
    if (typeof value !== "string") {
      continue;
    }
    const codePoints = Array.from(value);
    if (codePoints.length <= limit) {
      continue;
    }
    if (fields === record.fields) {
      fields = { ...record.fields };
    }
    fields[field] = codePoints.slice(0, limit).join("");
    truncation[field] = {
      field,
      originalLength: codePoints.length,
      truncatedLength: limit,
      limit,
    };
  }

  if (fields === record.fields) {
    return { record, truncation };
  }
  return { record: { ...record, fields }, truncation };
}

export function isTruncated(info: TruncationInfo | undefined): boolean {
  return info !== undefined && Object.keys(info).length > 0;
}

export function truncatedFieldNames(info: TruncationInfo | undefined): string[] {
  return info ? Object.keys(info) : [];
}

export function charsRemoved(truncation: FieldTruncation): number {
  return truncation.originalLength - truncation.truncatedLength;
}
