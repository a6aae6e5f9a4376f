/**
 * Runtime schemas for the service's REST payloads.
 */

import { z } from "zod";

const IdSchema = z.union([z.number(), z.string().min(1)]);

/**
 * v2 tags come back as objects, v3 tags as a map keyed by tag name.
 */
export const TagsSchema = z.union([
  z.array(z.union([z.string(), z.object({ name: z.string() }).passthrough()])),
  z.record(z.string(), z.unknown()),
]);

export const HighlightItemSchema = z
  .object({
    id: IdSchema.optional(),
    key: z.string().optional(),
    text: z.string(),
    note: z.string().nullable().optional(),
    title: z.string().nullable().optional(),
    author: z.string().nullable().optional(),
    source_url: z.string().nullable().optional(),
    location: z.number().nullable().optional(),
    tags: TagsSchema.optional(),
    updated: z.string(),
  })
  .passthrough();

export const DocumentItemSchema = z
  .object({
    id: IdSchema.optional(),
    key: z.string().optional(),
    url: z.string(),
    title: z.string().nullable().optional(),
    author: z.string().nullable().optional(),
    summary: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    category: z.string().nullable().optional(),
    tags: TagsSchema.optional(),
    updated_at: z.string(),
  })
  .passthrough();

/**
 * Fields a caller may set on a highlight.
 */
export const HighlightFieldsSchema = z
  .object({
    text: z.string(),
    note: z.string().nullable().optional(),
    title: z.string().nullable().optional(),
    author: z.string().nullable().optional(),
    source_url: z.string().nullable().optional(),
    location: z.number().nullable().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

/**
 * Fields a caller may set on a document.
 */
export const DocumentFieldsSchema = z
  .object({
    url: z.string(),
    title: z.string().nullable().optional(),
    author: z.string().nullable().optional(),
    summary: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    category: z.string().nullable().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

const ItemListSchema = z.array(z.record(z.string(), z.unknown()));

export const HighlightPageSchema = z.object({
  results: ItemListSchema,
  next: z.string().nullable(),
});

export const DocumentPageSchema = z.object({
  results: ItemListSchema,
  nextPageCursor: z.string().nullable(),
});

export const HighlightCreateResponseSchema = z.array(
  z
    .object({
      modified_highlights: z.array(IdSchema),
    })
    .passthrough()
);

export const SavedItemSchema = z.object({ id: IdSchema }).passthrough();

/**
 * One line per issue, "path: message".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${at}: ${issue.message}`;
    })
    .join("; ");
}
