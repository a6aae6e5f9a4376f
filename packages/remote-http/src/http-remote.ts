/**
 * HttpRemoteEndpoint - RemoteEndpoint over the service's REST API.
 * Highlights go through the v2 API, documents through the v3 (reader) API.
 *
 * The endpoint only speaks HTTP: throttling, retries and backoff belong to the
 * engine's transport, which receives the typed errors thrown here.
 */

import {
  FatalError,
  errorForStatus,
  parseRetryAfter,
  systemClock,
  type Clock,
  type ItemOutcome,
  type ListRequest,
  type RecordKind,
  type RemoteEndpoint,
  type RemotePage,
  type WirePayload,
  type WriteKind,
} from "@notesync/core";
import type { z } from "zod";
import { READ_ONLY_FIELDS } from "./codecs.js";
import {
  DocumentPageSchema,
  HighlightCreateResponseSchema,
  HighlightPageSchema,
  SavedItemSchema,
  formatIssues,
} from "./schemas.js";

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { method: string; headers: { [name: string]: string }; body?: string; signal?: AbortSignal }
) => Promise<FetchResponse>;

/**
 * Configuration options for HttpRemoteEndpoint.
 */
export interface HttpRemoteOptions {
  /**
   * Service origin, e.g. "https://notes.example.com".
   */
  baseUrl: string;
  /**
   * API access token, sent as `Authorization: Token <token>`.
   */
  token: string;
  /**
   * Items per list page (default: 100).
   */
  pageSize?: number;
  /**
   * Per-request timeout (default: 30000).
   */
  timeoutMs?: number;
  /**
   * fetch implementation (default: global fetch).
   */
  fetch?: FetchFn;
  clock?: Clock;
}

/**
 * Statuses that reject a single item instead of the whole group.
 */
const ITEM_REJECTION_STATUSES = new Set([400, 404, 409, 422]);

export class HttpRemoteEndpoint implements RemoteEndpoint {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly clock: Clock;

  constructor(options: HttpRemoteOptions) {
    // Validate required options
    if (!options.baseUrl) {
      throw new Error("HttpRemoteEndpoint requires baseUrl");
    }
    if (!options.token) {
      throw new Error("HttpRemoteEndpoint requires token");
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.pageSize = options.pageSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Fetch one page of records changed at or after `updatedAfter`.
   * Page tokens are the API's own: the `next` URL for v2, `nextPageCursor` for v3.
   */
  async list(request: ListRequest): Promise<RemotePage> {
    if (request.kind === "highlight") {
      const url =
        request.pageToken ??
        this.url("/api/v2/highlights/", {
          page_size: String(this.pageSize),
          updated__gt: inclusiveLowerBound(request.updatedAfter),
        });
      const body = await this.request("GET", url);
      const page = parseResponse(HighlightPageSchema, body, "highlight list");
      return { items: page.results, nextPageToken: page.next };
    }

    const url = this.url("/api/v3/list/", {
      pageCursor: request.pageToken ?? undefined,
      updatedAfter: inclusiveLowerBound(request.updatedAfter),
    });
    const body = await this.request("GET", url);
    const page = parseResponse(DocumentPageSchema, body, "document list");
    return { items: page.results, nextPageToken: page.nextPageCursor };
  }

  async createOrUpdate(kind: RecordKind, group: WirePayload[]): Promise<ItemOutcome[]> {
    return kind === "highlight"
      ? this.writeHighlights(group)
      : this.writeDocuments(group);
  }

  /**
   * Requests one createOrUpdate call makes: new highlights share one bulk
   * create, every other write is a request of its own.
   */
  groupCapacity(kind: RecordKind, write: WriteKind): number {
    return kind === "highlight" && write === "create" ? Number.POSITIVE_INFINITY : 1;
  }

  /**
   * New highlights go out in one bulk create; existing ones are patched one
   * at a time since the API has no bulk update.
   */
  private async writeHighlights(group: WirePayload[]): Promise<ItemOutcome[]> {
    const outcomes = new Array<ItemOutcome>(group.length);
    const creates: number[] = [];

    for (let i = 0; i < group.length; i++) {
      if (typeof group[i].id === "string") {
        continue;
      }
      creates.push(i);
    }

    if (creates.length > 0) {
      const body = await this.request("POST", this.url("/api/v2/highlights/"), {
        highlights: creates.map((i) => writeBody("highlight", group[i])),
      });
      const ids = parseResponse(HighlightCreateResponseSchema, body, "highlight create")
        .flatMap((entry) => entry.modified_highlights);
      creates.forEach((index, position) => {
        const id = ids[position];
        outcomes[index] =
          id === undefined
            ? { status: "rejected", message: "No id returned for created highlight" }
            : { status: "created", id: String(id) };
      });
    }

    for (let i = 0; i < group.length; i++) {
      const id = group[i].id;
      if (typeof id !== "string") {
        continue;
      }
      outcomes[i] = await this.writeOne(
        "PATCH",
        this.url(`/api/v2/highlights/${encodeURIComponent(id)}/`),
        writeBody("highlight", group[i]),
        "updated"
      );
    }

    return outcomes;
  }

  private async writeDocuments(group: WirePayload[]): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = [];
    for (const payload of group) {
      const id = payload.id;
      if (typeof id === "string") {
        outcomes.push(
          await this.writeOne(
            "PATCH",
            this.url(`/api/v3/update/${encodeURIComponent(id)}/`),
            writeBody("document", payload),
            "updated"
          )
        );
      } else {
        outcomes.push(
          await this.writeOne("POST", this.url("/api/v3/save/"), writeBody("document", payload), "created")
        );
      }
    }
    return outcomes;
  }

  /**
   * Write a single item. Client errors reject the item; anything else is thrown
   * so the transport can retry or fail the group.
   */
  private async writeOne(
    method: string,
    url: string,
    body: WirePayload,
    status: "created" | "updated"
  ): Promise<ItemOutcome> {
    let response: unknown;
    try {
      response = await this.request(method, url, body);
    } catch (error) {
      if (
        error instanceof FatalError &&
        error.status !== undefined &&
        ITEM_REJECTION_STATUSES.has(error.status)
      ) {
        return { status: "rejected", message: error.message };
      }
      throw error;
    }
    const saved = parseResponse(SavedItemSchema, response, `${method} ${url}`);
    return { status, id: String(saved.id) };
  }

  private url(path: string, query: { [name: string]: string | undefined } = {}): string {
    const url = new URL(path, `${this.baseUrl}/`);
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(name, value);
      }
    }
    return url.toString();
  }

  /**
   * Perform one HTTP call and return the parsed JSON body (null when empty).
   * Non-2xx statuses become the engine's typed errors.
   */
  private async request(method: string, url: string, body?: WirePayload): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Token ${this.token}`,
        Accept: "application/json",
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();

    if (!response.ok) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"), this.clock.now());
      throw errorForStatus(
        response.status,
        retryAfterMs,
        `${method} ${url}: ${errorDetail(text, response.statusText)}`
      );
    }

    if (text.trim() === "") {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new FatalError(`${method} ${url}: response is not JSON`, { cause: error });
    }
  }
}

/**
 * The API filters with a strict "greater than"; the engine asks for revisions
 * at or above the watermark.
 */
function inclusiveLowerBound(updatedAfter: number | null): string | undefined {
  if (updatedAfter === null) {
    return undefined;
  }
  return new Date(updatedAfter - 1).toISOString();
}

function writeBody(kind: RecordKind, payload: WirePayload): WirePayload {
  const body: WirePayload = {};
  for (const [name, value] of Object.entries(payload)) {
    if (!READ_ONLY_FIELDS[kind].includes(name)) {
      body[name] = value;
    }
  }
  return body;
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new FatalError(`Unexpected ${what} response: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function errorDetail(text: string, statusText: string): string {
  const trimmed = text.trim();
  if (trimmed === "") {
    return statusText || "no response body";
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === "object" && parsed !== null && "detail" in parsed && typeof parsed.detail === "string") {
      return parsed.detail;
    }
  } catch {
    // not JSON, use the raw body
  }
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed;
}
