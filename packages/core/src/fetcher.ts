/**
 * PaginatedFetcher - walks a cursor-based listing endpoint into a lazy sequence
 * of records.
 */

import type { RetryConfig } from "./config.js";
import { PullError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { withRetry, type RateLimitedTransport } from "./transport.js";
import type {
  Clock,
  RecordCodec,
  RecordKind,
  RemoteEndpoint,
  RemotePage,
  SyncCursor,
  SyncRecord,
} from "./types.js";

export interface FetchedPage {
  records: SyncRecord[];
  /** Items on the page the codec could not decode */
  skipped: number;
  /** Highest revision on this page, null for an empty page */
  maxRevision: number | null;
  /**
   * Where a pull resumes after this page. While more pages remain the watermark
   * stays at the pull's starting point, because the page token is only valid
   * under the same filter.
   */
  cursor: SyncCursor;
}

export interface FetcherOptions {
  kind: RecordKind;
  remote: RemoteEndpoint;
  codec: RecordCodec;
  transport: RateLimitedTransport;
  retry: RetryConfig;
  clock: Clock;
  logger: Logger;
  random?: () => number;
}

export class PaginatedFetcher {
  constructor(private readonly options: FetcherOptions) {}

  /**
   * Lazily fetch pages starting at `from`. Each call starts a fresh walk.
   * @throws PullError when a page cannot be fetched; `resumeFrom` points at it
   */
  async *pages(from: SyncCursor): AsyncGenerator<FetchedPage, void, undefined> {
    const { kind, remote, codec, transport, logger } = this.options;
    let pageToken = from.token;
    let pageNumber = 1;

    for (;;) {
      const label = `list ${kind} page ${pageNumber}`;
      let page: RemotePage;
      try {
        page = await withRetry(
          () =>
            transport.send(label, () =>
              remote.list({ kind, pageToken, updatedAfter: from.watermark })
            ),
          {
            policy: this.options.retry,
            clock: this.options.clock,
            logger,
            label,
            random: this.options.random,
          }
        );
      } catch (error) {
        throw new PullError(
          `Pull of ${kind} records failed at page ${pageNumber}: ${describeError(error)}`,
          { token: pageToken, watermark: from.watermark },
          { cause: error }
        );
      }

      const records: SyncRecord[] = [];
      let skipped = 0;
      let maxRevision: number | null = null;
      for (const item of page.items) {
        let record: SyncRecord;
        try {
          record = codec.decode(item);
        } catch (error) {
          skipped++;
          logger.warn("skipping undecodable remote item", {
            kind,
            page: pageNumber,
            error: describeError(error),
          });
          continue;
        }
        records.push(record);
        if (maxRevision === null || record.revision > maxRevision) {
          maxRevision = record.revision;
        }
      }

      logger.debug("fetched page", {
        kind,
        page: pageNumber,
        records: records.length,
        hasMore: page.nextPageToken !== null,
      });

      yield {
        records,
        skipped,
        maxRevision,
        cursor: { token: page.nextPageToken, watermark: from.watermark },
      };

      if (page.nextPageToken === null) {
        return;
      }
      pageToken = page.nextPageToken;
      pageNumber++;
    }
  }

  /**
   * Lazily fetch records starting at `from`, flattening pages.
   */
  async *records(from: SyncCursor): AsyncGenerator<SyncRecord, void, undefined> {
    for await (const page of this.pages(from)) {
      yield* page.records;
    }
  }
}
