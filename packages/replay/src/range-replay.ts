import { RangeExhaustedError } from "./errors";
import { NOOP_LOGGER } from "./logger";
import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  retryRemoteCall,
  withCallTimeout,
  type RetryPolicy,
  type RetryRunOptions,
} from "./retry";
import { isAfter } from "./sequence-number";
import type { CursorPosition, ShardPage, ShardStreamClient, ShardStreamClientFactory } from "./stream-client";
import type { ReplayLogger, SequenceRange, StreamRecord } from "./types";

/** Upper bound the source accepts for a single page request. */
export const MAX_RECORDS_PER_PAGE = 10000;

export interface SequenceRangeReplayOptions {
  range: SequenceRange;
  clientFactory: ShardStreamClientFactory;
  retryPolicy?: Partial<RetryPolicy>;
  callTimeoutMs?: number;
  /** Page size cap, never above MAX_RECORDS_PER_PAGE */
  maxPageSize?: number;
  logger?: ReplayLogger;
  /** Cancels the replay between retries */
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type RangeReplayPhase = "START" | "FETCHING" | "HAS_PAGE" | "DONE" | "FAILED";

export interface RangeReplayMetrics {
  pagesFetched: number;
  recordsEmitted: number;
}

/**
 * Replays exactly one sequence range of a shard straight from the source.
 *
 * Opens one cursor at `fromSeq`, then follows each page's `nextCursor` and
 * yields records in order until the record at `toSeq` has been yielded. Every
 * remote call goes through the retry driver, under `callTimeoutMs` whether or
 * not the client enforces it.
 *
 * The replay owns one client for its lifetime and closes it on every exit
 * path, including a consumer that stops iterating early. Instances are single
 * use: iterate a fresh replay to read the range again.
 *
 * @example
 * ```ts
 * const replay = new SequenceRangeReplay({ range, clientFactory });
 * for await (const record of replay) handle(record);
 * ```
 */
export class SequenceRangeReplay implements AsyncIterable<StreamRecord> {
  private readonly options: SequenceRangeReplayOptions;
  private readonly logger: ReplayLogger;
  private readonly retryPolicy: RetryPolicy;
  private readonly retryOptions: RetryRunOptions;
  private readonly callTimeoutMs: number;
  private readonly maxPageSize: number;
  private readonly metrics: RangeReplayMetrics = { pagesFetched: 0, recordsEmitted: 0 };
  private phase: RangeReplayPhase = "START";
  private started = false;

  constructor(options: SequenceRangeReplayOptions) {
    if (options.range.recordCount < 1) {
      throw new RangeError(`recordCount must be positive, got ${options.range.recordCount}`);
    }
    this.options = options;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy };
    this.retryOptions = {
      logger: this.logger,
      signal: options.signal,
      now: options.now,
      sleep: options.sleep,
    };
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.maxPageSize = Math.min(options.maxPageSize ?? MAX_RECORDS_PER_PAGE, MAX_RECORDS_PER_PAGE);
  }

  getPhase(): RangeReplayPhase {
    return this.phase;
  }

  getMetrics(): RangeReplayMetrics {
    return { ...this.metrics };
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamRecord> {
    if (this.started) {
      throw new Error("SequenceRangeReplay is single use; create a new replay to read the range again");
    }
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<StreamRecord> {
    const { range } = this.options;
    const client = this.options.clientFactory();
    let position: CursorPosition = { type: "AT_SEQUENCE_NUMBER", sequenceNumber: range.fromSeq };

    this.logger.debug("range replay starting", {
      shardId: range.shardId,
      fromSeq: range.fromSeq,
      toSeq: range.toSeq,
      recordCount: range.recordCount,
    });

    try {
      this.phase = "FETCHING";
      let cursor = await this.openCursor(client, position);
      while (true) {
        this.phase = "FETCHING";
        const remaining = range.recordCount - this.metrics.recordsEmitted;
        const page = await this.fetchPage(client, cursor, remaining);
        if (!page.records.length) {
          throw new RangeExhaustedError(range, `no records ${describePosition(position)}`);
        }

        this.phase = "HAS_PAGE";
        for (const record of page.records) {
          if (isAfter(record.sequenceNumber, range.toSeq)) {
            throw new RangeExhaustedError(range, `record ${record.sequenceNumber} is past the end of the range`);
          }
          this.metrics.recordsEmitted += 1;
          yield record;

          if (record.sequenceNumber === range.toSeq) {
            this.phase = "DONE";
            this.logger.debug("range replay reached end sequence number", {
              shardId: range.shardId,
              toSeq: range.toSeq,
              pagesFetched: this.metrics.pagesFetched,
            });
            return;
          }
          position = { type: "AFTER_SEQUENCE_NUMBER", sequenceNumber: record.sequenceNumber };
        }

        if (page.nextCursor === undefined) {
          throw new RangeExhaustedError(range, `shard ended ${describePosition(position)}`);
        }
        cursor = page.nextCursor;
      }
    } catch (err) {
      this.phase = "FAILED";
      this.logger.error("range replay failed", {
        shardId: range.shardId,
        fromSeq: range.fromSeq,
        toSeq: range.toSeq,
        err,
      });
      throw err;
    } finally {
      await this.closeClient(client);
    }
  }

  private openCursor(client: ShardStreamClient, position: CursorPosition): Promise<string> {
    const { range } = this.options;
    const request = { streamName: range.streamName, shardId: range.shardId, position };
    return retryRemoteCall(
      `getting shard cursor ${describePosition(position)}`,
      () =>
        withCallTimeout(
          () => client.openCursor(request, { timeoutMs: this.callTimeoutMs }),
          this.callTimeoutMs,
        ),
      this.retryPolicy,
      this.retryOptions,
    );
  }

  private async fetchPage(client: ShardStreamClient, cursor: string, remaining: number): Promise<ShardPage> {
    const limit = Math.max(1, Math.min(remaining, this.maxPageSize));
    const page = await retryRemoteCall(
      `getting records of shard ${this.options.range.shardId} using shard cursor`,
      () =>
        withCallTimeout(
          () => client.getPage(cursor, limit, { timeoutMs: this.callTimeoutMs }),
          this.callTimeoutMs,
        ),
      this.retryPolicy,
      this.retryOptions,
    );
    this.metrics.pagesFetched += 1;
    return page;
  }

  private async closeClient(client: ShardStreamClient): Promise<void> {
    try {
      await client.close();
    } catch (err) {
      this.logger.warn("failed to close shard client", { shardId: this.options.range.shardId, err });
    }
  }
}

function describePosition(position: CursorPosition): string {
  const relation = position.type === "AT_SEQUENCE_NUMBER" ? "at" : "after";
  return `${relation} sequence number ${position.sequenceNumber}`;
}
