import type { RemoteCallResult } from "./retry";
import type { SequenceNumber, StreamRecord } from "./types";

export type CursorPosition =
  | { type: "AT_SEQUENCE_NUMBER"; sequenceNumber: SequenceNumber }
  | { type: "AFTER_SEQUENCE_NUMBER"; sequenceNumber: SequenceNumber };

export interface OpenCursorRequest {
  streamName: string;
  shardId: string;
  position: CursorPosition;
}

export interface ShardPage {
  records: StreamRecord[];
  /**
   * Position right after the last record of this page. Absent once a closed
   * shard has been read to its end.
   */
  nextCursor?: string;
}

export interface RemoteCallOptions {
  /** Per-call timeout; implementations wrap their transport call in `guardRemoteCall` with it */
  timeoutMs: number;
}

/**
 * Paged read access to a single shard.
 *
 * Every call resolves to a tagged result instead of throwing, so the retry
 * driver decides what to do with throttling and hard failures.
 */
export interface ShardStreamClient {
  openCursor(request: OpenCursorRequest, options: RemoteCallOptions): Promise<RemoteCallResult<string>>;
  getPage(cursor: string, maxCount: number, options: RemoteCallOptions): Promise<RemoteCallResult<ShardPage>>;
  close(): Promise<void> | void;
}

/** Creates a fresh client; each replay owns the client it gets for its whole lifetime. */
export type ShardStreamClientFactory = () => ShardStreamClient;
