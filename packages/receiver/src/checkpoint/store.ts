import type { SequenceNumber } from "@shardstream/replay";
import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import {
  getShardCheckpoint,
  updateShardCheckpoint,
  type DatabaseClient,
} from "./repository";

/** Where persistent checkpoint handles keep each shard's position. */
export interface ShardCheckpointStore {
  get(streamName: string, shardId: string): Promise<SequenceNumber | null>;
  put(streamName: string, shardId: string, sequenceNumber: SequenceNumber): Promise<void>;
}

export class DrizzleShardCheckpointStore<
  TQueryResult extends PgQueryResultHKT = PgQueryResultHKT,
  TSchema extends Record<string, unknown> = Record<string, unknown>,
> implements ShardCheckpointStore
{
  constructor(private readonly db: DatabaseClient<TQueryResult, TSchema>) {}

  async get(streamName: string, shardId: string): Promise<SequenceNumber | null> {
    const checkpoint = await getShardCheckpoint(this.db, streamName, shardId);
    return checkpoint?.sequenceNumber ?? null;
  }

  put(streamName: string, shardId: string, sequenceNumber: SequenceNumber): Promise<void> {
    return updateShardCheckpoint(this.db, streamName, shardId, sequenceNumber);
  }
}

export class InMemoryShardCheckpointStore implements ShardCheckpointStore {
  private readonly positions = new Map<string, SequenceNumber>();
  /** Every write, in order */
  readonly writes: Array<{ streamName: string; shardId: string; sequenceNumber: SequenceNumber }> = [];

  async get(streamName: string, shardId: string): Promise<SequenceNumber | null> {
    return this.positions.get(key(streamName, shardId)) ?? null;
  }

  async put(streamName: string, shardId: string, sequenceNumber: SequenceNumber): Promise<void> {
    this.positions.set(key(streamName, shardId), sequenceNumber);
    this.writes.push({ streamName, shardId, sequenceNumber });
  }
}

function key(streamName: string, shardId: string): string {
  return `${streamName}/${shardId}`;
}
