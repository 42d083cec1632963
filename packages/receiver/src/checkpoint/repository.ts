/**
 * Repository for reading and updating shard checkpoints.
 */

import { and, asc, eq } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { shardCheckpointTable, type ShardCheckpoint } from "./table";

/**
 * Any Drizzle Postgres database or transaction, whatever the driver:
 * `drizzle-orm/postgres-js` in production, others in tests.
 */
export type DatabaseClient<
  TQueryResult extends PgQueryResultHKT = PgQueryResultHKT,
  TSchema extends Record<string, unknown> = Record<string, unknown>,
> = PgDatabase<TQueryResult, TSchema>;

/**
 * Get the checkpoint of one shard.
 * Returns null if the shard was never checkpointed.
 */
export async function getShardCheckpoint<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>
>(
  db: DatabaseClient<TQueryResult, TSchema>,
  streamName: string,
  shardId: string
): Promise<ShardCheckpoint | null> {
  const [row] = await db
    .select()
    .from(shardCheckpointTable)
    .where(
      and(
        eq(shardCheckpointTable.streamName, streamName),
        eq(shardCheckpointTable.shardId, shardId)
      )
    )
    .limit(1);

  if (!row) {
    return null;
  }

  return {
    shardId: row.shardId,
    sequenceNumber: row.sequenceNumber,
    updatedAt: row.updatedAt,
  };
}

/**
 * Insert or overwrite the checkpoint of one shard.
 *
 * @param db - Database client (can be a transaction)
 */
export async function updateShardCheckpoint<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>
>(
  db: DatabaseClient<TQueryResult, TSchema>,
  streamName: string,
  shardId: string,
  sequenceNumber: string
): Promise<void> {
  await db
    .insert(shardCheckpointTable)
    .values({
      streamName,
      shardId,
      sequenceNumber,
      updatedAt: new Date(),
    })
    .onConflictDoUpdate({
      target: [shardCheckpointTable.streamName, shardCheckpointTable.shardId],
      set: {
        sequenceNumber,
        updatedAt: new Date(),
      },
    });
}

/**
 * Delete the checkpoint of one shard.
 * The shard is then read again from wherever the lease layer starts new shards.
 */
export async function deleteShardCheckpoint<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>
>(
  db: DatabaseClient<TQueryResult, TSchema>,
  streamName: string,
  shardId: string
): Promise<void> {
  await db
    .delete(shardCheckpointTable)
    .where(
      and(
        eq(shardCheckpointTable.streamName, streamName),
        eq(shardCheckpointTable.shardId, shardId)
      )
    );
}

/**
 * All shard checkpoints of a stream, ordered by shard id, for monitoring and debugging.
 */
export async function getStreamCheckpoints<
  TQueryResult extends PgQueryResultHKT,
  TSchema extends Record<string, unknown>
>(
  db: DatabaseClient<TQueryResult, TSchema>,
  streamName: string
): Promise<ShardCheckpoint[]> {
  const rows = await db
    .select()
    .from(shardCheckpointTable)
    .where(eq(shardCheckpointTable.streamName, streamName))
    .orderBy(asc(shardCheckpointTable.shardId));

  return rows.map((row) => ({
    shardId: row.shardId,
    sequenceNumber: row.sequenceNumber,
    updatedAt: row.updatedAt,
  }));
}
