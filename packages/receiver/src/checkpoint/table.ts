/**
 * Shard checkpoint table schema.
 *
 * Export it from the Drizzle schema the migrations are generated from.
 *
 * @example
 * ```ts
 * // db/schema.ts
 * export { shardCheckpointTable } from "@shardstream/receiver";
 * ```
 */

import { pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

/**
 * One row per shard of a stream.
 */
export const shardCheckpointTable = pgTable(
  "shard_checkpoints",
  {
    streamName: text("stream_name").notNull(),
    shardId: text("shard_id").notNull(),
    /** Last sequence number whose batch was stored */
    sequenceNumber: text("sequence_number").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.streamName, table.shardId] }),
  })
);

export interface ShardCheckpoint {
  shardId: string;
  sequenceNumber: string;
  updatedAt: Date;
}
