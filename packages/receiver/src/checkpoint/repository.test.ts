/**
 * Checkpoint persistence against an in-process Postgres (PGlite).
 */

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { PersistentCheckpointHandle } from "./handle";
import {
  deleteShardCheckpoint,
  getShardCheckpoint,
  getStreamCheckpoints,
  updateShardCheckpoint,
} from "./repository";
import { DrizzleShardCheckpointStore } from "./store";

const CREATE_TABLE = `
  CREATE TABLE shard_checkpoints (
    stream_name text NOT NULL,
    shard_id text NOT NULL,
    sequence_number text NOT NULL,
    updated_at timestamp with time zone DEFAULT now() NOT NULL,
    CONSTRAINT shard_checkpoints_pk PRIMARY KEY (stream_name, shard_id)
  )
`;

describe("checkpoint repository", () => {
  const client = new PGlite();
  const db = drizzle(client);

  beforeAll(async () => {
    await client.exec(CREATE_TABLE);
  }, 30000);

  beforeEach(async () => {
    await client.exec("DELETE FROM shard_checkpoints");
  });

  afterAll(async () => {
    await client.close();
  });

  it("returns null for a shard that was never checkpointed", async () => {
    await expect(getShardCheckpoint(db, "orders", "shardA")).resolves.toBeNull();
  });

  it("overwrites the checkpoint of a shard on update", async () => {
    await updateShardCheckpoint(db, "orders", "shardA", "100");
    await updateShardCheckpoint(db, "orders", "shardA", "105");

    const checkpoint = await getShardCheckpoint(db, "orders", "shardA");
    expect(checkpoint).toMatchObject({ shardId: "shardA", sequenceNumber: "105" });
    expect(checkpoint?.updatedAt).toBeInstanceOf(Date);
    await expect(getStreamCheckpoints(db, "orders")).resolves.toHaveLength(1);
  });

  it("keys checkpoints by stream and shard", async () => {
    await updateShardCheckpoint(db, "orders", "shardB", "300");
    await updateShardCheckpoint(db, "payments", "shardA", "200");
    await updateShardCheckpoint(db, "orders", "shardA", "100");

    await expect(getShardCheckpoint(db, "orders", "shardA")).resolves.toMatchObject({ sequenceNumber: "100" });
    await expect(getShardCheckpoint(db, "payments", "shardA")).resolves.toMatchObject({ sequenceNumber: "200" });

    const listed = await getStreamCheckpoints(db, "orders");
    expect(listed.map(({ shardId, sequenceNumber }) => ({ shardId, sequenceNumber }))).toEqual([
      { shardId: "shardA", sequenceNumber: "100" },
      { shardId: "shardB", sequenceNumber: "300" },
    ]);
  });

  it("deletes only the checkpoint of the given stream and shard", async () => {
    await updateShardCheckpoint(db, "orders", "shardA", "100");
    await updateShardCheckpoint(db, "payments", "shardA", "200");

    await deleteShardCheckpoint(db, "orders", "shardA");

    await expect(getShardCheckpoint(db, "orders", "shardA")).resolves.toBeNull();
    await expect(getShardCheckpoint(db, "payments", "shardA")).resolves.toMatchObject({ sequenceNumber: "200" });
  });

  it("backs persistent checkpoint handles through the Drizzle store", async () => {
    const store = new DrizzleShardCheckpointStore(db);
    const handle = new PersistentCheckpointHandle(store, "orders", "shardA");

    await expect(handle.resumePosition()).resolves.toBeNull();
    await handle.checkpointAt("105");
    await handle.checkpointAt("103");

    await expect(store.get("orders", "shardA")).resolves.toBe("105");
    await expect(handle.resumePosition()).resolves.toEqual({
      type: "AFTER_SEQUENCE_NUMBER",
      sequenceNumber: "105",
    });
  });
});
